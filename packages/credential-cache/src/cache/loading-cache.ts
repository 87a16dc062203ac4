/**
 * Load-on-miss over an {@link ExpiringCache}, with double-checked locking.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { LockTimeoutError, OperationCancelledError } from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';
import { createSingleFlight } from './single-flight.js';
import type { ExpiringCache, WaitOptions } from './types.js';

/** Errors raised while waiting on another caller's load */
export type WaitError = LockTimeoutError | OperationCancelledError;

/** The cache holds one payload, so the lock has one key */
const LOAD_KEY = 'load';

/**
 * Options for creating a loading cache.
 */
export interface LoadingCacheOptions<T, E> {
  /** Cache holding the loaded value */
  readonly cache: ExpiringCache<T>;
  /** Produces a fresh value; may reject */
  readonly load: () => Promise<T>;
  /** Maps a loader rejection to the caller-facing error */
  readonly toError: (cause: unknown) => E;
  /** Default wait limit for callers blocked behind a load */
  readonly lockTimeoutMs?: number | undefined;
  /** Name used in log lines */
  readonly name?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * A cache that loads its value on a miss, one loader at a time.
 */
export interface LoadingCache<T, E> {
  /**
   * Returns the cached value, loading it first when the cache is empty or
   * expired. Concurrent callers on a miss share a single loader run.
   */
  readonly get: (options?: WaitOptions) => Promise<Result<T, E | WaitError>>;
  /** Drops the cached value so the next `get` loads again */
  readonly invalidate: () => void;
  /** Whether the cached value is currently valid */
  readonly isValid: () => boolean;
}

/**
 * Creates a loading cache.
 *
 * A failed load is never cached and never clears a previous entry; the next
 * `get` simply tries again.
 */
export const createLoadingCache = <T, E>(options: LoadingCacheOptions<T, E>): LoadingCache<T, E> => {
  const {
    cache,
    load,
    toError,
    lockTimeoutMs,
    name = 'loading-cache',
    logger = createSilentLogger(),
  } = options;
  const flight = createSingleFlight<string, Result<T, E>>({ name, logger });

  const loadIntoCache = async (): Promise<Result<T, E>> => {
    // Another caller may have filled the cache while this one queued
    const cached = cache.get();
    if (cached !== undefined) {
      logger.debug({ cache: name }, 'cache filled while waiting');
      return ok(cached);
    }

    logger.info({ cache: name }, 'cache miss; loading');
    try {
      const value = await load();
      cache.set(value);
      return ok(value);
    } catch (error) {
      logger.error(
        { cache: name, error: error instanceof Error ? error.message : String(error) },
        'load failed'
      );
      return err(toError(error));
    }
  };

  const get = async (waitOptions: WaitOptions = {}): Promise<Result<T, E | WaitError>> => {
    const cached = cache.get();
    if (cached !== undefined) {
      return ok(cached);
    }

    try {
      return await flight.run(LOAD_KEY, loadIntoCache, {
        signal: waitOptions.signal,
        timeoutMs: waitOptions.timeoutMs ?? lockTimeoutMs,
      });
    } catch (error) {
      if (error instanceof LockTimeoutError || error instanceof OperationCancelledError) {
        return err(error);
      }
      throw error;
    }
  };

  const invalidate = (): void => {
    cache.clear();
  };

  return { get, invalidate, isValid: cache.isValid };
};
