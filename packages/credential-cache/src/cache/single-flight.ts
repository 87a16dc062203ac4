/**
 * Single-flight: at most one in-flight execution of an operation per key.
 *
 * Callers that arrive while an operation for their key is running await that
 * operation instead of starting a second one. This is the one locking
 * primitive of the package; the config cache, OIDC discovery and the token
 * exchange manager all go through it.
 *
 * @packageDocumentation
 */

import type { Logger } from 'pino';
import { LockTimeoutError, OperationCancelledError } from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';
import type { WaitOptions } from './types.js';

/**
 * Options for creating a single-flight group.
 */
export interface SingleFlightOptions {
  /** Name used in errors and log lines (default: "single-flight") */
  readonly name?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * A group of keyed single-flight operations.
 */
export interface SingleFlight<K, V> {
  /**
   * Runs `operation` for `key`, or joins the run already in flight.
   *
   * Not re-entrant: an operation that awaits `run` on its own key waits on
   * itself forever.
   *
   * Cancelling through `signal`, or hitting `timeoutMs`, rejects only this
   * caller (with `OperationCancelledError` / `LockTimeoutError`); the shared
   * operation completes for everyone else.
   *
   * @returns The shared operation's result
   */
  readonly run: (key: K, operation: () => Promise<V>, options?: WaitOptions) => Promise<V>;

  /**
   * Whether an operation for `key` is currently running.
   */
  readonly isInFlight: (key: K) => boolean;
}

/**
 * Creates a single-flight group.
 *
 * @example
 * ```typescript
 * const flight = createSingleFlight<string, Config[]>({ name: 'config' });
 * // Ten concurrent callers, one loader invocation
 * const results = await Promise.all(
 *   Array.from({ length: 10 }, () => flight.run('configs', loadConfigs))
 * );
 * ```
 */
export const createSingleFlight = <K, V>(options: SingleFlightOptions = {}): SingleFlight<K, V> => {
  const { name = 'single-flight', logger = createSilentLogger() } = options;
  const inFlight = new Map<K, Promise<V>>();

  /**
   * Awaits the shared promise on behalf of one caller, honouring that
   * caller's cancellation and timeout.
   */
  const waitFor = (shared: Promise<V>, waitOptions: WaitOptions): Promise<V> => {
    const { signal, timeoutMs } = waitOptions;
    if (signal === undefined && timeoutMs === undefined) {
      return shared;
    }

    return new Promise<V>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        cleanup();
        reject(new OperationCancelledError(name, signal?.reason));
      };

      if (signal?.aborted === true) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          logger.warn({ lock: name, timeoutMs }, 'gave up waiting for in-flight operation');
          reject(new LockTimeoutError(name, timeoutMs));
        }, timeoutMs);
      }

      shared.then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  };

  const run = (key: K, operation: () => Promise<V>, waitOptions: WaitOptions = {}): Promise<V> => {
    const existing = inFlight.get(key);
    if (existing !== undefined) {
      logger.debug({ lock: name }, 'joining in-flight operation');
      return waitFor(existing, waitOptions);
    }

    // Deferred through then() so a synchronous throw becomes a rejection
    const shared = Promise.resolve().then(operation);
    inFlight.set(key, shared);

    // Settles the bookkeeping, and keeps a rejection nobody awaits anymore
    // (every caller cancelled) from surfacing as unhandled
    shared.then(
      () => {
        inFlight.delete(key);
      },
      (error: unknown) => {
        inFlight.delete(key);
        logger.debug(
          { lock: name, error: error instanceof Error ? error.name : typeof error },
          'in-flight operation failed'
        );
      }
    );

    return waitFor(shared, waitOptions);
  };

  const isInFlight = (key: K): boolean => inFlight.has(key);

  return { run, isInFlight };
};
