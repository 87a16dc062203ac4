import type { Logger } from 'pino';
import { createSilentLogger } from '../logging/logger.js';
import type { CacheEntry, ExpiringCache } from './types.js';

/**
 * Options for creating an expiring cache.
 */
export interface ExpiringCacheOptions<T> {
  /** Time to live in seconds; 0 disables the cache */
  readonly ttlSeconds: number;
  /** Value stored at construction */
  readonly initValue?: T | undefined;
  /** Name used in log lines (default: "expiring-cache") */
  readonly name?: string | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Creates a single-slot TTL cache.
 *
 * A value set at T0 is valid while `now - T0 < ttl` and invalid from
 * `now - T0 >= ttl` on.
 *
 * @example
 * ```typescript
 * const cache = createExpiringCache<readonly string[]>({ ttlSeconds: 3600 });
 * cache.set(['modelA', 'modelB']);
 * cache.get(); // ['modelA', 'modelB']
 * ```
 */
export const createExpiringCache = <T>(options: ExpiringCacheOptions<T>): ExpiringCache<T> => {
  const { ttlSeconds, name = 'expiring-cache', logger = createSilentLogger() } = options;

  if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
    throw new RangeError(`ttlSeconds must be a finite number >= 0, got ${String(ttlSeconds)}`);
  }

  const ttlMs = ttlSeconds * 1000;
  let entry: CacheEntry<T> | undefined;

  const isValid = (): boolean => {
    if (entry === undefined) {
      return false;
    }
    return Date.now() - entry.timestamp < ttlMs;
  };

  const get = (): T | undefined => {
    const current = entry;
    if (current === undefined || Date.now() - current.timestamp >= ttlMs) {
      return undefined;
    }
    return current.value;
  };

  const set = (value: T): void => {
    entry = { value, timestamp: Date.now() };
    logger.debug({ cache: name, timestamp: entry.timestamp }, 'cache set');
  };

  const clear = (): void => {
    entry = undefined;
    logger.debug({ cache: name }, 'cache cleared');
  };

  const create = (initValue?: T): T | undefined => {
    if (initValue !== undefined) {
      set(initValue);
      return initValue;
    }
    return get();
  };

  if (options.initValue !== undefined) {
    set(options.initValue);
  }

  return { isValid, get, set, clear, create };
};
