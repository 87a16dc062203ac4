/**
 * Single-slot cache whose value expires a fixed time after it was set.
 *
 * Every operation is synchronous, so on the Node event loop each one runs to
 * completion without interleaving and no caller ever waits on I/O here.
 */
export interface ExpiringCache<T> {
  /**
   * True iff a value is present and younger than the TTL.
   */
  readonly isValid: () => boolean;

  /**
   * Gets the cached value.
   * @returns The value if valid, undefined otherwise
   */
  readonly get: () => T | undefined;

  /**
   * Stores a value and stamps it with the current time. The last `set` wins.
   */
  readonly set: (value: T) => void;

  /**
   * Removes the value so `isValid()` becomes false.
   */
  readonly clear: () => void;

  /**
   * Idempotent initializer.
   * @param initValue - When given, it is `set` and returned
   * @returns `initValue`, or the current `get()` result when none was given
   */
  readonly create: (initValue?: T) => T | undefined;
}

/**
 * A cached value together with the time it was stored.
 * Replaced as a whole, never mutated.
 */
export interface CacheEntry<T> {
  readonly value: T;
  /** When the value was stored (Unix timestamp ms) */
  readonly timestamp: number;
}

/**
 * Options accepted by {@link SingleFlight.run} and the caches built on it.
 */
export interface WaitOptions {
  /** Cancels this caller's wait; the shared operation keeps running */
  readonly signal?: AbortSignal | undefined;
  /** Gives up waiting after this many milliseconds */
  readonly timeoutMs?: number | undefined;
}
