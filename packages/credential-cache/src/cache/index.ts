/**
 * Caching primitives: TTL cache, single-flight, load-on-miss and one-shot
 * initialization.
 *
 * @packageDocumentation
 */

export { createExpiringCache } from './expiring-cache.js';
export type { ExpiringCacheOptions } from './expiring-cache.js';
export { createSingleFlight } from './single-flight.js';
export type { SingleFlight, SingleFlightOptions } from './single-flight.js';
export { computeOnce } from './compute-once.js';
export type { ComputeOnce } from './compute-once.js';
export { createLoadingCache } from './loading-cache.js';
export type { LoadingCache, LoadingCacheOptions, WaitError } from './loading-cache.js';
export type { ExpiringCache, CacheEntry, WaitOptions } from './types.js';
