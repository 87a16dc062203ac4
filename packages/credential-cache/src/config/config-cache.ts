/**
 * Config cache: a TTL cache over a list of configuration records that
 * reloads at most once per expiry, however many callers miss at once.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { createExpiringCache } from '../cache/expiring-cache.js';
import { createLoadingCache, type WaitError } from '../cache/loading-cache.js';
import type { WaitOptions } from '../cache/types.js';
import { ConfigLoadError } from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';

/** Default config cache TTL: 1 hour */
export const DEFAULT_CONFIG_CACHE_TTL_SECONDS = 3600;

/** A loaded configuration payload */
export type ConfigList<TConfig> = readonly TConfig[];

/**
 * Loads the configuration list from its source (file, object store,
 * repository). May reject.
 */
export type ConfigLoader<TConfig> = () => Promise<ConfigList<TConfig>>;

/** Errors returned by {@link ConfigCache.getConfigs} */
export type ConfigCacheError = ConfigLoadError | WaitError;

/**
 * Options for creating a config cache.
 */
export interface ConfigCacheOptions<TConfig> {
  readonly load: ConfigLoader<TConfig>;
  /** TTL in seconds (default: 3600); 0 reloads on every call */
  readonly ttlSeconds?: number | undefined;
  /** Configs to start with, valid for one TTL */
  readonly initValue?: ConfigList<TConfig> | undefined;
  /** How long a caller waits behind another caller's load before failing */
  readonly lockTimeoutMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Config cache interface.
 */
export interface ConfigCache<TConfig> {
  /**
   * Gets the configuration list, loading it on a miss.
   *
   * @returns Result with the configs, or the load / wait failure
   */
  readonly getConfigs: (
    options?: WaitOptions
  ) => Promise<Result<ConfigList<TConfig>, ConfigCacheError>>;

  /** Drops the cached list; the next call reloads */
  readonly invalidate: () => void;

  /** Whether the cached list is still within its TTL */
  readonly isValid: () => boolean;
}

/**
 * Creates a config cache. Each instance owns its own lock, so two config
 * caches never wait on each other.
 *
 * @example
 * ```typescript
 * const configCache = createConfigCache({
 *   load: createFileConfigLoader({ directory: '/configs/chat_models' }),
 *   ttlSeconds: 3600,
 * });
 *
 * const result = await configCache.getConfigs();
 * if (result.isOk()) {
 *   for (const config of result.value) {
 *     console.log(config.name);
 *   }
 * }
 * ```
 */
export const createConfigCache = <TConfig>(
  options: ConfigCacheOptions<TConfig>
): ConfigCache<TConfig> => {
  const logger = options.logger ?? createSilentLogger();

  const cache = createExpiringCache<ConfigList<TConfig>>({
    ttlSeconds: options.ttlSeconds ?? DEFAULT_CONFIG_CACHE_TTL_SECONDS,
    initValue: options.initValue,
    name: 'config-cache',
    logger,
  });

  const loading = createLoadingCache<ConfigList<TConfig>, ConfigLoadError>({
    cache,
    load: options.load,
    toError: (cause) => new ConfigLoadError(cause),
    lockTimeoutMs: options.lockTimeoutMs,
    name: 'config-cache',
    logger,
  });

  return {
    getConfigs: loading.get,
    invalidate: loading.invalidate,
    isValid: loading.isValid,
  };
};
