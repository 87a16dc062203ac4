export { createConfigCache, DEFAULT_CONFIG_CACHE_TTL_SECONDS } from './config-cache.js';
export type {
  ConfigCache,
  ConfigCacheError,
  ConfigCacheOptions,
  ConfigList,
  ConfigLoader,
} from './config-cache.js';
export { createFileConfigLoader, createChatModelConfigLoader } from './file-config-loader.js';
export type { FileConfigLoaderOptions } from './file-config-loader.js';
export { chatModelConfigSchema, modelConfigSchema } from './schema.js';
export type { ChatModelConfig, ModelConfig } from './schema.js';
export { loadEnvironment } from './environment.js';
export type { Environment, TokenStoreSettings } from './environment.js';
