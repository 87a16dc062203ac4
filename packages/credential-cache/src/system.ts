/**
 * Composition root: wires the store, token clients, token manager and model
 * config cache from operator settings. Nothing here is a module-level
 * singleton; each call builds an independent system.
 *
 * @packageDocumentation
 */

import type { Logger } from 'pino';
import { createConfigCache, type ConfigCache, type ConfigLoader } from './config/config-cache.js';
import type { Environment } from './config/environment.js';
import { createChatModelConfigLoader } from './config/file-config-loader.js';
import type { ChatModelConfig } from './config/schema.js';
import type { HttpClient } from './http/types.js';
import { createLogger } from './logging/logger.js';
import { createMemoryTokenRecordStore } from './storage/memory-token-record-store.js';
import { createMongoConnection, type MongoConnection } from './storage/mongo-connection.js';
import { createMongoTokenRecordStore } from './storage/mongo-token-record-store.js';
import type { TokenRecordStore } from './storage/types.js';
import { createTokenClient } from './tokens/token-client.js';
import {
  createTokenExchangeManager,
  type TokenExchangeManager,
} from './tokens/token-exchange-manager.js';
import type { ProviderConfig } from './tokens/types.js';

export interface CredentialCacheSystemOptions {
  readonly environment: Environment;
  /** OAuth client registrations, one per provider */
  readonly providers: readonly ProviderConfig[];
  /** Model config source (default: files under MODELS_CONFIG_PATH) */
  readonly configLoader?: ConfigLoader<ChatModelConfig> | undefined;
  readonly httpClient?: HttpClient | undefined;
  /** Default: a pino logger at LOG_LEVEL */
  readonly logger?: Logger | undefined;
}

export interface CredentialCacheSystem {
  readonly tokenManager: TokenExchangeManager;
  readonly tokenStore: TokenRecordStore;
  /** Absent when neither a loader nor MODELS_CONFIG_PATH is configured */
  readonly modelConfigs: ConfigCache<ChatModelConfig> | undefined;
  readonly logger: Logger;
  /** Releases the database connection, if one was opened */
  readonly close: () => Promise<void>;
}

/**
 * Builds a credential cache system.
 *
 * @example
 * ```typescript
 * const environment = loadEnvironment();
 * if (environment.isErr()) {
 *   throw environment.error;
 * }
 * const system = createCredentialCacheSystem({
 *   environment: environment.value,
 *   providers: [{ provider: 'example', issuer: 'https://idp.example.com', clientId: 'gateway' }],
 * });
 * const token = await system.tokenManager.getValidToken('example', userId, 'gateway');
 * await system.close();
 * ```
 */
export const createCredentialCacheSystem = (
  options: CredentialCacheSystemOptions
): CredentialCacheSystem => {
  const { environment, providers, httpClient } = options;
  const logger =
    options.logger ?? createLogger({ level: environment.logLevel, name: 'credential-cache' });
  const { tokenStore: storeSettings } = environment;

  let connection: MongoConnection | undefined;
  let tokenStore: TokenRecordStore;
  if (storeSettings.kind === 'mongo') {
    connection = createMongoConnection({
      url: storeSettings.url,
      dbName: storeSettings.dbName,
      collectionName: storeSettings.collectionName,
      logger,
    });
    tokenStore = createMongoTokenRecordStore({ getCollection: connection.getCollection, logger });
  } else {
    tokenStore = createMemoryTokenRecordStore();
  }

  const tokenManager = createTokenExchangeManager({
    store: tokenStore,
    tokenClients: providers.map((provider) =>
      createTokenClient(provider, { httpClient, logger })
    ),
    clockSkewSeconds: environment.tokenClockSkewSeconds,
    lockTimeoutMs: environment.lockTimeoutMs,
    logger,
  });

  const load =
    options.configLoader ??
    (environment.modelsConfigPath !== undefined
      ? createChatModelConfigLoader(environment.modelsConfigPath, logger)
      : undefined);
  const modelConfigs =
    load === undefined
      ? undefined
      : createConfigCache({
          load,
          ttlSeconds: environment.configCacheTtlSeconds,
          lockTimeoutMs: environment.lockTimeoutMs,
          logger,
        });

  logger.info(
    { store: storeSettings.kind, providers: providers.map((provider) => provider.provider) },
    'credential cache ready'
  );

  const close = async (): Promise<void> => {
    await connection?.close();
  };

  return { tokenManager, tokenStore, modelConfigs, logger, close };
};
