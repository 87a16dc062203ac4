import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { loadEnvironment } from './environment.js';

describe('loadEnvironment', () => {
  it('applies defaults to an empty environment', () => {
    const result = loadEnvironment({});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        configCacheTtlSeconds: 3600,
        tokenClockSkewSeconds: 30,
        lockTimeoutMs: undefined,
        modelsConfigPath: undefined,
        tokenStore: { kind: 'memory' },
        logLevel: 'info',
      });
    }
  });

  it('treats blank values as unset', () => {
    const result = loadEnvironment({ CONFIG_CACHE_TTL_SECONDS: '  ', LOG_LEVEL: '' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.configCacheTtlSeconds).toBe(3600);
      expect(result.value.logLevel).toBe('info');
    }
  });

  it('coerces numeric settings', () => {
    const result = loadEnvironment({
      CONFIG_CACHE_TTL_SECONDS: '60',
      TOKEN_CLOCK_SKEW_SECONDS: '0',
      CACHE_LOCK_TIMEOUT_MS: '5000',
      MODELS_CONFIG_PATH: '/etc/models',
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.configCacheTtlSeconds).toBe(60);
      expect(result.value.tokenClockSkewSeconds).toBe(0);
      expect(result.value.lockTimeoutMs).toBe(5000);
      expect(result.value.modelsConfigPath).toBe('/etc/models');
    }
  });

  it('builds mongo settings with the default collection', () => {
    const result = loadEnvironment({
      TOKEN_STORE: 'mongo',
      MONGO_URL: 'mongodb://localhost:27017',
      MONGO_DB_NAME: 'gateway',
    });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.tokenStore).toEqual({
        kind: 'mongo',
        url: 'mongodb://localhost:27017',
        dbName: 'gateway',
        collectionName: 'tokens',
      });
    }
  });

  it('reports every missing mongo setting', () => {
    const result = loadEnvironment({ TOKEN_STORE: 'mongo' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.issues).toEqual([
        'MONGO_URL is required when TOKEN_STORE=mongo',
        'MONGO_DB_NAME is required when TOKEN_STORE=mongo',
      ]);
    }
  });

  it('rejects a negative TTL', () => {
    const result = loadEnvironment({ CONFIG_CACHE_TTL_SECONDS: '-5' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatch(/^CONFIG_CACHE_TTL_SECONDS /);
    }
  });

  it('rejects an unknown store kind', () => {
    const result = loadEnvironment({ TOKEN_STORE: 'redis' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.issues[0]).toMatch(/^TOKEN_STORE /);
    }
  });
});
