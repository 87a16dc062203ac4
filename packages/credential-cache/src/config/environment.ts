import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

/** Unset and blank variables both mean "use the default" */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const environmentSchema = z
  .object({
    CONFIG_CACHE_TTL_SECONDS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().nonnegative().default(3600)
    ),
    TOKEN_CLOCK_SKEW_SECONDS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().nonnegative().default(30)
    ),
    CACHE_LOCK_TIMEOUT_MS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().positive().optional()
    ),
    MODELS_CONFIG_PATH: optionalString,
    TOKEN_STORE: z.preprocess(blankToUndefined, z.enum(['memory', 'mongo']).default('memory')),
    MONGO_URL: optionalString,
    MONGO_DB_NAME: optionalString,
    MONGO_TOKEN_COLLECTION: z.preprocess(blankToUndefined, z.string().trim().default('tokens')),
    LOG_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
    ),
  })
  .superRefine((env, ctx) => {
    if (env.TOKEN_STORE !== 'mongo') {
      return;
    }
    if (env.MONGO_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGO_URL'],
        message: 'is required when TOKEN_STORE=mongo',
      });
    }
    if (env.MONGO_DB_NAME === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGO_DB_NAME'],
        message: 'is required when TOKEN_STORE=mongo',
      });
    }
  });

/**
 * Where token records are persisted.
 */
export type TokenStoreSettings =
  | { readonly kind: 'memory' }
  | {
      readonly kind: 'mongo';
      readonly url: string;
      readonly dbName: string;
      readonly collectionName: string;
    };

/**
 * Operator settings for the caches and the token manager.
 */
export interface Environment {
  /** Config cache TTL in seconds */
  readonly configCacheTtlSeconds: number;
  /** Safety margin subtracted from access token expiry, in seconds */
  readonly tokenClockSkewSeconds: number;
  /** Fail-fast limit for callers waiting on a load or refresh */
  readonly lockTimeoutMs: number | undefined;
  /** Directory holding chat model config files */
  readonly modelsConfigPath: string | undefined;
  readonly tokenStore: TokenStoreSettings;
  readonly logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
}

/**
 * Reads operator settings from environment variables.
 *
 * Variables:
 * - CONFIG_CACHE_TTL_SECONDS (default 3600)
 * - TOKEN_CLOCK_SKEW_SECONDS (default 30)
 * - CACHE_LOCK_TIMEOUT_MS (optional)
 * - MODELS_CONFIG_PATH (optional)
 * - TOKEN_STORE: memory | mongo (default memory)
 * - MONGO_URL, MONGO_DB_NAME (required for mongo), MONGO_TOKEN_COLLECTION (default tokens)
 * - LOG_LEVEL (default info)
 *
 * @param env - Variables to read (default: process.env)
 * @returns Result with the parsed settings, or every problem found
 */
export const loadEnvironment = (
  env: Readonly<Record<string, string | undefined>> = process.env
): Result<Environment, ConfigurationError> => {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    return err(
      new ConfigurationError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
      )
    );
  }

  const values = parsed.data;
  const tokenStore: TokenStoreSettings =
    values.TOKEN_STORE === 'mongo' &&
    values.MONGO_URL !== undefined &&
    values.MONGO_DB_NAME !== undefined
      ? {
          kind: 'mongo',
          url: values.MONGO_URL,
          dbName: values.MONGO_DB_NAME,
          collectionName: values.MONGO_TOKEN_COLLECTION,
        }
      : { kind: 'memory' };

  return ok({
    configCacheTtlSeconds: values.CONFIG_CACHE_TTL_SECONDS,
    tokenClockSkewSeconds: values.TOKEN_CLOCK_SKEW_SECONDS,
    lockTimeoutMs: values.CACHE_LOCK_TIMEOUT_MS,
    modelsConfigPath: values.MODELS_CONFIG_PATH,
    tokenStore,
    logLevel: values.LOG_LEVEL,
  });
};
