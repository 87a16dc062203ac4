import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import type { z } from 'zod';
import { createSilentLogger } from '../logging/logger.js';
import type { ConfigList, ConfigLoader } from './config-cache.js';
import { chatModelConfigSchema, type ChatModelConfig } from './schema.js';

/**
 * Options for a directory-backed config loader.
 */
export interface FileConfigLoaderOptions<TConfig> {
  /** Directory scanned recursively for `*.json` files */
  readonly directory: string;
  /** Schema every file must satisfy */
  readonly schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
  /** Sort key for the returned list (default: file path order) */
  readonly sortKey?: ((config: TConfig) => string) | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Parses one config file, naming the file in any failure.
 */
const parseConfigFile = async <TConfig>(
  filePath: string,
  schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>
): Promise<TConfig> => {
  const raw = await readFile(filePath, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid JSON in ${filePath}`, { cause: error });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid config in ${filePath}: ${issues}`, { cause: parsed.error });
  }

  return parsed.data;
};

/**
 * Creates a loader that reads every `*.json` file below a directory.
 *
 * @example
 * ```typescript
 * const load = createFileConfigLoader({
 *   directory: './configs',
 *   schema: chatModelConfigSchema,
 *   sortKey: (config) => config.name,
 * });
 * const configs = await load();
 * ```
 */
export const createFileConfigLoader = <TConfig>(
  options: FileConfigLoaderOptions<TConfig>
): ConfigLoader<TConfig> => {
  const { directory, schema, sortKey, logger = createSilentLogger() } = options;

  return async (): Promise<ConfigList<TConfig>> => {
    logger.info({ directory }, 'reading configuration files');

    const entries = await readdir(directory, { recursive: true });
    const files = entries
      .filter((entry) => entry.endsWith('.json'))
      .sort()
      .map((entry) => path.join(directory, entry));

    const configs = await Promise.all(files.map((file) => parseConfigFile(file, schema)));

    if (sortKey !== undefined) {
      configs.sort((a, b) => sortKey(a).localeCompare(sortKey(b)));
    }

    logger.info({ directory, count: configs.length }, 'configuration files read');
    return configs;
  };
};

/**
 * Loader for chat model configs, sorted by name.
 */
export const createChatModelConfigLoader = (
  directory: string,
  logger?: Logger
): ConfigLoader<ChatModelConfig> =>
  createFileConfigLoader({
    directory,
    schema: chatModelConfigSchema,
    sortKey: (config) => config.name,
    logger,
  });
