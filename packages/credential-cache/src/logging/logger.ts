import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Paths scrubbed from every log line. Token values must never reach a sink,
 * even when a caller logs a whole record by mistake.
 */
export const REDACTED_PATHS: readonly string[] = [
  'accessToken',
  'refreshToken',
  'idToken',
  'subjectToken',
  'subject_token',
  'authorization',
  '*.accessToken',
  '*.refreshToken',
  '*.idToken',
  '*.value',
  '*.subject_token',
  '*.authorization',
  '*.*.value',
];

/** Replacement written in place of a redacted value */
export const REDACTION_CENSOR = '[redacted]';

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Minimum level to emit (default: "info") */
  readonly level?: LevelWithSilent;
  /** Component name stamped on every line */
  readonly name?: string;
  /** Where lines are written (default: stdout) */
  readonly destination?: DestinationStream;
}

/**
 * Creates the pino logger used by every factory in this package.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', name: 'token-exchange' });
 * logger.info({ provider: 'acme' }, 'refreshed access token');
 * ```
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const pinoOptions = {
    level: options.level ?? 'info',
    ...(options.name !== undefined ? { name: options.name } : {}),
    redact: { paths: [...REDACTED_PATHS], censor: REDACTION_CENSOR },
  };

  return options.destination !== undefined
    ? pino(pinoOptions, options.destination)
    : pino(pinoOptions);
};

/**
 * A logger that drops everything, for tests and embedding.
 */
export const createSilentLogger = (): Logger => pino({ level: 'silent' });
