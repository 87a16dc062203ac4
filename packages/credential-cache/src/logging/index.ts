export { createLogger, createSilentLogger, REDACTED_PATHS, REDACTION_CENSOR } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
