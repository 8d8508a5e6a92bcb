export { createLogger, silentLogger, resolveLogLevel, LogLevelSchema } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogFields } from './logger.js';
