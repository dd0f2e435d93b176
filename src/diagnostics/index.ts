/**
 * Diagnostics loggers
 */

export { ConsoleLogger, NoopLogger } from './logger.js';
export type { ConsoleLoggerConfig, LogFormat, LogLevel } from './logger.js';
