/**
 * Configuration module exports
 */

export type { TelemetryConfig, ResolvedConfig } from '../types/index.js';
export {
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_LOG_QUEUE_SIZE,
  DEFAULT_STACK,
  applyDefaults,
} from './defaults.js';
export type { ValidatedConfig } from './defaults.js';
export { resolveConfig } from './validation.js';
export type { ResolveOptions } from './validation.js';
export { configFromEnvironment, readStackName } from './env.js';
export type { EnvironmentConfig } from './env.js';
