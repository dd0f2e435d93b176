/**
 * Default configuration values
 */

import type { Fields, Logger, Mode, ResolvedConfig, ServiceIdentity } from '../types/index.js';
import { NoopLogger } from '../diagnostics/index.js';

/** Default interval between batched exports (30 seconds) */
export const DEFAULT_FLUSH_INTERVAL_MS = 30_000;

/** Default transport timeout (10 seconds) */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Default production collector port */
export const DEFAULT_PORT = '80';

/** Default capacity of the log dispatch queue */
export const DEFAULT_LOG_QUEUE_SIZE = 2048;

/** Stack name reported when none is configured */
export const DEFAULT_STACK = '-';

/**
 * Values left after validation, before defaults are filled in
 */
export interface ValidatedConfig {
  service: ServiceIdentity;
  mode: Mode;
  searchIndex?: string;
  flushIntervalMs?: number;
  timeoutMs?: number;
  port?: string;
  defaultFields?: Fields;
  logQueueSize?: number;
  histogramBuckets?: number[];
  stack?: string;
  logger?: Logger;
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}

/**
 * Apply default values to a validated configuration
 *
 * Explicitly set fields are never overwritten; non-positive durations count
 * as unset.
 */
export function applyDefaults(
  config: ValidatedConfig,
  hostname: string,
  fallbackStack: string = DEFAULT_STACK
): ResolvedConfig {
  return Object.freeze({
    service: Object.freeze({ name: config.service.name, version: config.service.version }),
    mode: config.mode,
    searchIndex: config.searchIndex || config.service.name,
    flushIntervalMs: positiveOr(config.flushIntervalMs, DEFAULT_FLUSH_INTERVAL_MS),
    timeoutMs: positiveOr(config.timeoutMs, DEFAULT_TIMEOUT_MS),
    port: config.port || DEFAULT_PORT,
    defaultFields: Object.freeze({ ...config.defaultFields }),
    logQueueSize: config.logQueueSize ?? DEFAULT_LOG_QUEUE_SIZE,
    histogramBuckets: Object.freeze([...(config.histogramBuckets ?? [])]),
    hostname,
    stack: config.stack || fallbackStack,
    logger: config.logger ?? new NoopLogger(),
  });
}
