/**
 * Environment variable configuration
 */

import type { Fields, TelemetryConfig } from '../types/index.js';
import { DEFAULT_STACK } from './defaults.js';

/**
 * Parse fields from an environment variable string
 *
 * Expected format: "key1:value1,key2:value2"
 */
function parseFields(fieldsString: string): Fields {
  const fields: Fields = {};

  for (const pair of fieldsString.split(',')) {
    const trimmedPair = pair.trim();
    if (!trimmedPair) {
      continue;
    }

    const colonIndex = trimmedPair.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const key = trimmedPair.substring(0, colonIndex).trim();
    const value = trimmedPair.substring(colonIndex + 1).trim();

    if (key && value) {
      fields[key] = value;
    }
  }

  return fields;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Read the deployment stack name, `-` when unset
 */
export function readStackName(env: NodeJS.ProcessEnv = process.env): string {
  return env.TELEMETRY_STACK || DEFAULT_STACK;
}

/**
 * Environment configuration before validation; the mode stays a raw string
 * so that `resolveConfig` reports an unknown value as an invalid mode.
 */
export type EnvironmentConfig = Partial<Omit<TelemetryConfig, 'mode' | 'service'>> & {
  service?: Partial<TelemetryConfig['service']>;
  mode?: string;
};

/**
 * Create a partial configuration from environment variables
 *
 * Reads:
 * - TELEMETRY_SERVICE_NAME, OTEL_SERVICE_NAME - Service name
 * - TELEMETRY_SERVICE_VERSION - Service version
 * - TELEMETRY_MODE - discard | local | debug | development | production
 * - TELEMETRY_SEARCH_INDEX - Index for log records
 * - TELEMETRY_FLUSH_INTERVAL_MS - Export interval
 * - TELEMETRY_TIMEOUT_MS - Transport timeout
 * - TELEMETRY_PORT - Production collector port
 * - TELEMETRY_DEFAULT_FIELDS - Fields as comma-separated key:value pairs
 * - TELEMETRY_STACK - Deployment stack name
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const config: EnvironmentConfig = {};

  const name = env.TELEMETRY_SERVICE_NAME || env.OTEL_SERVICE_NAME;
  const version = env.TELEMETRY_SERVICE_VERSION;
  if (name || version) {
    config.service = {};
    if (name) config.service.name = name;
    if (version) config.service.version = version;
  }

  if (env.TELEMETRY_MODE) {
    config.mode = env.TELEMETRY_MODE.toLowerCase();
  }

  if (env.TELEMETRY_SEARCH_INDEX) {
    config.searchIndex = env.TELEMETRY_SEARCH_INDEX;
  }

  const flushIntervalMs = parseNumber(env.TELEMETRY_FLUSH_INTERVAL_MS);
  if (flushIntervalMs !== undefined) {
    config.flushIntervalMs = flushIntervalMs;
  }

  const timeoutMs = parseNumber(env.TELEMETRY_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    config.timeoutMs = timeoutMs;
  }

  if (env.TELEMETRY_PORT) {
    config.port = env.TELEMETRY_PORT;
  }

  if (env.TELEMETRY_DEFAULT_FIELDS) {
    config.defaultFields = parseFields(env.TELEMETRY_DEFAULT_FIELDS);
  }

  if (env.TELEMETRY_STACK) {
    config.stack = env.TELEMETRY_STACK;
  }

  return config;
}
