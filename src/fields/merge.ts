/**
 * Field merge policy
 *
 * Every event carries the union of three sources. On a key collision the
 * call-site field wins over the process default field, which wins over the
 * fixed resource attribute. A caller may therefore shadow `service.name`;
 * that is not validated against.
 */

import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { Fields, ResolvedConfig } from '../types/index.js';
import { toError } from '../errors/index.js';
import { errorName, stackDigest } from './stacktrace.js';

export const ATTR_HOST_NAME = 'host.name';
export const ATTR_DEPLOYMENT_STACK = 'deployment.stack';
export const ATTR_COMPONENT = 'component';
export const ATTR_OPERATION = 'operation';
export const ATTR_TIMESTAMP = 'timestamp';
export const ATTR_ERROR = 'error';
export const ATTR_ERROR_TYPE = 'error.type';
export const ATTR_STACKTRACE = 'stacktrace';
export const ATTR_STACKTRACE_HASH = 'stacktrace.hash';

/**
 * One logging call, as handed to the logging delegate
 */
export interface LogEntry {
  component: string;
  operation: string;
  message: string;
  error?: unknown;
  fields?: Fields;
  /** Call-site stack, captured for Warn/Error/Fatal */
  stacktrace?: string;
}

/**
 * Merge the three attribute sources (call > default > resource)
 */
export function mergeFields(
  callFields: Readonly<Fields> = {},
  defaultFields: Readonly<Fields> = {},
  resourceAttrs: Readonly<Fields> = {}
): Fields {
  return {
    ...resourceAttrs,
    ...defaultFields,
    ...callFields,
  };
}

/**
 * Process identity attributes
 */
export function resourceFields(config: ResolvedConfig): Fields {
  return {
    [ATTR_SERVICE_NAME]: config.service.name,
    [ATTR_SERVICE_VERSION]: config.service.version,
    [ATTR_HOST_NAME]: config.hostname,
  };
}

/**
 * Build the attribute set of a log record
 *
 * @param now - Time of the call; the timestamp is taken here, not at dispatch
 */
export function buildLogAttributes(
  entry: LogEntry,
  config: ResolvedConfig,
  now: Date = new Date()
): Fields {
  const fixed: Fields = {
    ...resourceFields(config),
    [ATTR_COMPONENT]: entry.component,
    [ATTR_OPERATION]: entry.operation,
    [ATTR_TIMESTAMP]: now.toISOString(),
  };

  if (entry.error !== undefined && entry.error !== null) {
    fixed[ATTR_ERROR] = toError(entry.error).message;
    fixed[ATTR_ERROR_TYPE] = errorName(entry.error);
  }

  if (entry.stacktrace !== undefined) {
    fixed[ATTR_STACKTRACE_HASH] = stackDigest(entry.stacktrace);
    fixed[ATTR_STACKTRACE] = entry.stacktrace;
  }

  return mergeFields(entry.fields, config.defaultFields, fixed);
}

/**
 * Build the attribute set of a metric point
 */
export function buildMetricAttributes(
  fields: Readonly<Fields> | undefined,
  config: ResolvedConfig
): Fields {
  return mergeFields(fields, config.defaultFields, {
    ...resourceFields(config),
    [ATTR_DEPLOYMENT_STACK]: config.stack,
  });
}
