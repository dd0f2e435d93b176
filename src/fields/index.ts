/**
 * Field merge policy exports
 */

export {
  ATTR_HOST_NAME,
  ATTR_DEPLOYMENT_STACK,
  ATTR_COMPONENT,
  ATTR_OPERATION,
  ATTR_TIMESTAMP,
  ATTR_ERROR,
  ATTR_ERROR_TYPE,
  ATTR_STACKTRACE,
  ATTR_STACKTRACE_HASH,
  mergeFields,
  resourceFields,
  buildLogAttributes,
  buildMetricAttributes,
} from './merge.js';
export type { LogEntry } from './merge.js';
export { captureStack, stackDigest, errorName } from './stacktrace.js';
export { buildResource } from './resource.js';
