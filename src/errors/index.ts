/**
 * Error classes for the telemetry facade.
 */

export {
  TelemetryError,
  isTelemetryError,
  isErrorCategory,
  toError,
  describeValue,
} from './base.js';
export type { ErrorCategory } from './base.js';

export {
  InvalidConfigurationError,
  InvalidModeError,
  HostnameResolutionError,
  UnreachableModeError,
} from './configuration.js';

export { ExporterInitError, MetricRecordError, ShutdownError } from './pillar.js';
