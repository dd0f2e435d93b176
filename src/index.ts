/**
 * Unified telemetry for TypeScript services
 *
 * One client for structured logs, traces and metrics, routed by deployment
 * mode to stdout, the console or an OpenTelemetry collector.
 *
 * @packageDocumentation
 */

// ============================================================================
// Client Exports
// ============================================================================

export type { TelemetryClient, TelemetryDelegates, CreateTelemetryOptions } from './client/index.js';
export { TelemetryClientImpl, createTelemetry, createTelemetryFromEnvironment } from './client/index.js';

// ============================================================================
// Type Exports
// ============================================================================

export { Mode, MODES } from './types/index.js';
export type {
  Pillar,
  Fields,
  Logger,
  ServiceIdentity,
  TelemetryConfig,
  ResolvedConfig,
} from './types/index.js';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_PORT,
  DEFAULT_LOG_QUEUE_SIZE,
  DEFAULT_STACK,
  resolveConfig,
  configFromEnvironment,
} from './config/index.js';
export type { ResolveOptions, EnvironmentConfig } from './config/index.js';

// ============================================================================
// Routing Exports
// ============================================================================

export {
  DEBUG_COLLECTOR_ENDPOINT,
  DEVELOPMENT_COLLECTOR_ENDPOINT,
  PRODUCTION_COLLECTOR_HOST,
  targetFor,
  collectorUrl,
} from './routing/index.js';
export type { TransportTarget, CollectorKind } from './routing/index.js';

// ============================================================================
// Field Exports
// ============================================================================

export {
  mergeFields,
  buildLogAttributes,
  buildMetricAttributes,
  stackDigest,
  errorName,
} from './fields/index.js';
export type { LogEntry } from './fields/index.js';

// ============================================================================
// Delegate Exports
// ============================================================================

export type { LoggingDelegate } from './logging/index.js';
export { OtelLoggingDelegate } from './logging/index.js';
export type { Span, StartSpanOptions, StartedSpan, TracingDelegate } from './tracing/index.js';
export { OtelTracingDelegate } from './tracing/index.js';
export type { MetricsDelegate } from './metrics/index.js';
export { OtelMetricsDelegate } from './metrics/index.js';
export type { ExporterOverrides, LineWriter } from './exporters/index.js';
export { StdoutLogRecordExporter, NoopSpanExporter } from './exporters/index.js';

// ============================================================================
// Error Exports
// ============================================================================

export {
  TelemetryError,
  InvalidConfigurationError,
  InvalidModeError,
  HostnameResolutionError,
  UnreachableModeError,
  ExporterInitError,
  MetricRecordError,
  ShutdownError,
  isTelemetryError,
  isErrorCategory,
} from './errors/index.js';
export type { ErrorCategory } from './errors/index.js';

// ============================================================================
// Diagnostics Exports
// ============================================================================

export { ConsoleLogger, NoopLogger } from './diagnostics/index.js';
export type { ConsoleLoggerConfig, LogFormat, LogLevel } from './diagnostics/index.js';

// ============================================================================
// Context Exports
// ============================================================================

export { ROOT_CONTEXT, SpanKind } from '@opentelemetry/api';
export type { Context } from '@opentelemetry/api';

/**
 * Library version
 */
export const VERSION = '0.1.0';
