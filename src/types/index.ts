/**
 * Type definitions shared across the telemetry facade.
 */

/**
 * Deployment mode selecting the transport each pillar binds to.
 */
export enum Mode {
  /** Everything is discarded. Useful for tests and benchmarks. */
  Discard = 'discard',
  /** Logs as JSON lines on stdout, metrics pretty-printed on the console. */
  Local = 'local',
  /** Everything goes to a collector running on the local machine. */
  Debug = 'debug',
  /** Everything goes to the development collector. */
  Development = 'development',
  /** Everything goes to the production collector on the configured port. */
  Production = 'production',
}

/**
 * All modes, in declaration order
 */
export const MODES: readonly Mode[] = Object.values(Mode);

/**
 * One of the three telemetry types handled by the facade
 */
export type Pillar = 'logging' | 'tracing' | 'metrics';

/**
 * String-to-string field mapping attached to telemetry events
 */
export type Fields = Record<string, string>;

/**
 * Logger interface for the library's own diagnostics
 */
export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log warning message */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log error message */
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Identity of the service emitting telemetry
 */
export interface ServiceIdentity {
  /** Service name, reported as `service.name` */
  name: string;
  /** Service version, reported as `service.version` */
  version: string;
}

/**
 * Configuration accepted by the facade
 */
export interface TelemetryConfig {
  // Required fields
  service: ServiceIdentity;
  mode: Mode;

  /** Index the collector files log records under (defaults to the service name) */
  searchIndex?: string;
  /** Interval in ms between batched exports (defaults to 30000) */
  flushIntervalMs?: number;
  /** Timeout in ms for opening and using the transport (defaults to 10000) */
  timeoutMs?: number;
  /** Production collector port (defaults to '80') */
  port?: string;
  /** Fields attached to every log record and metric point */
  defaultFields?: Fields;
  /** Capacity of the log dispatch queue (defaults to 2048) */
  logQueueSize?: number;
  /** Explicit histogram bucket boundaries (SDK defaults when empty) */
  histogramBuckets?: number[];
  /** Hostname already resolved by a previous resolution */
  hostname?: string;
  /** Deployment stack name (read from TELEMETRY_STACK when unset) */
  stack?: string;
  /** Logger instance for the library's own diagnostics */
  logger?: Logger;
}

/**
 * Configuration with every optional field populated
 */
export interface ResolvedConfig {
  readonly service: Readonly<ServiceIdentity>;
  readonly mode: Mode;
  readonly searchIndex: string;
  readonly flushIntervalMs: number;
  readonly timeoutMs: number;
  readonly port: string;
  readonly defaultFields: Readonly<Fields>;
  readonly logQueueSize: number;
  readonly histogramBuckets: readonly number[];
  readonly hostname: string;
  /** Deployment stack name reported on metric points */
  readonly stack: string;
  readonly logger: Logger;
}
