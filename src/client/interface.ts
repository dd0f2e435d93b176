/**
 * TelemetryClient interface - the single entry point for logs, traces and
 * metrics.
 */

import type { Attributes, Context } from '@opentelemetry/api';
import type { Fields, ResolvedConfig } from '../types/index.js';
import type { StartSpanOptions, StartedSpan } from '../tracing/index.js';

/**
 * Telemetry client.
 *
 * Logging and tracing calls never throw. Metric calls throw a
 * `MetricRecordError` when the measurement cannot be recorded.
 */
export interface TelemetryClient {
  /**
   * The configuration the client was built from, with every default filled in
   */
  readonly config: ResolvedConfig;

  // ==================== Logging ====================

  /**
   * Log a debug record. Dropped in production mode.
   */
  debug(component: string, operation: string, message: string, fields?: Fields): void;

  /**
   * Log an info record
   */
  info(component: string, operation: string, message: string, fields?: Fields): void;

  /**
   * Log a warning with the error that caused it and the call-site stack
   */
  warn(component: string, operation: string, message: string, error: unknown, fields?: Fields): void;

  /**
   * Log an error with the call-site stack
   */
  error(component: string, operation: string, message: string, error: unknown, fields?: Fields): void;

  /**
   * Log a fatal record with the call-site stack. The process keeps running;
   * exiting is left to the caller.
   */
  fatal(component: string, operation: string, message: string, error: unknown, fields?: Fields): void;

  // ==================== Tracing ====================

  /**
   * Start a span as a child of the span carried by `ctx`
   *
   * @example
   * ```typescript
   * const { context, span } = client.startSpan(ROOT_CONTEXT, 'checkout');
   * client.addEvent(context, 'cart.loaded', { items: 3 });
   * span.end();
   * ```
   */
  startSpan(ctx: Context, name: string, options?: StartSpanOptions): StartedSpan;

  /**
   * Add an event to the span carried by `ctx`
   */
  addEvent(ctx: Context, name: string, attributes?: Attributes): void;

  /**
   * Set attributes on the span carried by `ctx`
   */
  setAttributes(ctx: Context, attributes: Attributes): void;

  // ==================== Metrics ====================

  /**
   * Record a value in a histogram
   */
  histogram(name: string, value: number, fields?: Fields): void;

  /**
   * Add a non-negative integer to a counter
   */
  counter(name: string, value: number, fields?: Fields): void;

  /**
   * Record the current value of a gauge
   */
  gauge(name: string, value: number, fields?: Fields): void;

  // ==================== Lifecycle ====================

  /**
   * Drain queued log records and export everything pending
   */
  flush(): Promise<void>;

  /**
   * Shut down logging, tracing and metrics, in that order.
   *
   * Stops at the first delegate that fails and rejects with a
   * `ShutdownError` naming it. Later calls return the same promise.
   */
  shutdown(): Promise<void>;
}
