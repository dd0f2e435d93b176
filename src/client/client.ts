/**
 * Telemetry client implementation.
 *
 * Owns one delegate per pillar and routes every call to it. The delegates are
 * handed in by the factory; nothing is registered process-wide.
 */

import {
  INVALID_SPAN_CONTEXT,
  trace,
  type Attributes,
  type Context,
} from '@opentelemetry/api';
import type { TelemetryClient } from './interface.js';
import type { Fields, Logger, Pillar, ResolvedConfig } from '../types/index.js';
import { captureStack, type LogEntry } from '../fields/index.js';
import type { LoggingDelegate } from '../logging/index.js';
import type { MetricsDelegate } from '../metrics/index.js';
import { SpanImpl, type StartSpanOptions, type StartedSpan, type TracingDelegate } from '../tracing/index.js';
import { MetricRecordError, ShutdownError, toError } from '../errors/index.js';

/**
 * The three capabilities a client is assembled from
 */
export interface TelemetryDelegates {
  logging: LoggingDelegate;
  tracing: TracingDelegate;
  metrics: MetricsDelegate;
}

type Severity = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class TelemetryClientImpl implements TelemetryClient {
  readonly config: ResolvedConfig;
  private readonly delegates: TelemetryDelegates;
  private readonly logger: Logger;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: ResolvedConfig, delegates: TelemetryDelegates) {
    this.config = config;
    this.delegates = delegates;
    this.logger = config.logger;
  }

  debug(component: string, operation: string, message: string, fields?: Fields): void {
    this.log('debug', { component, operation, message, fields });
  }

  info(component: string, operation: string, message: string, fields?: Fields): void {
    this.log('info', { component, operation, message, fields });
  }

  warn(component: string, operation: string, message: string, error: unknown, fields?: Fields): void {
    this.log('warn', {
      component,
      operation,
      message,
      error,
      fields,
      stacktrace: captureStack(this.warn),
    });
  }

  error(component: string, operation: string, message: string, error: unknown, fields?: Fields): void {
    this.log('error', {
      component,
      operation,
      message,
      error,
      fields,
      stacktrace: captureStack(this.error),
    });
  }

  fatal(component: string, operation: string, message: string, error: unknown, fields?: Fields): void {
    this.log('fatal', {
      component,
      operation,
      message,
      error,
      fields,
      stacktrace: captureStack(this.fatal),
    });
  }

  startSpan(ctx: Context, name: string, options?: StartSpanOptions): StartedSpan {
    try {
      return this.delegates.tracing.startSpan(ctx, name, options);
    } catch (error) {
      this.logger.error('Failed to start span', { span: name, error: toError(error).message });
      const span = trace.wrapSpanContext(INVALID_SPAN_CONTEXT);
      return { context: trace.setSpan(ctx, span), span: new SpanImpl(span) };
    }
  }

  addEvent(ctx: Context, name: string, attributes?: Attributes): void {
    try {
      this.delegates.tracing.addEvent(ctx, name, attributes);
    } catch (error) {
      this.logger.error('Failed to add span event', { event: name, error: toError(error).message });
    }
  }

  setAttributes(ctx: Context, attributes: Attributes): void {
    try {
      this.delegates.tracing.setAttributes(ctx, attributes);
    } catch (error) {
      this.logger.error('Failed to set span attributes', { error: toError(error).message });
    }
  }

  histogram(name: string, value: number, fields?: Fields): void {
    this.ensureNotShutdown(name);
    this.delegates.metrics.histogram(name, value, fields);
  }

  counter(name: string, value: number, fields?: Fields): void {
    this.ensureNotShutdown(name);
    this.delegates.metrics.counter(name, value, fields);
  }

  gauge(name: string, value: number, fields?: Fields): void {
    this.ensureNotShutdown(name);
    this.delegates.metrics.gauge(name, value, fields);
  }

  async flush(): Promise<void> {
    if (this.shutdownPromise) {
      return;
    }

    await this.delegates.logging.flush();
    await this.delegates.tracing.flush();
    await this.delegates.metrics.flush();
  }

  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.closeDelegates();
    }
    return this.shutdownPromise;
  }

  private async closeDelegates(): Promise<void> {
    this.logger.info('Shutting down telemetry client', { service: this.config.service.name });

    await this.close('logging', this.delegates.logging);
    await this.close('tracing', this.delegates.tracing);
    await this.close('metrics', this.delegates.metrics);

    this.logger.info('Telemetry client shut down successfully');
  }

  private async close(pillar: Pillar, delegate: { shutdown(): Promise<void> }): Promise<void> {
    try {
      await delegate.shutdown();
    } catch (error) {
      const shutdownError = new ShutdownError(pillar, toError(error));
      this.logger.error('Error shutting down delegate', { pillar, error: shutdownError.message });
      throw shutdownError;
    }
  }

  /**
   * Metric calls after `shutdown()` fail even when a delegate was left open
   */
  private ensureNotShutdown(metricName: string): void {
    if (this.shutdownPromise) {
      throw new MetricRecordError(metricName, 'client has been shut down');
    }
  }

  private log(severity: Severity, entry: LogEntry): void {
    try {
      this.delegates.logging[severity](entry);
    } catch (error) {
      this.logger.error('Failed to submit log record', {
        severity,
        component: entry.component,
        error: toError(error).message,
      });
    }
  }
}
