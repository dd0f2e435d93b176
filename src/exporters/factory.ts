/**
 * Builds the SDK exporter each pillar binds to for its transport target.
 *
 * A `null` exporter means the pillar discards everything.
 */

import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import type { LogRecordExporter } from '@opentelemetry/sdk-logs';
import { ConsoleMetricExporter, type PushMetricExporter } from '@opentelemetry/sdk-metrics';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import type { Pillar, ResolvedConfig } from '../types/index.js';
import { ExporterInitError, isTelemetryError, toError } from '../errors/index.js';
import { collectorUrl, type TransportTarget } from '../routing/index.js';
import { NoopSpanExporter, StdoutLogRecordExporter } from './stdout.js';

/**
 * Exporters that replace the routed ones for every mode except Discard.
 * Tests pass the SDK's in-memory exporters here.
 */
export interface ExporterOverrides {
  logs?: LogRecordExporter;
  spans?: SpanExporter;
  metrics?: PushMetricExporter;
}

function build<T>(pillar: Pillar, target: TransportTarget, make: () => T): T {
  try {
    return make();
  } catch (error) {
    if (isTelemetryError(error)) {
      throw error;
    }
    const cause = toError(error);
    throw new ExporterInitError(pillar, `${target.kind}: ${cause.message}`, cause);
  }
}

function unsupported(pillar: Pillar, target: TransportTarget): ExporterInitError {
  return new ExporterInitError(pillar, `no exporter for target '${target.kind}'`);
}

export function createLogExporter(
  target: TransportTarget,
  config: ResolvedConfig,
  override?: LogRecordExporter
): LogRecordExporter | null {
  if (target.kind === 'discard') {
    return null;
  }
  if (override) {
    return override;
  }

  return build('logging', target, () => {
    switch (target.kind) {
      case 'stdout':
        return new StdoutLogRecordExporter();
      case 'collector':
        return new OTLPLogExporter({
          url: collectorUrl(target.endpoint),
          timeoutMillis: config.timeoutMs,
        });
      default:
        throw unsupported('logging', target);
    }
  });
}

export function createSpanExporter(
  target: TransportTarget,
  config: ResolvedConfig,
  override?: SpanExporter
): SpanExporter | null {
  if (target.kind === 'discard') {
    return null;
  }
  if (override) {
    return override;
  }

  return build('tracing', target, () => {
    switch (target.kind) {
      case 'noop-exporter':
        return new NoopSpanExporter();
      case 'collector':
        return new OTLPTraceExporter({
          url: collectorUrl(target.endpoint),
          timeoutMillis: config.timeoutMs,
        });
      default:
        throw unsupported('tracing', target);
    }
  });
}

export function createMetricExporter(
  target: TransportTarget,
  config: ResolvedConfig,
  override?: PushMetricExporter
): PushMetricExporter | null {
  if (target.kind === 'discard') {
    return null;
  }
  if (override) {
    return override;
  }

  return build('metrics', target, () => {
    switch (target.kind) {
      case 'console':
        return new ConsoleMetricExporter();
      case 'collector':
        return new OTLPMetricExporter({
          url: collectorUrl(target.endpoint),
          timeoutMillis: config.timeoutMs,
        });
      default:
        throw unsupported('metrics', target);
    }
  });
}
