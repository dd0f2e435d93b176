/**
 * Metrics delegate backed by the OpenTelemetry metrics SDK
 */

import type { Counter, Gauge, Histogram, Meter } from '@opentelemetry/api';
import {
  ExplicitBucketHistogramAggregation,
  InstrumentType,
  MeterProvider,
  PeriodicExportingMetricReader,
  View,
  type PushMetricExporter,
} from '@opentelemetry/sdk-metrics';
import type { Fields, ResolvedConfig } from '../types/index.js';
import { MetricRecordError, isTelemetryError, toError } from '../errors/index.js';
import { buildMetricAttributes, buildResource } from '../fields/index.js';
import type { MetricsDelegate } from './interface.js';

export const ATTR_METRIC_CATEGORY = 'metric.category';

const INSTRUMENT_NAME = /^[A-Za-z][A-Za-z0-9_.\-/]{0,254}$/;

/**
 * Check an instrument name against the OpenTelemetry naming rules
 */
export function isValidInstrumentName(name: string): boolean {
  return INSTRUMENT_NAME.test(name);
}

function histogramViews(buckets: readonly number[]): View[] {
  if (buckets.length === 0) {
    return [];
  }
  return [
    new View({
      instrumentType: InstrumentType.HISTOGRAM,
      aggregation: new ExplicitBucketHistogramAggregation([...buckets]),
    }),
  ];
}

export class OtelMetricsDelegate implements MetricsDelegate {
  private readonly config: ResolvedConfig;
  private readonly provider: MeterProvider;
  private readonly meter: Meter;
  private readonly histograms = new Map<string, Histogram>();
  private readonly counters = new Map<string, Counter>();
  private readonly gauges = new Map<string, Gauge>();
  private isShutdown = false;

  constructor(config: ResolvedConfig, exporter: PushMetricExporter | null) {
    this.config = config;
    this.provider = new MeterProvider({
      resource: buildResource(config, { [ATTR_METRIC_CATEGORY]: 'system' }),
      views: histogramViews(config.histogramBuckets),
      readers: exporter
        ? [
            new PeriodicExportingMetricReader({
              exporter,
              exportIntervalMillis: config.flushIntervalMs,
              // The reader rejects a timeout longer than its interval
              exportTimeoutMillis: Math.min(config.timeoutMs, config.flushIntervalMs),
            }),
          ]
        : [],
    });
    this.meter = this.provider.getMeter(config.searchIndex, config.service.version);
  }

  histogram(name: string, value: number, fields?: Fields): void {
    this.record(name, fields, () => {
      if (!Number.isFinite(value)) {
        throw MetricRecordError.invalidValue(name, value, 'a finite number');
      }
      const instrument = this.instrument(this.histograms, name, (n) => this.meter.createHistogram(n));
      return (attributes) => instrument.record(value, attributes);
    });
  }

  counter(name: string, value: number, fields?: Fields): void {
    this.record(name, fields, () => {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw MetricRecordError.invalidValue(name, value, 'a non-negative integer');
      }
      const instrument = this.instrument(this.counters, name, (n) => this.meter.createCounter(n));
      return (attributes) => instrument.add(value, attributes);
    });
  }

  gauge(name: string, value: number, fields?: Fields): void {
    this.record(name, fields, () => {
      if (!Number.isSafeInteger(value)) {
        throw MetricRecordError.invalidValue(name, value, 'an integer');
      }
      const instrument = this.instrument(this.gauges, name, (n) => this.meter.createGauge(n));
      return (attributes) => instrument.record(value, attributes);
    });
  }

  async flush(): Promise<void> {
    if (this.isShutdown) {
      return;
    }
    await this.provider.forceFlush();
  }

  async shutdown(): Promise<void> {
    if (this.isShutdown) {
      return;
    }
    this.isShutdown = true;
    await this.provider.shutdown();
  }

  private instrument<T>(cache: Map<string, T>, name: string, create: (name: string) => T): T {
    const cached = cache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const created = create(name);
    cache.set(name, created);
    return created;
  }

  /**
   * Validate, resolve the instrument and record, wrapping any SDK failure
   */
  private record(
    name: string,
    fields: Fields | undefined,
    prepare: () => (attributes: Fields) => void
  ): void {
    if (this.isShutdown) {
      throw new MetricRecordError(name, 'metrics delegate has been shut down');
    }
    if (!isValidInstrumentName(name)) {
      throw MetricRecordError.invalidName(name);
    }

    try {
      const write = prepare();
      write(buildMetricAttributes(fields, this.config));
    } catch (error) {
      if (isTelemetryError(error)) {
        throw error;
      }
      const cause = toError(error);
      throw new MetricRecordError(name, cause.message, { cause });
    }
  }
}
