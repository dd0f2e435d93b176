import { describe, it, expect } from 'vitest';
import type { MetricData } from '@opentelemetry/sdk-metrics';
import { OtelMetricsDelegate, isValidInstrumentName } from '../../src/metrics/index.js';
import { MetricRecordError } from '../../src/errors/index.js';
import { resolveConfig } from '../../src/config/index.js';
import type { TelemetryConfig } from '../../src/types/index.js';
import { createConfigFixture, createInMemoryExporters } from '../../src/testing/index.js';

function createDelegate(overrides?: Partial<TelemetryConfig>) {
  const config = resolveConfig(createConfigFixture(overrides), { env: {} });
  const { metrics: exporter } = createInMemoryExporters();
  const delegate = new OtelMetricsDelegate(config, exporter);

  const collected = (): MetricData[] =>
    exporter
      .getMetrics()
      .flatMap((resourceMetrics) => resourceMetrics.scopeMetrics)
      .flatMap((scopeMetrics) => scopeMetrics.metrics);
  const find = (name: string): MetricData | undefined =>
    collected().find((metric) => metric.descriptor.name === name);

  return { exporter, delegate, find };
}

const baseAttributes = {
  'service.name': 'test-service',
  'service.version': '1.0.0',
  'host.name': 'test-host',
  'deployment.stack': 'test-stack',
};

describe('OtelMetricsDelegate', () => {
  it('adds counter values per attribute set', async () => {
    const { delegate, find } = createDelegate();

    delegate.counter('orders.placed', 2, { channel: 'web' });
    delegate.counter('orders.placed', 3, { channel: 'web' });
    delegate.counter('orders.placed', 1, { channel: 'app' });
    await delegate.flush();

    const points = find('orders.placed')?.dataPoints ?? [];
    expect(points.map((point) => [point.attributes, point.value])).toEqual([
      [{ ...baseAttributes, channel: 'web' }, 5],
      [{ ...baseAttributes, channel: 'app' }, 1],
    ]);
    await delegate.shutdown();
  });

  it('keeps the last gauge value', async () => {
    const { delegate, find } = createDelegate();

    delegate.gauge('queue.depth', 7);
    delegate.gauge('queue.depth', 4);
    await delegate.flush();

    const points = find('queue.depth')?.dataPoints ?? [];
    expect(points).toHaveLength(1);
    expect(points[0]?.value).toBe(4);
    expect(points[0]?.attributes).toEqual(baseAttributes);
    await delegate.shutdown();
  });

  it('aggregates histogram values into the configured buckets', async () => {
    const { delegate, find } = createDelegate({ histogramBuckets: [10, 100] });

    delegate.histogram('request.duration_ms', 5);
    delegate.histogram('request.duration_ms', 50);
    delegate.histogram('request.duration_ms', 500);
    await delegate.flush();

    const points = find('request.duration_ms')?.dataPoints ?? [];
    expect(points[0]?.value).toMatchObject({
      buckets: { boundaries: [10, 100], counts: [1, 1, 1] },
      sum: 555,
      count: 3,
      min: 5,
      max: 500,
    });
    await delegate.shutdown();
  });

  it('merges default fields under call fields', async () => {
    const { delegate, find } = createDelegate({ defaultFields: { region: 'eu-west-1', tier: 'free' } });

    delegate.counter('signups', 1, { tier: 'gold' });
    await delegate.flush();

    expect(find('signups')?.dataPoints[0]?.attributes).toEqual({
      ...baseAttributes,
      region: 'eu-west-1',
      tier: 'gold',
    });
    await delegate.shutdown();
  });

  it('reports the metric category on the resource', async () => {
    const { exporter, delegate } = createDelegate();

    delegate.counter('signups', 1);
    await delegate.flush();

    const [resourceMetrics] = exporter.getMetrics();
    expect(resourceMetrics?.resource.attributes['metric.category']).toBe('system');
    expect(resourceMetrics?.resource.attributes['service.name']).toBe('test-service');
    await delegate.shutdown();
  });

  describe('validation', () => {
    it('rejects an invalid instrument name', () => {
      const { delegate } = createDelegate();

      expect(() => delegate.histogram('1bad', 1)).toThrow(MetricRecordError);
      expect(() => delegate.histogram('1bad', 1)).toThrow(
        "Failed to record metric '1bad': instrument name must start with a letter and contain at most 255 characters from [A-Za-z0-9_.-/]"
      );
    });

    it.each([-1, 1.5, Number.NaN])('rejects counter value %s', (value) => {
      const { delegate } = createDelegate();

      expect(() => delegate.counter('requests', value)).toThrow(
        `Failed to record metric 'requests': expected a non-negative integer, got ${value}`
      );
    });

    it('rejects a fractional gauge value', () => {
      const { delegate } = createDelegate();

      expect(() => delegate.gauge('queue.depth', 2.5)).toThrow(
        "Failed to record metric 'queue.depth': expected an integer, got 2.5"
      );
    });

    it('accepts a negative gauge value', () => {
      const { delegate } = createDelegate();

      expect(() => delegate.gauge('temperature', -3)).not.toThrow();
    });

    it.each([Number.NaN, Number.POSITIVE_INFINITY])('rejects histogram value %s', (value) => {
      const { delegate } = createDelegate();

      expect(() => delegate.histogram('latency', value)).toThrow(
        `Failed to record metric 'latency': expected a finite number, got ${value}`
      );
    });

    it('rejects every call after shutdown', async () => {
      const { delegate } = createDelegate();

      await delegate.shutdown();

      expect(() => delegate.counter('requests', 1)).toThrow(
        "Failed to record metric 'requests': metrics delegate has been shut down"
      );
    });
  });

  it('records without an exporter', async () => {
    const config = resolveConfig(createConfigFixture(), { env: {} });
    const delegate = new OtelMetricsDelegate(config, null);

    expect(() => delegate.counter('requests', 1)).not.toThrow();
    await expect(delegate.flush()).resolves.toBeUndefined();
    await delegate.shutdown();
  });
});

describe('isValidInstrumentName', () => {
  it.each([
    ['requests', true],
    ['http.server.duration', true],
    ['queue/depth-ms_total', true],
    ['a'.repeat(255), true],
    ['a'.repeat(256), false],
    ['', false],
    ['1requests', false],
    ['requests total', false],
  ])('%s -> %s', (name, expected) => {
    expect(isValidInstrumentName(name)).toBe(expected);
  });
});
