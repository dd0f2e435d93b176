import { describe, it, expect, vi } from 'vitest';
import { SeverityNumber } from '@opentelemetry/api-logs';
import { InMemoryLogRecordExporter } from '@opentelemetry/sdk-logs';
import { DispatchQueue, OtelLoggingDelegate } from '../../src/logging/index.js';
import { resolveConfig } from '../../src/config/index.js';
import { targetFor } from '../../src/routing/index.js';
import { stackDigest } from '../../src/fields/index.js';
import { Mode, type TelemetryConfig } from '../../src/types/index.js';
import { RecordingLogger, createConfigFixture } from '../../src/testing/index.js';

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function createDelegate(overrides?: Partial<TelemetryConfig>) {
  const config = resolveConfig(createConfigFixture(overrides), { env: {} });
  const exporter = new InMemoryLogRecordExporter();
  const delegate = new OtelLoggingDelegate(config, targetFor('logging', config.mode), exporter);
  return { config, exporter, delegate };
}

describe('DispatchQueue', () => {
  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new DispatchQueue(0, () => {})).toThrow(
      'Queue capacity must be a positive integer, got 0'
    );
  });

  it('hands queued items to the consumer in order on drain', () => {
    const consumed: number[] = [];
    const queue = new DispatchQueue<number>(4, (item) => consumed.push(item));

    queue.offer(1);
    queue.offer(2);
    queue.offer(3);
    expect(consumed).toEqual([]);
    expect(queue.size).toBe(3);

    queue.drain();

    expect(consumed).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
  });

  it('drains in the background on the next tick', async () => {
    const consumed: string[] = [];
    const queue = new DispatchQueue<string>(4, (item) => consumed.push(item));

    queue.offer('a');
    await nextTick();

    expect(consumed).toEqual(['a']);
  });

  it('drops the newest item when full and reports the count', () => {
    const consumed: number[] = [];
    const onDrop = vi.fn();
    const queue = new DispatchQueue<number>(2, (item) => consumed.push(item), { onDrop });

    expect(queue.offer(1)).toBe(true);
    expect(queue.offer(2)).toBe(true);
    expect(queue.offer(3)).toBe(false);
    expect(queue.offer(4)).toBe(false);

    queue.drain();

    expect(consumed).toEqual([1, 2]);
    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop).toHaveBeenCalledWith(2);
  });

  it('keeps consuming after the consumer throws', () => {
    const consumed: number[] = [];
    const onError = vi.fn();
    const queue = new DispatchQueue<number>(
      4,
      (item) => {
        if (item === 1) {
          throw new Error('sink unavailable');
        }
        consumed.push(item);
      },
      { onError }
    );

    queue.offer(1);
    queue.offer(2);
    queue.drain();

    expect(consumed).toEqual([2]);
    expect(onError).toHaveBeenCalledWith(new Error('sink unavailable'));
  });

  it('drains on close and rejects later items', () => {
    const consumed: number[] = [];
    const queue = new DispatchQueue<number>(4, (item) => consumed.push(item));

    queue.offer(1);
    queue.close();

    expect(consumed).toEqual([1]);
    expect(queue.isClosed).toBe(true);
    expect(queue.offer(2)).toBe(false);
    expect(queue.size).toBe(0);
  });
});

describe('OtelLoggingDelegate', () => {
  it('returns before the record reaches the exporter', async () => {
    const { exporter, delegate } = createDelegate();

    delegate.info({ component: 'cart', operation: 'load', message: 'cart loaded' });

    expect(exporter.getFinishedLogRecords()).toHaveLength(0);
    expect(delegate.pendingCount()).toBe(1);

    await nextTick();

    expect(exporter.getFinishedLogRecords()).toHaveLength(1);
    expect(delegate.pendingCount()).toBe(0);
    await delegate.shutdown();
  });

  it('emits the record with its severity, body and attributes', async () => {
    const { exporter, delegate } = createDelegate({ defaultFields: { region: 'eu-west-1' } });

    delegate.info({
      component: 'cart',
      operation: 'load',
      message: 'cart loaded',
      fields: { items: '3' },
    });
    await delegate.flush();

    const [record] = exporter.getFinishedLogRecords();
    expect(record?.severityNumber).toBe(SeverityNumber.INFO);
    expect(record?.severityText).toBe('INFO');
    expect(record?.body).toBe('cart loaded');
    expect(record?.attributes).toEqual({
      'service.name': 'test-service',
      'service.version': '1.0.0',
      'host.name': 'test-host',
      component: 'cart',
      operation: 'load',
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
      region: 'eu-west-1',
      items: '3',
    });
    await delegate.shutdown();
  });

  it('files records under the search index', async () => {
    const { exporter, delegate } = createDelegate({ searchIndex: 'shop-logs' });

    delegate.info({ component: 'cart', operation: 'load', message: 'cart loaded' });
    await delegate.flush();

    expect(exporter.getFinishedLogRecords()[0]?.instrumentationScope.name).toBe('shop-logs');
    await delegate.shutdown();
  });

  it('maps every level to its severity', async () => {
    const { exporter, delegate } = createDelegate();
    const entry = { component: 'c', operation: 'o', message: 'm' };

    delegate.debug(entry);
    delegate.info(entry);
    delegate.warn(entry);
    delegate.error(entry);
    delegate.fatal(entry);
    await delegate.flush();

    expect(exporter.getFinishedLogRecords().map((record) => record.severityText)).toEqual([
      'DEBUG',
      'INFO',
      'WARN',
      'ERROR',
      'FATAL',
    ]);
    expect(exporter.getFinishedLogRecords().map((record) => record.severityNumber)).toEqual([
      SeverityNumber.DEBUG,
      SeverityNumber.INFO,
      SeverityNumber.WARN,
      SeverityNumber.ERROR,
      SeverityNumber.FATAL,
    ]);
    await delegate.shutdown();
  });

  it('attaches a stack digest to warn, error and fatal records only', async () => {
    const { exporter, delegate } = createDelegate();
    const entry = { component: 'c', operation: 'o', message: 'm', error: new Error('boom') };

    delegate.debug(entry);
    delegate.info(entry);
    delegate.warn(entry);
    delegate.error(entry);
    delegate.fatal(entry);
    await delegate.flush();

    const records = exporter.getFinishedLogRecords();
    const hashes = records.map((record) => record.attributes['stacktrace.hash']);
    expect(hashes[0]).toBeUndefined();
    expect(hashes[1]).toBeUndefined();
    for (const record of records.slice(2)) {
      const stacktrace = record.attributes.stacktrace;
      expect(typeof stacktrace).toBe('string');
      expect(record.attributes['stacktrace.hash']).toBe(stackDigest(String(stacktrace)));
      expect(String(stacktrace).split('\n')[0]).toContain('logging.test.ts');
    }
    await delegate.shutdown();
  });

  it('keeps a stack captured by the caller', async () => {
    const { exporter, delegate } = createDelegate();

    delegate.error({ component: 'c', operation: 'o', message: 'm', stacktrace: 'at caller' });
    await delegate.flush();

    const [record] = exporter.getFinishedLogRecords();
    expect(record?.attributes.stacktrace).toBe('at caller');
    expect(record?.attributes['stacktrace.hash']).toBe(stackDigest('at caller'));
    await delegate.shutdown();
  });

  it('drops debug records in production mode', async () => {
    const { exporter, delegate } = createDelegate({ mode: Mode.Production });

    delegate.debug({ component: 'c', operation: 'o', message: 'hidden' });
    delegate.info({ component: 'c', operation: 'o', message: 'shown' });
    await delegate.flush();

    expect(exporter.getFinishedLogRecords().map((record) => record.body)).toEqual(['shown']);
    await delegate.shutdown();
  });

  it('keeps debug records outside production mode', async () => {
    const { exporter, delegate } = createDelegate({ mode: Mode.Development });

    delegate.debug({ component: 'c', operation: 'o', message: 'shown' });
    await delegate.flush();

    expect(exporter.getFinishedLogRecords().map((record) => record.body)).toEqual(['shown']);
    await delegate.shutdown();
  });

  it('reports records dropped by a full queue', async () => {
    const logger = new RecordingLogger();
    const { exporter, delegate } = createDelegate({ logQueueSize: 2, logger });

    for (let i = 0; i < 5; i++) {
      delegate.info({ component: 'c', operation: 'o', message: `record ${i}` });
    }
    await delegate.flush();

    expect(exporter.getFinishedLogRecords().map((record) => record.body)).toEqual([
      'record 0',
      'record 1',
    ]);
    expect(logger.at('warn')).toEqual([
      {
        level: 'warn',
        message: 'Log queue full, records dropped',
        context: { dropped: 3, capacity: 2 },
      },
    ]);
    await delegate.shutdown();
  });

  it('ignores records after shutdown', async () => {
    const { delegate } = createDelegate();

    await delegate.shutdown();
    delegate.info({ component: 'c', operation: 'o', message: 'late' });

    expect(delegate.pendingCount()).toBe(0);
  });
});
