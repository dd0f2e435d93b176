import { describe, it, expect } from 'vitest';
import { ROOT_CONTEXT, SpanKind, trace } from '@opentelemetry/api';
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { OtelTracingDelegate, SpanImpl } from '../../src/tracing/index.js';
import { resolveConfig } from '../../src/config/index.js';
import { createConfigFixture } from '../../src/testing/index.js';

function createDelegate() {
  const config = resolveConfig(createConfigFixture(), { env: {} });
  const exporter = new InMemorySpanExporter();
  const delegate = new OtelTracingDelegate(config, exporter);
  return { exporter, delegate };
}

describe('OtelTracingDelegate', () => {
  it('exports an ended span with its attributes and events', async () => {
    const { exporter, delegate } = createDelegate();

    const { context, span } = delegate.startSpan(ROOT_CONTEXT, 'checkout', {
      kind: SpanKind.SERVER,
      attributes: { 'cart.items': 3 },
    });
    delegate.addEvent(context, 'payment.authorized', { provider: 'test-provider' });
    delegate.setAttributes(context, { 'order.id': 'order-1' });
    span.end();
    await delegate.flush();

    const [exported] = exporter.getFinishedSpans();
    expect(exported?.name).toBe('checkout');
    expect(exported?.kind).toBe(SpanKind.SERVER);
    expect(exported?.attributes).toEqual({ 'cart.items': 3, 'order.id': 'order-1' });
    expect(exported?.events.map((event) => event.name)).toEqual(['payment.authorized']);
    expect(exported?.events[0]?.attributes).toEqual({ provider: 'test-provider' });
    expect(exported?.resource.attributes['service.name']).toBe('test-service');
    await delegate.shutdown();
  });

  it('returns a context that carries the new span', () => {
    const { delegate } = createDelegate();

    const { context, span } = delegate.startSpan(ROOT_CONTEXT, 'checkout');

    expect(trace.getSpan(context)?.spanContext()).toEqual(span.spanContext());
    expect(trace.getSpan(ROOT_CONTEXT)).toBeUndefined();
    span.end();
  });

  it('parents a span started from the returned context', async () => {
    const { exporter, delegate } = createDelegate();

    const parent = delegate.startSpan(ROOT_CONTEXT, 'parent');
    const child = delegate.startSpan(parent.context, 'child');
    child.span.end();
    parent.span.end();
    await delegate.flush();

    const spans = exporter.getFinishedSpans();
    const exportedChild = spans.find((span) => span.name === 'child');
    expect(exportedChild?.parentSpanId).toBe(parent.span.spanContext().spanId);
    expect(child.span.spanContext().traceId).toBe(parent.span.spanContext().traceId);
    await delegate.shutdown();
  });

  it('exports a span ended twice only once', async () => {
    const { exporter, delegate } = createDelegate();

    const { span } = delegate.startSpan(ROOT_CONTEXT, 'checkout');
    span.end();
    expect(() => span.end()).not.toThrow();
    await delegate.flush();

    expect(exporter.getFinishedSpans()).toHaveLength(1);
    expect(span.ended).toBe(true);
    await delegate.shutdown();
  });

  it('tracks open spans', () => {
    const { delegate } = createDelegate();

    const first = delegate.startSpan(ROOT_CONTEXT, 'first');
    const second = delegate.startSpan(ROOT_CONTEXT, 'second');
    expect(delegate.openSpanCount()).toBe(2);

    first.span.end();
    first.span.end();
    expect(delegate.openSpanCount()).toBe(1);

    second.span.end();
    expect(delegate.openSpanCount()).toBe(0);
  });

  it('ignores events and attributes for a context without a span', () => {
    const { delegate } = createDelegate();

    expect(() => delegate.addEvent(ROOT_CONTEXT, 'orphan')).not.toThrow();
    expect(() => delegate.setAttributes(ROOT_CONTEXT, { orphan: true })).not.toThrow();
  });

  it('starts and ends spans when there is no exporter', () => {
    const config = resolveConfig(createConfigFixture(), { env: {} });
    const delegate = new OtelTracingDelegate(config, null);

    const { span } = delegate.startSpan(ROOT_CONTEXT, 'discarded');

    expect(span.spanContext().traceId).toMatch(/^[0-9a-f]{32}$/);
    span.end();
    expect(delegate.openSpanCount()).toBe(0);
  });
});

describe('SpanImpl', () => {
  it('stops forwarding once ended', async () => {
    const { exporter, delegate } = createDelegate();

    const { span } = delegate.startSpan(ROOT_CONTEXT, 'checkout');
    span.addEvent('before');
    span.end();
    span.addEvent('after');
    span.setAttributes({ late: true });
    await delegate.flush();

    const [exported] = exporter.getFinishedSpans();
    expect(exported?.events.map((event) => event.name)).toEqual(['before']);
    expect(exported?.attributes).toEqual({});
    await delegate.shutdown();
  });

  it('calls the end hook once', () => {
    const otelSpan = trace.wrapSpanContext({
      traceId: '0af7651916cd43dd8448eb211c80319c',
      spanId: 'b7ad6b7169203331',
      traceFlags: 1,
    });
    let ends = 0;
    const span = new SpanImpl(otelSpan, () => {
      ends++;
    });

    span.end();
    span.end();

    expect(ends).toBe(1);
    expect(span.spanContext().spanId).toBe('b7ad6b7169203331');
  });
});
