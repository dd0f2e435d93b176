/**
 * Tracing delegate backed by the OpenTelemetry trace SDK
 */

import { trace, type Attributes, type Context, type Tracer } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import type { ResolvedConfig } from '../types/index.js';
import { buildResource } from '../fields/index.js';
import type { StartSpanOptions, StartedSpan, TracingDelegate } from './interface.js';
import { SpanImpl } from './span.js';

export const INSTRUMENTATION_SCOPE = 'unified-telemetry';

export class OtelTracingDelegate implements TracingDelegate {
  private readonly provider: BasicTracerProvider;
  private readonly tracer: Tracer;
  private readonly openSpans = new Set<SpanImpl>();

  constructor(config: ResolvedConfig, exporter: SpanExporter | null) {
    this.provider = new BasicTracerProvider({ resource: buildResource(config) });

    if (exporter) {
      this.provider.addSpanProcessor(
        new BatchSpanProcessor(exporter, {
          scheduledDelayMillis: config.flushIntervalMs,
          exportTimeoutMillis: config.timeoutMs,
        })
      );
    }

    this.tracer = this.provider.getTracer(INSTRUMENTATION_SCOPE, config.service.version);
  }

  startSpan(ctx: Context, name: string, options: StartSpanOptions = {}): StartedSpan {
    const otelSpan = this.tracer.startSpan(
      name,
      {
        kind: options.kind,
        attributes: options.attributes,
        startTime: options.startTime,
      },
      ctx
    );

    const span = new SpanImpl(otelSpan, (ended) => {
      this.openSpans.delete(ended);
    });
    this.openSpans.add(span);

    return { context: trace.setSpan(ctx, otelSpan), span };
  }

  addEvent(ctx: Context, name: string, attributes?: Attributes): void {
    trace.getSpan(ctx)?.addEvent(name, attributes);
  }

  setAttributes(ctx: Context, attributes: Attributes): void {
    trace.getSpan(ctx)?.setAttributes(attributes);
  }

  /** Number of spans started through this delegate and not yet ended */
  openSpanCount(): number {
    return this.openSpans.size;
  }

  async flush(): Promise<void> {
    await this.provider.forceFlush();
  }

  async shutdown(): Promise<void> {
    await this.provider.shutdown();
  }
}
