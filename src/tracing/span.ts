/**
 * Span handle wrapping an SDK span.
 */

import type { Attributes, Span as OtelSpan, SpanContext } from '@opentelemetry/api';
import type { Span } from './interface.js';

export class SpanImpl implements Span {
  private readonly otelSpan: OtelSpan;
  private readonly onEnd?: (span: SpanImpl) => void;
  private isEnded = false;

  /**
   * @param onEnd - Called once, on the first `end()`
   */
  constructor(otelSpan: OtelSpan, onEnd?: (span: SpanImpl) => void) {
    this.otelSpan = otelSpan;
    this.onEnd = onEnd;
  }

  get ended(): boolean {
    return this.isEnded;
  }

  spanContext(): SpanContext {
    return this.otelSpan.spanContext();
  }

  addEvent(name: string, attributes?: Attributes): Span {
    if (!this.isEnded) {
      this.otelSpan.addEvent(name, attributes);
    }
    return this;
  }

  setAttributes(attributes: Attributes): Span {
    if (!this.isEnded) {
      this.otelSpan.setAttributes(attributes);
    }
    return this;
  }

  end(endTime?: Date): void {
    if (this.isEnded) {
      return;
    }
    this.isEnded = true;
    this.otelSpan.end(endTime);
    this.onEnd?.(this);
  }
}
