/**
 * Tracing capability and span handle.
 */

import type { Attributes, Context, SpanContext, SpanKind } from '@opentelemetry/api';

/**
 * Options for starting a span
 */
export interface StartSpanOptions {
  /** Span kind (defaults to internal) */
  kind?: SpanKind;
  /** Attributes set when the span starts */
  attributes?: Attributes;
  /** Start time (defaults to now) */
  startTime?: Date;
}

/**
 * Span represents a single unit of work in a trace.
 *
 * The handle is only ended through `end()`, which may be called any number
 * of times; only the first call ends the underlying span.
 */
export interface Span {
  /**
   * Whether `end()` has been called
   */
  readonly ended: boolean;

  /**
   * Trace and span identifiers of the underlying span
   */
  spanContext(): SpanContext;

  /**
   * Add a timestamped event
   */
  addEvent(name: string, attributes?: Attributes): Span;

  /**
   * Set attributes, overwriting existing keys
   */
  setAttributes(attributes: Attributes): Span;

  /**
   * End the span
   *
   * @param endTime - End time (defaults to now)
   */
  end(endTime?: Date): void;
}

/**
 * A started span together with the context that carries it
 */
export interface StartedSpan {
  context: Context;
  span: Span;
}

/**
 * Tracing capability.
 *
 * Every operation takes its context explicitly; nothing is read from or
 * written to a process-wide active context.
 */
export interface TracingDelegate {
  /**
   * Start a span as a child of the span carried by `ctx`, if any
   */
  startSpan(ctx: Context, name: string, options?: StartSpanOptions): StartedSpan;

  /**
   * Add an event to the span carried by `ctx`; a context without a span is ignored
   */
  addEvent(ctx: Context, name: string, attributes?: Attributes): void;

  /**
   * Set attributes on the span carried by `ctx`; a context without a span is ignored
   */
  setAttributes(ctx: Context, attributes: Attributes): void;

  /** Export every ended span */
  flush(): Promise<void>;

  /** Export ended spans and close the exporter */
  shutdown(): Promise<void>;
}
