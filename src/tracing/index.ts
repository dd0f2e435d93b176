/**
 * Tracing exports
 */

export type { Span, StartSpanOptions, StartedSpan, TracingDelegate } from './interface.js';
export { SpanImpl } from './span.js';
export { OtelTracingDelegate, INSTRUMENTATION_SCOPE } from './delegate.js';
