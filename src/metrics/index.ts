/**
 * Metrics exports
 */

export type { MetricsDelegate } from './interface.js';
export { OtelMetricsDelegate, isValidInstrumentName, ATTR_METRIC_CATEGORY } from './delegate.js';
