/**
 * Metrics capability
 */

import type { Fields } from '../types/index.js';

/**
 * Records measurements on instruments registered by name. The first call for
 * a name registers the instrument; later calls reuse it.
 *
 * Every method throws a `MetricRecordError` when the measurement cannot be
 * recorded.
 */
export interface MetricsDelegate {
  /**
   * Record a value in a histogram
   */
  histogram(name: string, value: number, fields?: Fields): void;

  /**
   * Add a non-negative integer to a monotonic counter
   */
  counter(name: string, value: number, fields?: Fields): void;

  /**
   * Record the current integer value of a gauge
   */
  gauge(name: string, value: number, fields?: Fields): void;

  /**
   * Collect and export every instrument now
   */
  flush(): Promise<void>;

  /**
   * Export a final collection and close the exporter
   */
  shutdown(): Promise<void>;
}
