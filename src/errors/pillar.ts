/**
 * Errors raised by the pillar delegates and their exporters.
 */

import { TelemetryError } from './base.js';
import type { Pillar } from '../types/index.js';

/**
 * Error thrown when the SDK cannot build an exporter or provider for the
 * resolved transport target
 */
export class ExporterInitError extends TelemetryError {
  public readonly pillar: Pillar;

  constructor(pillar: Pillar, message: string, cause?: Error) {
    super({
      category: 'exporter',
      message: `Failed to initialize ${pillar} exporter: ${message}`,
      details: { pillar },
      cause,
    });
    this.name = 'ExporterInitError';
    this.pillar = pillar;
  }
}

/**
 * Error thrown when an instrument cannot be registered or a measurement
 * cannot be recorded
 */
export class MetricRecordError extends TelemetryError {
  public readonly metricName: string;

  constructor(
    metricName: string,
    reason: string,
    options?: { details?: Record<string, unknown>; cause?: Error }
  ) {
    super({
      category: 'metric',
      message: `Failed to record metric '${metricName}': ${reason}`,
      details: { metricName, reason, ...options?.details },
      cause: options?.cause,
    });
    this.name = 'MetricRecordError';
    this.metricName = metricName;
  }

  /**
   * Create a MetricRecordError for an empty or malformed instrument name
   */
  static invalidName(metricName: string): MetricRecordError {
    return new MetricRecordError(
      metricName,
      'instrument name must start with a letter and contain at most 255 characters from [A-Za-z0-9_.-/]'
    );
  }

  /**
   * Create a MetricRecordError for a value the instrument cannot take
   */
  static invalidValue(metricName: string, value: number, expected: string): MetricRecordError {
    return new MetricRecordError(metricName, `expected ${expected}, got ${value}`, {
      details: { value },
    });
  }
}

/**
 * Error thrown when a delegate fails to flush or close during shutdown
 */
export class ShutdownError extends TelemetryError {
  public readonly pillar: Pillar;

  constructor(pillar: Pillar, cause: Error) {
    super({
      category: 'shutdown',
      message: `Failed to shut down ${pillar} delegate: ${cause.message}`,
      details: { pillar },
      cause,
    });
    this.name = 'ShutdownError';
    this.pillar = pillar;
  }
}
