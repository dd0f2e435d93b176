/**
 * Test fixtures for the telemetry client
 *
 * @module testing/fixtures
 */

import { InMemoryLogRecordExporter } from '@opentelemetry/sdk-logs';
import { AggregationTemporality, InMemoryMetricExporter } from '@opentelemetry/sdk-metrics';
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { Mode, type TelemetryConfig } from '../types/index.js';

/**
 * In-memory exporters for every pillar
 */
export interface InMemoryExporters {
  logs: InMemoryLogRecordExporter;
  spans: InMemorySpanExporter;
  metrics: InMemoryMetricExporter;
}

/**
 * Create in-memory exporters, ready to pass as `exporters` to `createTelemetry`
 */
export function createInMemoryExporters(): InMemoryExporters {
  return {
    logs: new InMemoryLogRecordExporter(),
    spans: new InMemorySpanExporter(),
    metrics: new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE),
  };
}

/**
 * Create a test configuration fixture
 */
export function createConfigFixture(overrides?: Partial<TelemetryConfig>): TelemetryConfig {
  return {
    service: { name: 'test-service', version: '1.0.0' },
    mode: Mode.Local,
    hostname: 'test-host',
    stack: 'test-stack',
    ...overrides,
  };
}
