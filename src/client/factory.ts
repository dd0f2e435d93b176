/**
 * Factory for telemetry clients.
 *
 * Each call resolves the configuration, routes every pillar for the mode and
 * builds a client that owns its own providers. Several clients can live in
 * one process.
 */

import type { TelemetryClient } from './interface.js';
import { TelemetryClientImpl, type TelemetryDelegates } from './client.js';
import type { TelemetryConfig } from '../types/index.js';
import { configFromEnvironment, resolveConfig, type ResolveOptions } from '../config/index.js';
import { targetFor } from '../routing/index.js';
import {
  createLogExporter,
  createMetricExporter,
  createSpanExporter,
  type ExporterOverrides,
} from '../exporters/index.js';
import { OtelLoggingDelegate } from '../logging/index.js';
import { OtelTracingDelegate } from '../tracing/index.js';
import { OtelMetricsDelegate } from '../metrics/index.js';

/**
 * Options for creating a client
 */
export interface CreateTelemetryOptions extends ResolveOptions {
  /** Exporters used in place of the routed ones (ignored in discard mode) */
  exporters?: ExporterOverrides;
  /** Capabilities used in place of the SDK-backed delegates */
  delegates?: Partial<TelemetryDelegates>;
}

/**
 * Create a telemetry client
 *
 * @throws InvalidConfigurationError if a required field is missing or a setting is malformed
 * @throws InvalidModeError if the mode is unknown
 * @throws HostnameResolutionError if the hostname cannot be resolved
 * @throws ExporterInitError if an exporter cannot be built
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetry({
 *   service: { name: 'checkout', version: '1.4.0' },
 *   mode: Mode.Local,
 * });
 *
 * telemetry.info('cart', 'load', 'cart loaded', { items: '3' });
 * telemetry.counter('cart.loads', 1);
 * await telemetry.shutdown();
 * ```
 */
export function createTelemetry(
  config: TelemetryConfig,
  options: CreateTelemetryOptions = {}
): TelemetryClient {
  return buildClient(config, options);
}

/**
 * Create a telemetry client from environment variables, with explicit
 * settings taking precedence
 *
 * @see configFromEnvironment for the variables read
 */
export function createTelemetryFromEnvironment(
  overrides: Partial<TelemetryConfig> = {},
  options: CreateTelemetryOptions = {}
): TelemetryClient {
  const fromEnv = configFromEnvironment(options.env ?? process.env);
  return buildClient(
    {
      ...fromEnv,
      ...overrides,
      service: { ...fromEnv.service, ...overrides.service },
    },
    options
  );
}

function buildClient(input: unknown, options: CreateTelemetryOptions): TelemetryClient {
  const config = resolveConfig(input, options);
  const injected = options.delegates ?? {};
  const overrides = options.exporters ?? {};

  const targets = {
    logging: targetFor('logging', config.mode, config.port),
    tracing: targetFor('tracing', config.mode, config.port),
    metrics: targetFor('metrics', config.mode, config.port),
  };

  // Every exporter is built before any provider starts its timers
  const logExporter = injected.logging
    ? null
    : createLogExporter(targets.logging, config, overrides.logs);
  const spanExporter = injected.tracing
    ? null
    : createSpanExporter(targets.tracing, config, overrides.spans);
  const metricExporter = injected.metrics
    ? null
    : createMetricExporter(targets.metrics, config, overrides.metrics);

  const delegates: TelemetryDelegates = {
    logging: injected.logging ?? new OtelLoggingDelegate(config, targets.logging, logExporter),
    tracing: injected.tracing ?? new OtelTracingDelegate(config, spanExporter),
    metrics: injected.metrics ?? new OtelMetricsDelegate(config, metricExporter),
  };

  config.logger.debug('Telemetry client created', {
    service: config.service.name,
    mode: config.mode,
    logging: targets.logging.kind,
    tracing: targets.tracing.kind,
    metrics: targets.metrics.kind,
  });

  return new TelemetryClientImpl(config, delegates);
}
