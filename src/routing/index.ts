/**
 * Mode routing
 *
 * Decides, for a deployment mode, which transport each pillar binds to. The
 * table is fixed; only the production collector takes the configured port.
 */

import { Mode } from '../types/index.js';
import type { Pillar } from '../types/index.js';
import { UnreachableModeError } from '../errors/index.js';
import { DEFAULT_PORT } from '../config/defaults.js';

/** Collector running next to the process, OTLP/gRPC port */
export const DEBUG_COLLECTOR_ENDPOINT = 'localhost:4317';

/** Development collector */
export const DEVELOPMENT_COLLECTOR_ENDPOINT = 'otel-collector.dev.internal:4317';

/** Production collector host; the port comes from the configuration */
export const PRODUCTION_COLLECTOR_HOST = 'otel-collector.internal';

export type CollectorKind = 'debug' | 'development' | 'production';

/**
 * Where a pillar sends its data
 */
export type TransportTarget =
  | { readonly kind: 'discard' }
  | { readonly kind: 'stdout' }
  | { readonly kind: 'console' }
  | { readonly kind: 'noop-exporter' }
  | { readonly kind: 'collector'; readonly collector: CollectorKind; readonly endpoint: string };

const DISCARD: TransportTarget = { kind: 'discard' };

/**
 * Local mode differs per pillar: structured logs on stdout, pretty-printed
 * metrics, and traces batched into an exporter that drops them.
 */
const LOCAL_TARGETS: Record<Pillar, TransportTarget> = {
  logging: { kind: 'stdout' },
  metrics: { kind: 'console' },
  tracing: { kind: 'noop-exporter' },
};

function collector(kind: CollectorKind, endpoint: string): TransportTarget {
  return { kind: 'collector', collector: kind, endpoint };
}

/**
 * Resolve the transport target of a pillar for a mode
 *
 * @param pillar - logging, tracing or metrics
 * @param mode - A validated mode
 * @param port - Production collector port
 * @throws UnreachableModeError if the mode was never validated
 */
export function targetFor(pillar: Pillar, mode: Mode, port: string = DEFAULT_PORT): TransportTarget {
  switch (mode) {
    case Mode.Discard:
      return DISCARD;
    case Mode.Local:
      return LOCAL_TARGETS[pillar];
    case Mode.Debug:
      return collector('debug', DEBUG_COLLECTOR_ENDPOINT);
    case Mode.Development:
      return collector('development', DEVELOPMENT_COLLECTOR_ENDPOINT);
    case Mode.Production:
      return collector('production', `${PRODUCTION_COLLECTOR_HOST}:${port}`);
    default:
      throw new UnreachableModeError(mode);
  }
}

/**
 * The `http://` URL an OTLP/gRPC exporter takes for an insecure endpoint
 */
export function collectorUrl(endpoint: string): string {
  return `http://${endpoint}`;
}
