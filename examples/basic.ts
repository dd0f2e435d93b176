/**
 * Basic usage: local mode, one span, a few log records and metrics.
 *
 * Logs are printed as JSON lines on stdout and metrics on the console.
 */

import {
  ConsoleLogger,
  Mode,
  ROOT_CONTEXT,
  createTelemetry,
  isTelemetryError,
} from '../src/index.js';

async function main(): Promise<void> {
  const telemetry = createTelemetry({
    service: { name: 'inventory', version: '2.3.1' },
    mode: Mode.Local,
    defaultFields: { region: 'eu-west-1' },
    flushIntervalMs: 5_000,
    logger: new ConsoleLogger({ level: 'info' }),
  });

  const { context, span } = telemetry.startSpan(ROOT_CONTEXT, 'reserve-stock');

  telemetry.info('stock', 'reserve', 'reservation started', { sku: 'SKU-1042' });
  telemetry.addEvent(context, 'warehouse.selected', { warehouse: 'north' });

  try {
    throw new RangeError('requested quantity exceeds stock');
  } catch (error) {
    telemetry.warn('stock', 'reserve', 'partial reservation', error, { sku: 'SKU-1042' });
  }

  telemetry.counter('stock.reservations', 1, { outcome: 'partial' });
  telemetry.histogram('stock.reserve.duration_ms', 12.5);
  telemetry.gauge('stock.available', 7);

  span.end();

  try {
    await telemetry.shutdown();
  } catch (error) {
    if (isTelemetryError(error)) {
      console.error(error.toJSON());
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
