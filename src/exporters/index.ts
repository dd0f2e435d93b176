/**
 * Exporter exports
 */

export {
  StdoutLogRecordExporter,
  NoopSpanExporter,
  formatLogRecord,
  type LineWriter,
} from './stdout.js';
export {
  createLogExporter,
  createSpanExporter,
  createMetricExporter,
  type ExporterOverrides,
} from './factory.js';
