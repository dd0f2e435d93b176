/**
 * Logging delegate backed by the OpenTelemetry logs SDK
 */

import { SeverityNumber, type Logger as OtelLogger } from '@opentelemetry/api-logs';
import {
  BatchLogRecordProcessor,
  LoggerProvider,
  SimpleLogRecordProcessor,
  type LogRecordExporter,
} from '@opentelemetry/sdk-logs';
import { Mode, type Fields, type Logger, type ResolvedConfig } from '../types/index.js';
import { buildLogAttributes, buildResource, captureStack, type LogEntry } from '../fields/index.js';
import type { TransportTarget } from '../routing/index.js';
import type { LoggingDelegate } from './interface.js';
import { DispatchQueue } from './queue.js';

interface QueuedRecord {
  timestamp: Date;
  severityNumber: SeverityNumber;
  severityText: string;
  body: string;
  attributes: Fields;
}

export class OtelLoggingDelegate implements LoggingDelegate {
  private readonly config: ResolvedConfig;
  private readonly diagnostics: Logger;
  private readonly provider: LoggerProvider;
  private readonly logger: OtelLogger;
  private readonly queue: DispatchQueue<QueuedRecord>;
  private readonly minSeverity: SeverityNumber;

  constructor(config: ResolvedConfig, target: TransportTarget, exporter: LogRecordExporter | null) {
    this.config = config;
    this.diagnostics = config.logger;
    this.provider = new LoggerProvider({ resource: buildResource(config) });

    if (exporter) {
      this.provider.addLogRecordProcessor(
        target.kind === 'collector'
          ? new BatchLogRecordProcessor(exporter, {
              maxQueueSize: config.logQueueSize,
              scheduledDelayMillis: config.flushIntervalMs,
              exportTimeoutMillis: config.timeoutMs,
            })
          : new SimpleLogRecordProcessor(exporter)
      );
    }

    // Records are filed under the search index by the collector
    this.logger = this.provider.getLogger(config.searchIndex, config.service.version);
    this.minSeverity = config.mode === Mode.Production ? SeverityNumber.INFO : SeverityNumber.DEBUG;

    this.queue = new DispatchQueue<QueuedRecord>(
      config.logQueueSize,
      (record) => this.logger.emit(record),
      {
        onDrop: (count) => {
          this.diagnostics.warn('Log queue full, records dropped', {
            dropped: count,
            capacity: config.logQueueSize,
          });
        },
        onError: (error) => {
          this.diagnostics.error('Failed to emit log record', { error });
        },
      }
    );
  }

  debug(entry: LogEntry): void {
    this.submit(SeverityNumber.DEBUG, 'DEBUG', entry);
  }

  info(entry: LogEntry): void {
    this.submit(SeverityNumber.INFO, 'INFO', entry);
  }

  warn(entry: LogEntry): void {
    this.submit(SeverityNumber.WARN, 'WARN', this.withStack(entry, this.warn));
  }

  error(entry: LogEntry): void {
    this.submit(SeverityNumber.ERROR, 'ERROR', this.withStack(entry, this.error));
  }

  fatal(entry: LogEntry): void {
    this.submit(SeverityNumber.FATAL, 'FATAL', this.withStack(entry, this.fatal));
  }

  async flush(): Promise<void> {
    this.queue.drain();
    await this.provider.forceFlush();
  }

  async shutdown(): Promise<void> {
    this.queue.close();
    await this.provider.shutdown();
  }

  /** Number of records waiting for the next drain */
  pendingCount(): number {
    return this.queue.size;
  }

  private withStack(entry: LogEntry, caller: (entry: LogEntry) => void): LogEntry {
    if (entry.stacktrace !== undefined) {
      return entry;
    }
    return { ...entry, stacktrace: captureStack(caller) };
  }

  private submit(severityNumber: SeverityNumber, severityText: string, entry: LogEntry): void {
    if (severityNumber < this.minSeverity) {
      return;
    }

    const timestamp = new Date();
    this.queue.offer({
      timestamp,
      severityNumber,
      severityText,
      body: entry.message,
      attributes: buildLogAttributes(entry, this.config, timestamp),
    });
  }
}
