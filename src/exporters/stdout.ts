/**
 * Exporters owned by this library: the stdout JSON line writer used by
 * Local-mode logging and the span exporter that drops everything.
 */

import { ExportResultCode, type ExportResult } from '@opentelemetry/core';
import type { LogRecordExporter, ReadableLogRecord } from '@opentelemetry/sdk-logs';
import type { ReadableSpan, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { toError } from '../errors/index.js';

/**
 * Minimal writable surface the stdout exporter needs
 */
export interface LineWriter {
  write(chunk: string): boolean;
}

function bodyToString(body: ReadableLogRecord['body']): string {
  if (body === undefined || body === null) {
    return '';
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * Render a log record as one flat JSON object
 */
export function formatLogRecord(record: ReadableLogRecord): Record<string, unknown> {
  return {
    level: (record.severityText ?? 'info').toLowerCase(),
    message: bodyToString(record.body),
    ...record.attributes,
  };
}

/**
 * Writes each log record as one JSON line
 */
export class StdoutLogRecordExporter implements LogRecordExporter {
  private readonly out: LineWriter;
  private isShutdown = false;

  constructor(out: LineWriter = process.stdout) {
    this.out = out;
  }

  export(logs: ReadableLogRecord[], resultCallback: (result: ExportResult) => void): void {
    if (this.isShutdown) {
      resultCallback({
        code: ExportResultCode.FAILED,
        error: new Error('Exporter has been shut down'),
      });
      return;
    }

    try {
      for (const record of logs) {
        this.out.write(`${JSON.stringify(formatLogRecord(record))}\n`);
      }
      resultCallback({ code: ExportResultCode.SUCCESS });
    } catch (error) {
      resultCallback({ code: ExportResultCode.FAILED, error: toError(error) });
    }
  }

  async shutdown(): Promise<void> {
    this.isShutdown = true;
  }
}

/**
 * Accepts span batches and discards them
 */
export class NoopSpanExporter implements SpanExporter {
  export(_spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  async shutdown(): Promise<void> {}
}
