/**
 * Loggers for the library's own diagnostics (dropped records, shutdown).
 *
 * These never carry application telemetry; that goes through the logging
 * delegate.
 */

import type { Logger } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'pretty' | 'json';

export interface ConsoleLoggerConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly config: ConsoleLoggerConfig;

  constructor(config?: Partial<ConsoleLoggerConfig>) {
    this.config = {
      level: 'info',
      format: 'pretty',
      includeTimestamps: true,
      ...config,
    };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const timestamp = this.config.includeTimestamps ? new Date().toISOString() : undefined;

    if (this.config.format === 'json') {
      console.error(JSON.stringify({ timestamp, level, message, ...context }));
      return;
    }

    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }
    console.error(parts.join(' '));
  }
}

/**
 * No-op logger, the default when no diagnostics logger is configured
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
