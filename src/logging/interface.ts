import type { LogEntry } from '../fields/index.js';

/**
 * Logging capability.
 *
 * Calls return before the record reaches the sink and never throw; records
 * issued back to back carry no ordering guarantee.
 */
export interface LoggingDelegate {
  debug(entry: LogEntry): void;
  info(entry: LogEntry): void;
  warn(entry: LogEntry): void;
  error(entry: LogEntry): void;
  fatal(entry: LogEntry): void;

  /** Deliver every pending record to the sink */
  flush(): Promise<void>;

  /** Stop accepting records, deliver pending ones and close the sink */
  shutdown(): Promise<void>;
}
