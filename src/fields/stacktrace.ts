/**
 * Stack capture and digest helpers for error-carrying log entries.
 */

import { createHash } from 'node:crypto';

/**
 * Capture the current call stack, without its header line.
 *
 * @param skip - Frames above and including this function's topmost call are left out
 */
export function captureStack(skip?: (...args: never[]) => unknown): string {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, skip);
  const lines = (holder.stack ?? '').split('\n');
  return lines
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * 32-character hexadecimal MD5 digest of a stack trace. Identical traces
 * yield identical digests, so the collector can group them.
 */
export function stackDigest(stack: string): string {
  return createHash('md5').update(stack, 'utf8').digest('hex');
}

/**
 * Name of an error's class
 *
 * Returns an empty string for a missing error and `error` when the value has
 * no named class (a thrown string or a plain object).
 */
export function errorName(error: unknown): string {
  if (error === undefined || error === null) {
    return '';
  }

  if (typeof error === 'object') {
    const name = error.constructor?.name;
    if (name && name !== 'Object') {
      return name;
    }
  }

  return 'error';
}
