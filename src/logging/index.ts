/**
 * Logging exports
 */

export type { LoggingDelegate } from './interface.js';
export { OtelLoggingDelegate } from './delegate.js';
export { DispatchQueue, type DispatchQueueHooks } from './queue.js';
