/**
 * Client exports
 */

export type { TelemetryClient } from './interface.js';
export { TelemetryClientImpl, type TelemetryDelegates } from './client.js';
export {
  createTelemetry,
  createTelemetryFromEnvironment,
  type CreateTelemetryOptions,
} from './factory.js';
