/**
 * Configuration-related errors.
 *
 * Raised while resolving a configuration, before any client exists.
 */

import { TelemetryError, describeValue } from './base.js';

/**
 * Error thrown when the configuration is missing required fields or holds
 * malformed values
 */
export class InvalidConfigurationError extends TelemetryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'configuration',
      message,
      details,
    });
    this.name = 'InvalidConfigurationError';
  }

  /**
   * Create an InvalidConfigurationError for a missing required field
   */
  static missingRequiredField(field: string): InvalidConfigurationError {
    return new InvalidConfigurationError(
      `Missing required configuration field: ${field}`,
      { field }
    );
  }

  /**
   * Create an InvalidConfigurationError for an invalid field value
   */
  static invalidFieldValue(
    field: string,
    value: unknown,
    reason?: string
  ): InvalidConfigurationError {
    const message = reason
      ? `Invalid value for configuration field '${field}': ${reason}`
      : `Invalid value for configuration field '${field}'`;
    return new InvalidConfigurationError(message, { field, value });
  }
}

function formatMode(mode: unknown): string {
  return typeof mode === 'string' ? JSON.stringify(mode) : describeValue(mode);
}

/**
 * Error thrown when the mode is not one of the known modes
 */
export class InvalidModeError extends TelemetryError {
  constructor(mode: unknown, allowed: readonly string[]) {
    super({
      category: 'configuration',
      message: `Invalid mode ${formatMode(mode)}: must be one of ${allowed.join(', ')}`,
      details: { mode, allowed },
    });
    this.name = 'InvalidModeError';
  }
}

/**
 * Error thrown when the local hostname cannot be resolved
 */
export class HostnameResolutionError extends TelemetryError {
  constructor(message: string, cause?: Error) {
    super({
      category: 'configuration',
      message: `Invalid hostname: ${message}`,
      cause,
    });
    this.name = 'HostnameResolutionError';
  }
}

/**
 * Error thrown when a mode reaches the router without having been validated.
 */
export class UnreachableModeError extends TelemetryError {
  constructor(mode: unknown) {
    super({
      category: 'internal',
      message: `Unreachable mode: ${String(mode)}`,
      details: { mode },
    });
    this.name = 'UnreachableModeError';
  }
}
