/**
 * Base error class for all telemetry facade errors.
 *
 * Provides structured error information with category and optional cause
 * tracking.
 */

/**
 * Error category for classifying telemetry errors
 */
export type ErrorCategory =
  | 'configuration'
  | 'exporter'
  | 'metric'
  | 'shutdown'
  | 'internal';

/**
 * Base error class for all telemetry errors.
 */
export abstract class TelemetryError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  public override readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message);
    this.name = 'TelemetryError';
    this.category = options.category;
    this.details = options.details;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Returns a human-readable string representation of the error
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is a TelemetryError
 */
export function isTelemetryError(error: unknown): error is TelemetryError {
  return error instanceof TelemetryError;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(error: unknown, category: ErrorCategory): boolean {
  return isTelemetryError(error) && error.category === category;
}

/**
 * Render any value as text without throwing
 *
 * Objects without a prototype, or whose `toString` throws, fall back to the
 * `[object Tag]` form.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Normalizes an unknown thrown value into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(describeValue(value));
}
