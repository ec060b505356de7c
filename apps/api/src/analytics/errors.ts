/**
 * Error taxonomy for the analytics core
 *
 * Empty filtered sets are a normal state and have no error type.
 */

/**
 * The data source cannot be used: required columns are missing, or no source
 * is configured at all. Fatal, nothing is computed.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A filter selection the user can correct, such as an inverted date range.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Attached to a cache result when an expired snapshot is served because the
 * reload failed. Never thrown.
 */
export class StaleCacheWarning {
  readonly name = 'StaleCacheWarning';

  constructor(
    public readonly sourceId: string,
    public readonly loadedAt: Date,
    public readonly ageSeconds: number,
    public readonly cause: Error
  ) {}

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      sourceId: this.sourceId,
      loadedAt: this.loadedAt.toISOString(),
      ageSeconds: this.ageSeconds,
      reason: this.cause.message,
    };
  }
}
