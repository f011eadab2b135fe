export class TributaryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TributaryError';
  }
}

export class ConfigError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * Source-level failure: network, parse or file I/O. Aborts the run.
 */
export class ExtractionError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'EXTRACTION_ERROR', details, options);
    this.name = 'ExtractionError';
  }
}

export class InjectedFailureError extends ExtractionError {
  constructor(public readonly atRecord: number) {
    super(`Injected failure at record ${atRecord}`, { atRecord });
    this.name = 'InjectedFailureError';
  }
}

export class AuthenticationError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', details);
    this.name = 'AuthenticationError';
  }
}

export class RateLimitError extends TributaryError {
  constructor(
    message: string,
    public readonly sourceKey: string,
    public readonly retryAfter: number | null = null,
  ) {
    super(message, 'RATE_LIMIT_ERROR', { sourceKey, retryAfter });
    this.name = 'RateLimitError';
  }
}

export class CheckpointError extends TributaryError {
  constructor(message: string, cause: unknown, details?: Record<string, unknown>) {
    super(message, 'CHECKPOINT_ERROR', details, { cause });
    this.name = 'CheckpointError';
  }
}

export class SchemaDriftError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_DRIFT_ERROR', details);
    this.name = 'SchemaDriftError';
  }
}

export class RunTrackingError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RUN_TRACKING_ERROR', details);
    this.name = 'RunTrackingError';
  }
}

/**
 * Malformed request input (query string, body).
 */
export class ValidationError extends TributaryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
