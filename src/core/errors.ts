/**
 * Domain Errors
 *
 * Failures raised by the scheduling core. Each carries a machine-readable
 * code that the API error handler maps to an HTTP status and the CLI prints
 * as-is. Numeric edge cases in the SM-2 engine are clamped and never raise.
 */

export type SchedulingErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'CONFLICT';

/**
 * Base class for every error the core raises on purpose.
 */
export class SchedulingError extends Error {
  /** Machine-readable error code */
  public readonly code: SchedulingErrorCode;
  /** Additional context (optional) */
  public readonly details?: unknown;

  constructor(code: SchedulingErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'SchedulingError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Caller-supplied input was rejected. Nothing was written.
 *
 * @example
 * ```typescript
 * throw new ValidationError('qualityRating must be an integer from 0 to 5', {
 *   field: 'qualityRating',
 *   value: 7,
 * });
 * ```
 */
export class ValidationError extends SchedulingError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * A referenced record does not exist.
 */
export class NotFoundError extends SchedulingError {
  public readonly resource: string;
  public readonly id: string;

  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} '${id}' not found`, { resource, id });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/**
 * A concurrent writer changed the record first, or the database was locked.
 * The transaction has been rolled back; the caller may retry.
 */
export class ConflictError extends SchedulingError {
  constructor(message: string, details?: unknown) {
    super('CONFLICT', message, details);
    this.name = 'ConflictError';
  }
}
