/**
 * Error Handler
 *
 * Turns every error that escapes a route into the standard envelope:
 *
 * ```json
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "Student 'stu_1' not found" } }
 * ```
 *
 * | Error                          | Status | Code                 |
 * |--------------------------------|--------|----------------------|
 * | AppError                       | its own| its own              |
 * | ValidationError, ZodError      | 400    | VALIDATION_ERROR     |
 * | NotFoundError                  | 404    | NOT_FOUND            |
 * | ConflictError                  | 409    | CONFLICT             |
 * | LLMError                       | 502    | LLM_ERROR            |
 * | ConfigValidationError          | 500    | CONFIGURATION_ERROR  |
 * | anything else                  | 500    | INTERNAL_ERROR       |
 *
 * Registered with `app.onError(errorHandler())`: Hono catches a throwing
 * handler before any wrapping middleware sees it.
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import { ConfigValidationError } from '../../config';
import { SchedulingError, type SchedulingErrorCode } from '../../core/errors';
import { LLMError } from '../../llm/types';
import type { ApiErrorResponse, ValidationErrorDetail } from '../types';

export const ErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_JSON: 'INVALID_JSON',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  LLM_ERROR: 'LLM_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * An error raised by the HTTP layer itself, carrying its own status.
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, AppError);
  }
}

const SCHEDULING_STATUS: Record<SchedulingErrorCode, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
};

export function zodIssuesToDetails(error: ZodError): ValidationErrorDetail[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function envelope(code: string, message: string, details?: unknown): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
}

export function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  if (error instanceof AppError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: error.statusCode,
    };
  }

  if (error instanceof SchedulingError) {
    return {
      response: envelope(error.code, error.message, error.details),
      statusCode: SCHEDULING_STATUS[error.code],
    };
  }

  if (error instanceof ZodError) {
    return {
      response: envelope(ErrorCodes.VALIDATION_ERROR, 'Invalid request', zodIssuesToDetails(error)),
      statusCode: 400,
    };
  }

  if (error instanceof LLMError) {
    return {
      response: envelope(ErrorCodes.LLM_ERROR, error.message, { type: error.type }),
      statusCode: 502,
    };
  }

  if (error instanceof ConfigValidationError) {
    return {
      response: envelope(ErrorCodes.CONFIGURATION_ERROR, error.message, {
        missingVars: error.missingVars,
        invalidVars: error.invalidVars,
      }),
      statusCode: 500,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: envelope(
        ErrorCodes.INTERNAL_ERROR,
        isDev ? error.message : 'An unexpected error occurred. Please try again.',
        isDev ? { stack: error.stack } : undefined
      ),
      statusCode: 500,
    };
  }

  return {
    response: envelope(
      ErrorCodes.INTERNAL_ERROR,
      'An unexpected error occurred',
      isDev ? { rawError: String(error) } : undefined
    ),
    statusCode: 500,
  };
}

/**
 * Creates the application's `onError` handler.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    const { response, statusCode } = formatErrorResponse(error);

    // 4xx responses are not logged
    if (statusCode >= 500) {
      console.error('[Error Handler]', error);
    }

    return c.json(response, statusCode);
  };
}
