/**
 * API Response Utilities
 *
 * Helpers that wrap route results in the standard envelope.
 *
 * @example
 * ```typescript
 * router.get('/:id/plans/latest', (c) => {
 *   const plan = planner.latest(c.req.param('id'));
 *   return plan ? success(c, plan) : error(c, 'NOT_FOUND', 'No weekly plan yet', 404);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiErrorResponse, ApiResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  return c.json(response, statusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, statusCode);
}
