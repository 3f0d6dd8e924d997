/**
 * Zod Validation Middleware
 *
 * Validates the JSON body or the query string of a request against a zod
 * schema. On success the parsed value is stored on the context, typed by
 * the schema; on failure the request ends with a 400 envelope listing each
 * failed field.
 *
 * @example
 * ```typescript
 * router.post('/', validate(createStudentSchema), (c) => {
 *   const body = c.get('validatedBody'); // CreateStudentBody
 *   return success(c, students.create(body), 201);
 * });
 * ```
 */

import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ApiErrorResponse } from '../types';
import { ErrorCodes, zodIssuesToDetails } from './error-handler';

function validationFailure(message: string, error: z.ZodError): ApiErrorResponse {
  return {
    success: false,
    error: {
      code: ErrorCodes.VALIDATION_ERROR,
      message,
      details: zodIssuesToDetails(error),
    },
  };
}

/**
 * Validates the request body. An empty body is validated as `{}`, so
 * schemas whose fields are all optional accept a bare POST.
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedBody: z.infer<T> } }> {
  return async (c, next) => {
    const raw = await c.req.text();

    let body: unknown;
    try {
      body = raw.trim() === '' ? {} : JSON.parse(raw);
    } catch (err) {
      if (err instanceof SyntaxError) {
        const response: ApiErrorResponse = {
          success: false,
          error: { code: ErrorCodes.INVALID_JSON, message: 'Request body must be valid JSON' },
        };
        return c.json(response, 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(validationFailure('Invalid request body', result.error), 400);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Validates URL query parameters.
 */
export function validateQuery<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<{ Variables: { validatedQuery: z.infer<T> } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(validationFailure('Invalid query parameters', result.error), 400);
    }

    c.set('validatedQuery', result.data);
    await next();
  };
}
