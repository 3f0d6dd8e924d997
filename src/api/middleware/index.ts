/**
 * API Middleware - Barrel Export
 *
 * The error handler is registered with `app.onError`; the logger and the
 * validators are ordinary middleware.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.use('*', loggerMiddleware());
 * ```
 */

export {
  errorHandler,
  formatErrorResponse,
  zodIssuesToDetails,
  AppError,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

export {
  loggerMiddleware,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export { validate, validateQuery } from './validate';
