/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 * import { createAppContext } from '@/app-context';
 *
 * const app = createApp(createAppContext(getConfig()));
 * const response = await app.request('/api/students');
 * ```
 */

export { createApp, findAvailablePort, startServer, MAX_PORT, type CreateAppOptions } from './server';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  validate,
  validateQuery,
  type ErrorCode,
  type LoggerConfig,
} from './middleware';

export { createApiRouter, healthRoutes, studentsRoutes, APP_VERSION, type ApiInfo, type HealthCheckData } from './routes';

export * from './types';

export { success, error } from './utils/response';
