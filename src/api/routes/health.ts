/**
 * Health Check Route
 *
 * GET /health reports whether the server is up and its SQLite handle still
 * answers a trivial query. It needs no student id and is skipped by the
 * request logger.
 *
 * ```json
 * { "success": true, "data": { "status": "ok", "database": "ok", "environment": "development", ... } }
 * ```
 */

import { Hono } from 'hono';
import type { AppContext } from '@/app-context';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok' | 'degraded';
  database: 'ok' | 'unavailable';
  /** ISO 8601 timestamp of the check */
  timestamp: string;
  environment: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

function probeDatabase(ctx: AppContext): HealthCheckData['database'] {
  try {
    ctx.connection.sqlite.prepare('SELECT 1').get();
    return 'ok';
  } catch (error) {
    console.error('[Health] Database probe failed:', error);
    return 'unavailable';
  }
}

export function healthRoutes(ctx: AppContext): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const database = probeDatabase(ctx);
    const healthData: HealthCheckData = {
      status: database === 'ok' ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
      environment: ctx.config.server.nodeEnv,
      version: APP_VERSION,
    };

    return success(c, healthData, database === 'ok' ? 200 : 503);
  });

  return router;
}
