/**
 * API Routes Aggregator
 *
 * - /health        - Health check (mounted at root, not under /api)
 * - /api           - API info
 * - /api/students  - Profiles, curriculum, topics, sessions, progress, plans
 */

import { Hono } from 'hono';
import type { AppContext } from '@/app-context';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { studentsRoutes } from './students';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { studentsRoutes } from './students';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export function createApiRouter(ctx: AppContext): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Study Cadence API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/students', description: 'Student profiles' },
        { path: '/api/students/:id/newsletters', description: 'Curriculum import from CSV newsletters' },
        { path: '/api/students/:id/topics/due', description: 'Topics due for review' },
        { path: '/api/students/:id/sessions', description: 'Study and review sessions' },
        { path: '/api/students/:id/progress', description: 'Progress report' },
        { path: '/api/students/:id/plans', description: 'Weekly study plans' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/students', studentsRoutes(ctx));

  return router;
}
