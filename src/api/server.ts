/**
 * Study Cadence API Server
 *
 * Hono application served by @hono/node-server.
 *
 * - Automatic port discovery (finds the next free port if PORT is taken)
 * - Request logging with response times
 * - Consistent JSON error responses
 * - Health check endpoint
 *
 * Usage:
 *   npm run server
 *   PORT=8080 DATABASE_PATH=./data/study.db npm run server
 */

import net from 'node:net';
import { pathToFileURL } from 'node:url';
import { serve } from '@hono/node-server';
import { config as loadEnv } from 'dotenv';
import { Hono } from 'hono';
import { createAppContext, closeAppContext, type AppContext } from '@/app-context';
import { getConfig } from '@/config';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

/** Highest port tried before giving up */
export const MAX_PORT = 3100;

export interface CreateAppOptions {
  /** Overrides for the request logger; `false` disables it */
  logger?: Partial<LoggerConfig> | false;
}

/**
 * Finds an available port starting from the preferred one by briefly
 * listening on each candidate.
 *
 * @throws Error when every port up to `maxPort` is taken
 */
export async function findAvailablePort(
  preferredPort: number,
  host: string,
  maxPort: number = MAX_PORT
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    if (await isPortFree(port, host)) {
      return port;
    }
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }
  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

function isPortFree(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const probe = net.createServer();
    probe.once('error', () => resolve(false));
    probe.listen(port, host, () => {
      probe.close(() => resolve(true));
    });
  });
}

/**
 * Creates the Hono application over an application context.
 *
 * Errors thrown by any route are turned into envelopes by the `onError`
 * handler; unmatched routes get a JSON 404.
 */
export function createApp(ctx: AppContext, options: CreateAppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (options.logger !== false) {
    app.use('*', loggerMiddleware(options.logger ?? {}));
  }

  app.route('/health', healthRoutes(ctx));
  app.route('/api', createApiRouter(ctx));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}

function printBanner(port: number, nodeEnv: string, dbPath: string): void {
  const line = (text: string) => console.log(`║  ${text.padEnd(57)}║`);
  console.log('');
  console.log('╔═══════════════════════════════════════════════════════════╗');
  line('Study Cadence API Server');
  console.log('╠═══════════════════════════════════════════════════════════╣');
  line(`Server running on http://localhost:${port}`);
  line(`Environment: ${nodeEnv}`);
  line(`Database: ${dbPath}`);
  line('');
  line('Endpoints:');
  line(`  Health:   http://localhost:${port}/health`);
  line(`  API:      http://localhost:${port}/api`);
  console.log('╚═══════════════════════════════════════════════════════════╝');
  console.log('');
}

export async function startServer(): Promise<void> {
  loadEnv();
  const config = getConfig();
  const ctx = createAppContext(config);
  const app = createApp(ctx);

  const port = await findAvailablePort(config.server.port, config.server.host);
  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    printBanner(info.port, config.server.nodeEnv, config.database.path);
  });

  const shutdown = (reason: string) => {
    console.log(`\n[Server] ${reason}, shutting down...`);
    server.close(() => {
      closeAppContext(ctx);
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('Received SIGINT'));
  process.on('SIGTERM', () => shutdown('Received SIGTERM'));
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && import.meta.url === pathToFileURL(entryPoint).href) {
  startServer().catch((error: unknown) => {
    console.error('[Server] Failed to start:', error);
    process.exit(1);
  });
}
