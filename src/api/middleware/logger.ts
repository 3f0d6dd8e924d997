/**
 * Request Logger Middleware
 *
 * One line per request once the response is ready:
 *
 * ```
 * [API] GET     /api/students/stu_1/topics/due 200 - 4ms
 * [API] POST    /api/students/stu_1/sessions 201 - 11ms
 * ```
 *
 * Health checks are skipped. Output is coloured outside production unless
 * NO_COLOR is set.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  colorize: boolean;
  /** Where lines go; console.log by default */
  write: (line: string) => void;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production' && process.env.NO_COLOR === undefined,
  write: (line) => console.log(line),
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PATCH':
      return colors.yellow;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    const method = c.req.method;
    const status = c.res.status;

    let line = finalConfig.colorize
      ? [
          finalConfig.prefix,
          `${getMethodColor(method)}${method.padEnd(7)}${colors.reset}`,
          path,
          `${getStatusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
        ].join(' ')
      : `${finalConfig.prefix} ${method} ${path} ${status} - ${formatResponseTime(responseTime)}`;

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    finalConfig.write(line);
  };
}
