/**
 * Request Logger Middleware for the Mastery API
 *
 * Logs one line per request with method, path, status and response time:
 *
 * ```
 * [API] GET     /api/projects 200 - 15ms
 * [API] POST    /api/projects/prj_x/quizzes 200 - 8.42s (slow)
 * ```
 *
 * Quiz and syllabus generation wait on the model provider, so requests
 * slower than `slowRequestMs` are flagged and written with console.warn.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ skipPaths: ['/health'] }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Prefix for log messages */
  prefix: string;
  /** Whether to include an ISO timestamp */
  includeTimestamp: boolean;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  /** ANSI colours for terminal output */
  colorize: boolean;
  /** Requests slower than this are flagged */
  slowRequestMs: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  slowRequestMs: 5000,
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function statusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
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

    const method = c.req.method.padEnd(7);
    const status = c.res.status;
    const slow = responseTime >= finalConfig.slowRequestMs;
    const time = formatResponseTime(responseTime) + (slow ? ' (slow)' : '');

    let line = finalConfig.colorize
      ? `${finalConfig.prefix} ${method} ${path} ${statusColor(status)}${status}${colors.reset} - ${colors.dim}${time}${colors.reset}`
      : `${finalConfig.prefix} ${method} ${path} ${status} - ${time}`;

    if (finalConfig.includeTimestamp) {
      line = `[${new Date().toISOString()}] ${line}`;
    }

    if (slow) {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}
