/**
 * Health Check Route
 *
 * GET /health - lightweight liveness check. Does not touch the database.
 *
 * Response:
 * ```json
 * { "success": true, "data": { "status": "ok", "timestamp": "...", "environment": "development", "version": "0.1.0" } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';
import { config } from '../../config';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 timestamp of when the check was performed */
  timestamp: string;
  environment: string;
  version: string;
}

const APP_VERSION = '0.1.0';

export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      version: APP_VERSION,
    };
    return success(c, healthData);
  });

  return router;
}
