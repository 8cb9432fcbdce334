/**
 * Health Check Route
 *
 * Lightweight liveness endpoint for process supervisors and uptime checks.
 * It reports the simulated day as well, which makes it a quick way to see
 * which database the server is running against.
 *
 * @example
 * ```bash
 * curl http://localhost:3000/health
 * # { "success": true, "data": { "status": "ok", "timestamp": "...",
 * #   "environment": "development", "version": "0.1.0", "today": 0 } }
 * ```
 */

import { Hono } from 'hono';
import type { DayProvider } from '@/core/clock';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 timestamp of the check */
  timestamp: string;
  environment: string;
  version: string;
  /** Current simulated day */
  today: number;
}

/**
 * Application version reported by the health check.
 */
export const APP_VERSION = '0.1.0';

/**
 * Creates the health check router, mounted at /health.
 */
export function healthRoutes(clock: DayProvider, environment: string): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment,
      version: APP_VERSION,
      today: clock.today(),
    };

    return success(c, healthData);
  });

  return router;
}
