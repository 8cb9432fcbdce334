/**
 * Hono application factory.
 *
 * Kept apart from server.ts so tests can build the app over an in-memory
 * database and call `app.request()` without opening a port.
 */

import { Hono } from 'hono';
import type { AppServices } from '@/services';
import { isProduction, type Config } from '@/config';
import { errorHandler, loggerMiddleware, ErrorCodes } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export type AppDependencies = Pick<
  AppServices,
  'deckService' | 'exportService' | 'clock' | 'sessionEngine'
>;

/**
 * Creates and configures the Hono application.
 *
 * Middleware order:
 * 1. Error handler (app.onError) catches errors from every layer below
 * 2. Request logger, unless `config.logging.requests` is off
 *
 * @example
 * ```typescript
 * const services = await createServices(createConnection(':memory:'));
 * const app = createApp(services, loadConfig({ LOG_REQUESTS: 'false' }));
 * const res = await app.request('/api/decks');
 * ```
 */
export function createApp(services: AppDependencies, config: Config): Hono {
  const app = new Hono();
  const production = isProduction(config);

  app.onError(errorHandler(production));

  if (config.logging.requests) {
    app.use('*', loggerMiddleware({ colorize: !production }));
  }

  app.route('/health', healthRoutes(services.clock, config.server.nodeEnv));
  app.route('/api', createApiRouter(services));

  app.notFound((c) => {
    return error(c, ErrorCodes.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404);
  });

  return app;
}
