/**
 * API Routes Index
 *
 * Builds the /api router from the route modules and serves a small
 * discovery document at GET /api.
 */

import { Hono } from 'hono';
import type { AppServices } from '@/services';
import { success } from '../utils/response';
import { decksRoutes } from './decks';
import { clockRoutes } from './clock';
import { sessionRoutes } from './session';
import { APP_VERSION } from './health';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { decksRoutes, type DeckRouteDependencies } from './decks';
export { clockRoutes, type ClockData } from './clock';
export { sessionRoutes, type SessionRouteDependencies } from './session';

/**
 * API information returned by GET /api.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

/**
 * Creates the router mounted at /api.
 */
export function createApiRouter(
  services: Pick<AppServices, 'deckService' | 'exportService' | 'clock' | 'sessionEngine'>
): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Spaced Review API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/decks', description: 'Decks, cards and due counts' },
        { path: '/api/decks/import', description: 'Import a deck from an export document' },
        { path: '/api/clock', description: 'Simulated day and day advance' },
        { path: '/api/session', description: 'Review session state and ratings' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/decks', decksRoutes(services));
  router.route('/clock', clockRoutes(services.clock));
  router.route('/session', sessionRoutes(services));

  return router;
}
