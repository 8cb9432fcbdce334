/**
 * Session API Routes
 *
 * The server owns a single SessionEngine; these endpoints drive it.
 *
 * Endpoints:
 * - GET  /            - Current session state, or null before the first session
 * - POST /start       - { deckId } start a session over the deck's due cards
 * - POST /rate        - { cardId, quality } rate a queued card
 * - POST /abort       - End the session, saving records of rated cards
 * - POST /retry-save  - Re-send review records whose save failed
 *
 * Engine errors map to statuses through the error handler: a rating outside
 * 0-5 is a 400, an operation the session state does not allow is a 409 and
 * a failed save is a 503.
 */

import { Hono } from 'hono';
import type { SessionEngine } from '@/core/session';
import type { DeckService } from '@/core/decks';
import { validate } from '../middleware/validate';
import { rateCardSchema, startSessionSchema } from '../types';
import { success } from '../utils/response';

export interface SessionRouteDependencies {
  sessionEngine: SessionEngine;
  deckService: DeckService;
}

/**
 * Creates the session router.
 *
 * @example
 * ```typescript
 * app.route('/api/session', sessionRoutes({ sessionEngine, deckService }));
 * ```
 */
export function sessionRoutes({ sessionEngine, deckService }: SessionRouteDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    return success(c, sessionEngine.getSessionState());
  });

  /**
   * POST /start
   *
   * Unknown decks are a 404 rather than an empty session.
   */
  router.post('/start', validate(startSessionSchema), async (c) => {
    const { deckId } = c.get('validatedBody');
    const deck = await deckService.getDeck(deckId);
    const state = await sessionEngine.startSession(deck.id);
    return success(c, state);
  });

  router.post('/rate', validate(rateCardSchema), async (c) => {
    const { cardId, quality } = c.get('validatedBody');
    return success(c, await sessionEngine.rateCard(cardId, quality));
  });

  router.post('/abort', async (c) => {
    return success(c, await sessionEngine.abortSession());
  });

  router.post('/retry-save', async (c) => {
    const savedCardIds = await sessionEngine.retryPendingSaves();
    return success(c, { savedCardIds });
  });

  return router;
}
