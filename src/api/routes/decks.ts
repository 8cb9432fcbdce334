/**
 * Decks API Routes
 *
 * Endpoints:
 * - GET    /                - List decks with total and due counts
 * - POST   /                - Create a deck
 * - POST   /import          - Import a deck from an export document
 * - GET    /:id             - Get a deck with its counts
 * - DELETE /:id             - Delete a deck and its cards
 * - GET    /:id/cards       - List the deck's cards with their review records
 * - POST   /:id/cards       - Add a card
 * - GET    /:id/due         - Cards due on the current simulated day
 * - GET    /:id/export      - Export document for the deck
 *
 * All endpoints return responses in the standard API format:
 * - Success: { success: true, data: T }
 * - Error: { success: false, error: { code, message, details? } }
 */

import { Hono } from 'hono';
import type { DeckService } from '@/core/decks';
import type { ExportService } from '@/core/export';
import { validate } from '../middleware/validate';
import { addCardSchema, createDeckSchema, importDeckSchema } from '../types';
import { success } from '../utils/response';

export interface DeckRouteDependencies {
  deckService: DeckService;
  exportService: ExportService;
}

/**
 * Creates the decks router.
 *
 * @example
 * ```typescript
 * app.route('/api/decks', decksRoutes({ deckService, exportService }));
 * ```
 */
export function decksRoutes({ deckService, exportService }: DeckRouteDependencies): Hono {
  const router = new Hono();

  // ==========================================================================
  // Decks
  // ==========================================================================

  router.get('/', async (c) => {
    return success(c, await deckService.listDecks());
  });

  router.post('/', validate(createDeckSchema), async (c) => {
    const { name } = c.get('validatedBody');
    const deck = await deckService.createDeck(name);
    return success(c, deck, 201);
  });

  /**
   * POST /import
   *
   * Body: { document: DeckExport | string, replaceExisting?: boolean }
   * Registered before /:id so 'import' is never read as a deck id.
   */
  router.post('/import', validate(importDeckSchema), async (c) => {
    const { document, replaceExisting } = c.get('validatedBody');
    const result = await exportService.importDeck(document, { replaceExisting });
    return success(c, result, 201);
  });

  router.get('/:id', async (c) => {
    return success(c, await deckService.getDeckWithSummary(c.req.param('id')));
  });

  router.delete('/:id', async (c) => {
    const id = c.req.param('id');
    await deckService.deleteDeck(id);
    return success(c, { id, deleted: true });
  });

  // ==========================================================================
  // Cards
  // ==========================================================================

  router.get('/:id/cards', async (c) => {
    return success(c, await deckService.listCards(c.req.param('id')));
  });

  router.post('/:id/cards', validate(addCardSchema), async (c) => {
    const { term, definition } = c.get('validatedBody');
    const card = await deckService.addCard(c.req.param('id'), term, definition);
    return success(c, card, 201);
  });

  router.get('/:id/due', async (c) => {
    return success(c, await deckService.getDueCards(c.req.param('id')));
  });

  // ==========================================================================
  // Export
  // ==========================================================================

  router.get('/:id/export', async (c) => {
    return success(c, await exportService.exportDeck(c.req.param('id')));
  });

  return router;
}
