/**
 * API Integration Tests
 *
 * Exercises the Hono app through `app.request()` over an in-memory
 * database: response envelopes, status codes, error mapping and a full
 * review session driven over HTTP.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { z } from 'zod';
import { createTestContext, cleanupTestContext, createTestApp, type TestContext } from '../setup';
import { createTestDeck, readData, readError, sendJson } from '../helpers';

const deckSchema = z.object({ id: z.string(), name: z.string() });
const cardSchema = z.object({ id: z.string(), term: z.string() });
const clockSchema = z.object({ today: z.number() });

describe('API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(async () => {
    ctx = await createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  // ==========================================================================
  // Health and discovery
  // ==========================================================================

  describe('GET /health', () => {
    it('reports status, environment and the simulated day', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      const data = await readData(
        res,
        z.object({ status: z.string(), environment: z.string(), version: z.string(), today: z.number() })
      );
      expect(data).toEqual({ status: 'ok', environment: 'test', version: '0.1.0', today: 0 });
    });
  });

  it('returns a 404 envelope for unknown routes', async () => {
    const res = await app.request('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await readError(res)).toEqual({
      code: 'NOT_FOUND',
      message: 'Route GET /api/nothing-here not found',
    });
  });

  // ==========================================================================
  // Decks
  // ==========================================================================

  describe('decks', () => {
    it('creates a deck with 201', async () => {
      const res = await sendJson(app, 'POST', '/api/decks', { name: 'Spanish Basics' });

      expect(res.status).toBe(201);
      const deck = await readData(res, deckSchema);
      expect(deck.name).toBe('Spanish Basics');
      expect(deck.id.startsWith('deck_')).toBe(true);
    });

    it('rejects a body without a name', async () => {
      const res = await sendJson(app, 'POST', '/api/decks', {});

      expect(res.status).toBe(400);
      expect(await readError(res)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Invalid request body',
        details: [{ path: 'name', message: 'name is required' }],
      });
    });

    it('rejects a malformed JSON body', async () => {
      const res = await app.request('/api/decks', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"name": ',
      });

      expect(res.status).toBe(400);
      expect((await readError(res)).code).toBe('INVALID_JSON');
    });

    it('maps a blank name to VALIDATION_ERROR', async () => {
      const res = await sendJson(app, 'POST', '/api/decks', { name: '  ' });

      expect(res.status).toBe(400);
      expect(await readError(res)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Deck name must not be empty',
      });
    });

    it('maps a duplicate name to 409 CONFLICT', async () => {
      await createTestDeck(ctx, 'Spanish Basics');

      const res = await sendJson(app, 'POST', '/api/decks', { name: 'spanish basics' });

      expect(res.status).toBe(409);
      expect((await readError(res)).code).toBe('CONFLICT');
    });

    it('lists decks with their summaries', async () => {
      await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);

      const res = await app.request('/api/decks');

      const decks = await readData(
        res,
        z.array(
          z.object({
            name: z.string(),
            summary: z.object({ totalCards: z.number(), dueCards: z.number() }),
          })
        )
      );
      expect(decks).toEqual([{ name: 'Spanish Basics', summary: { totalCards: 2, dueCards: 2 } }]);
    });

    it('returns 404 for an unknown deck', async () => {
      const res = await app.request('/api/decks/deck_missing');

      expect(res.status).toBe(404);
      expect(await readError(res)).toEqual({
        code: 'NOT_FOUND',
        message: "Deck with id 'deck_missing' not found",
      });
    });

    it('adds cards and lists them with review records', async () => {
      const { deck } = await createTestDeck(ctx, 'Spanish Basics');

      const created = await sendJson(app, 'POST', `/api/decks/${deck.id}/cards`, {
        term: 'hola',
        definition: 'hello',
      });
      expect(created.status).toBe(201);

      const res = await app.request(`/api/decks/${deck.id}/cards`);
      const cards = await readData(
        res,
        z.array(
          z.object({
            term: z.string(),
            definition: z.string(),
            review: z.object({
              easinessFactor: z.number(),
              intervalDays: z.number(),
              repetitions: z.number(),
              nextReviewDay: z.number(),
            }),
          })
        )
      );
      expect(cards).toEqual([
        {
          term: 'hola',
          definition: 'hello',
          review: { easinessFactor: 2.5, intervalDays: 0, repetitions: 0, nextReviewDay: 0 },
        },
      ]);
    });

    it('deletes a deck', async () => {
      const { deck } = await createTestDeck(ctx, 'Spanish Basics');

      const res = await app.request(`/api/decks/${deck.id}`, { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await readData(res, z.object({ id: z.string(), deleted: z.boolean() }))).toEqual({
        id: deck.id,
        deleted: true,
      });
      expect(await ctx.deckRepo.findById(deck.id)).toBeNull();
    });

    it('lists only the cards due today', async () => {
      const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);
      await ctx.cardRepo.saveReviewRecord(cards[0].id, {
        easinessFactor: 2.5,
        intervalDays: 1,
        repetitions: 1,
        nextReviewDay: 1,
      });

      const res = await app.request(`/api/decks/${deck.id}/due`);

      const due = await readData(res, z.array(cardSchema));
      expect(due.map((card) => card.term)).toEqual(['gracias']);
    });
  });

  // ==========================================================================
  // Export / import
  // ==========================================================================

  describe('export and import', () => {
    it('exports a deck and imports it back under a new database', async () => {
      const { deck } = await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);

      const exported = await readData(await app.request(`/api/decks/${deck.id}/export`), z.unknown());

      const other = await createTestContext();
      try {
        const otherApp = createTestApp(other);
        const res = await sendJson(otherApp, 'POST', '/api/decks/import', { document: exported });

        expect(res.status).toBe(201);
        const result = await readData(
          res,
          z.object({ deck: deckSchema, cardCount: z.number(), replaced: z.boolean() })
        );
        expect(result.deck.name).toBe('Spanish Basics');
        expect(result.cardCount).toBe(1);
        expect(result.replaced).toBe(false);
      } finally {
        cleanupTestContext(other);
      }
    });

    it('accepts the document as JSON text', async () => {
      const document = JSON.stringify({ name: 'French Basics', flashcards: [{ term: 'merci', definition: 'thanks' }] });

      const res = await sendJson(app, 'POST', '/api/decks/import', { document });

      expect(res.status).toBe(201);
    });

    it('returns INVALID_IMPORT with issue paths', async () => {
      const res = await sendJson(app, 'POST', '/api/decks/import', {
        document: { name: 'Broken', flashcards: [{ term: 'hola' }] },
      });

      expect(res.status).toBe(400);
      const err = await readError(res);
      expect(err.code).toBe('INVALID_IMPORT');
      expect(err.details).toEqual({
        issues: [{ path: 'flashcards.0.definition', message: 'Required' }],
      });
    });

    it('replaces an existing deck only when asked', async () => {
      await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);
      const document = { name: 'Spanish Basics', flashcards: [{ term: 'agua', definition: 'water' }] };

      const conflict = await sendJson(app, 'POST', '/api/decks/import', { document });
      expect(conflict.status).toBe(409);

      const replaced = await sendJson(app, 'POST', '/api/decks/import', { document, replaceExisting: true });
      expect(replaced.status).toBe(201);
      expect((await readData(replaced, z.object({ replaced: z.boolean() }))).replaced).toBe(true);
    });
  });

  // ==========================================================================
  // Clock
  // ==========================================================================

  describe('clock', () => {
    it('reads and advances the simulated day', async () => {
      expect(await readData(await app.request('/api/clock'), clockSchema)).toEqual({ today: 0 });

      const res = await app.request('/api/clock/advance', { method: 'POST' });

      expect(await readData(res, clockSchema)).toEqual({ today: 1 });
      expect(ctx.clock.today()).toBe(1);
      expect(await ctx.appStateRepo.loadCurrentDay()).toBe(1);
    });
  });

  // ==========================================================================
  // Session
  // ==========================================================================

  describe('session', () => {
    it('returns null before the first session', async () => {
      const res = await app.request('/api/session');

      expect(await readData(res, z.null())).toBeNull();
    });

    it('runs a session with a recycled card to completion', async () => {
      const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);
      const [hola, gracias] = cards;

      const started = await sendJson(app, 'POST', '/api/session/start', { deckId: deck.id });
      expect(
        await readData(started, z.object({ status: z.string(), primaryQueue: z.array(z.string()) }))
      ).toEqual({ status: 'active', primaryQueue: [hola.id, gracias.id] });

      const rateSchema = z.object({
        passed: z.boolean(),
        status: z.string(),
        nextCard: cardSchema.nullable(),
      });

      const first = await sendJson(app, 'POST', '/api/session/rate', { cardId: hola.id, quality: 2 });
      expect(await readData(first, rateSchema)).toEqual({
        passed: false,
        status: 'active',
        nextCard: { id: gracias.id, term: 'gracias' },
      });

      const second = await sendJson(app, 'POST', '/api/session/rate', { cardId: gracias.id, quality: 5 });
      expect(await readData(second, rateSchema)).toEqual({
        passed: true,
        status: 'active',
        nextCard: { id: hola.id, term: 'hola' },
      });

      const third = await sendJson(app, 'POST', '/api/session/rate', { cardId: hola.id, quality: 3 });
      expect(await readData(third, rateSchema)).toEqual({ passed: true, status: 'complete', nextCard: null });

      const state = await readData(
        await app.request('/api/session'),
        z.object({ status: z.string(), masteredCount: z.number(), phaseMessage: z.string() })
      );
      expect(state).toEqual({
        status: 'complete',
        masteredCount: 2,
        phaseMessage: 'Session complete: 2 of 2 cards mastered',
      });
    });

    it('maps an out-of-range quality to 400 INVALID_RATING', async () => {
      const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);
      await sendJson(app, 'POST', '/api/session/start', { deckId: deck.id });

      const res = await sendJson(app, 'POST', '/api/session/rate', { cardId: cards[0].id, quality: 6 });

      expect(res.status).toBe(400);
      expect(await readError(res)).toEqual({
        code: 'INVALID_RATING',
        message: 'Quality rating must be an integer from 0 to 5, got 6',
      });
    });

    it('maps rating without a session to 409 INVALID_SESSION_OPERATION', async () => {
      const res = await sendJson(app, 'POST', '/api/session/rate', { cardId: 'card_x', quality: 4 });

      expect(res.status).toBe(409);
      expect((await readError(res)).code).toBe('INVALID_SESSION_OPERATION');
    });

    it('returns 404 when starting a session for an unknown deck', async () => {
      const res = await sendJson(app, 'POST', '/api/session/start', { deckId: 'deck_missing' });

      expect(res.status).toBe(404);
    });

    it('maps a failed save to 503 and saves it on retry', async () => {
      const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);
      await sendJson(app, 'POST', '/api/session/start', { deckId: deck.id });

      const original = ctx.cardRepo.saveReviewRecord.bind(ctx.cardRepo);
      let failNext = true;
      ctx.cardRepo.saveReviewRecord = async (cardId, record) => {
        if (failNext) {
          failNext = false;
          throw new Error('disk I/O error');
        }
        return original(cardId, record);
      };

      const res = await sendJson(app, 'POST', '/api/session/rate', { cardId: cards[0].id, quality: 4 });
      expect(res.status).toBe(503);
      const err = await readError(res);
      expect(err.code).toBe('PERSISTENCE_FAILURE');
      expect(err.details).toEqual({ cardIds: [cards[0].id] });

      const retry = await app.request('/api/session/retry-save', { method: 'POST' });
      expect(await readData(retry, z.object({ savedCardIds: z.array(z.string()) }))).toEqual({
        savedCardIds: [cards[0].id],
      });
      expect((await ctx.cardRepo.findById(cards[0].id))?.review.repetitions).toBe(1);
    });

    it('aborts with partial commit', async () => {
      const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);
      await sendJson(app, 'POST', '/api/session/start', { deckId: deck.id });
      await sendJson(app, 'POST', '/api/session/rate', { cardId: cards[0].id, quality: 0 });

      const res = await app.request('/api/session/abort', { method: 'POST' });

      const summary = await readData(
        res,
        z.object({ aborted: z.boolean(), unmasteredCardIds: z.array(z.string()) })
      );
      expect(summary).toEqual({ aborted: true, unmasteredCardIds: [cards[0].id, cards[1].id] });
      const stored = await ctx.cardRepo.findById(cards[0].id);
      expect(stored?.review).toMatchObject({ repetitions: 0, intervalDays: 1, nextReviewDay: 1 });
    });
  });
});
