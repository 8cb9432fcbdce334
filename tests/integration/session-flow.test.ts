/**
 * Integration Tests: Review Session over SQLite
 *
 * Drives the SessionEngine against the real FlashcardRepository:
 * - recycled cards are persisted once, from their passing rating
 * - the next day's due query sees the saved records
 * - aborting saves the latest record of failed cards only
 * - the clock decides which cards a session contains
 * - deleting or replacing the deck mid-session does not block the next one
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Flashcard } from '../../src/core/models';
import type { SessionEvent } from '../../src/core/session';
import { createTestContext, cleanupTestContext, type TestContext } from '../setup';
import { createTestDeck } from '../helpers';

describe('Review session over SQLite', () => {
  let ctx: TestContext;
  let deckId: string;
  let cardA: Flashcard;
  let cardB: Flashcard;
  let cardC: Flashcard;

  beforeEach(async () => {
    ctx = await createTestContext();
    const { deck, cards } = await createTestDeck(ctx, 'Spanish Basics', [
      ['hola', 'hello'],
      ['gracias', 'thank you'],
      ['adiós', 'goodbye'],
    ]);
    deckId = deck.id;
    [cardA, cardB, cardC] = cards;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTestContext(ctx);
  });

  it('saves one record per card, recycled cards from their passing rating', async () => {
    const saveSpy = vi.spyOn(ctx.cardRepo, 'saveReviewRecord');

    await ctx.sessionEngine.startSession(deckId);
    await ctx.sessionEngine.rateCard(cardA.id, 1);
    await ctx.sessionEngine.rateCard(cardB.id, 4);
    await ctx.sessionEngine.rateCard(cardC.id, 1);
    await ctx.sessionEngine.rateCard(cardA.id, 5);
    const last = await ctx.sessionEngine.rateCard(cardC.id, 4);

    expect(last.status).toBe('complete');
    expect(last.nextCard).toBeNull();
    expect(saveSpy.mock.calls.map(([cardId]) => cardId)).toEqual([cardB.id, cardA.id, cardC.id]);

    const a = await ctx.cardRepo.findById(cardA.id);
    const b = await ctx.cardRepo.findById(cardB.id);
    const c = await ctx.cardRepo.findById(cardC.id);

    // A: 2.5 -> 1.96 (q=1) -> 2.06 (q=5); chained from the failed attempt
    expect(a?.review.easinessFactor).toBeCloseTo(2.06, 10);
    expect(a?.review).toMatchObject({ intervalDays: 1, repetitions: 1, nextReviewDay: 1 });
    expect(b?.review).toEqual({ easinessFactor: 2.5, intervalDays: 1, repetitions: 1, nextReviewDay: 1 });
    expect(c?.review.easinessFactor).toBeCloseTo(1.96, 10);
    expect(c?.review).toMatchObject({ intervalDays: 1, repetitions: 1, nextReviewDay: 1 });
  });

  it('presents another card before repeating a failed one', async () => {
    await ctx.sessionEngine.startSession(deckId);

    const presented: string[] = [];
    const ratings: Record<string, number[]> = {
      [cardA.id]: [0, 3],
      [cardB.id]: [2, 5],
      [cardC.id]: [4],
    };

    for (let card = ctx.sessionEngine.getCurrentCard(); card; card = ctx.sessionEngine.getCurrentCard()) {
      presented.push(card.id);
      const quality = ratings[card.id].shift();
      if (quality === undefined) {
        throw new Error(`No rating left for ${card.term}`);
      }
      await ctx.sessionEngine.rateCard(card.id, quality);
    }

    expect(presented).toEqual([cardA.id, cardB.id, cardC.id, cardA.id, cardB.id]);
    expect(ctx.sessionEngine.getSummary()).toMatchObject({
      totalCards: 3,
      masteredCards: 3,
      totalAttempts: 5,
      failedAttempts: 2,
      aborted: false,
      unmasteredCardIds: [],
      unsavedCardIds: [],
    });
  });

  it('only includes cards due on the current day', async () => {
    await ctx.sessionEngine.startSession(deckId);
    await ctx.sessionEngine.rateCard(cardA.id, 5);
    await ctx.sessionEngine.rateCard(cardB.id, 5);
    await ctx.sessionEngine.rateCard(cardC.id, 5);

    // Nothing is due again until day 1
    const sameDay = await ctx.sessionEngine.startSession(deckId);
    expect(sameDay.status).toBe('complete');
    expect(sameDay.totalCards).toBe(0);
    expect(ctx.sessionEngine.getCurrentCard()).toBeNull();

    await ctx.clock.advanceDay();
    const nextDay = await ctx.sessionEngine.startSession(deckId);

    expect(nextDay.status).toBe('active');
    expect(nextDay.primaryQueue).toEqual([cardA.id, cardB.id, cardC.id]);
    expect(nextDay.phaseMessage).toBe('Round 1: 3 cards');
  });

  it('schedules the second pass six days out on the day it is rated', async () => {
    await ctx.sessionEngine.startSession(deckId);
    await ctx.sessionEngine.rateCard(cardA.id, 4);
    await ctx.sessionEngine.abortSession();

    await ctx.clock.advanceDay();
    await ctx.sessionEngine.startSession(deckId);
    const result = await ctx.sessionEngine.rateCard(cardA.id, 4);

    expect(result.record).toEqual({ easinessFactor: 2.5, intervalDays: 6, repetitions: 2, nextReviewDay: 7 });
    const stored = await ctx.cardRepo.findById(cardA.id);
    expect(stored?.review).toEqual(result.record);
  });

  it('saves failed cards on abort and leaves unrated cards untouched', async () => {
    const events: SessionEvent[] = [];
    ctx.sessionEngine.setEventListener((event) => events.push(event));

    await ctx.sessionEngine.startSession(deckId);
    await ctx.sessionEngine.rateCard(cardA.id, 1);
    await ctx.sessionEngine.rateCard(cardB.id, 4);
    const summary = await ctx.sessionEngine.abortSession();

    expect(summary).toMatchObject({
      totalCards: 3,
      masteredCards: 1,
      totalAttempts: 2,
      failedAttempts: 1,
      aborted: true,
      unmasteredCardIds: [cardA.id, cardC.id],
      unsavedCardIds: [],
    });

    const a = await ctx.cardRepo.findById(cardA.id);
    const c = await ctx.cardRepo.findById(cardC.id);
    expect(a?.review.easinessFactor).toBeCloseTo(1.96, 10);
    expect(a?.review).toMatchObject({ intervalDays: 1, repetitions: 0, nextReviewDay: 1 });
    expect(c?.review).toEqual({ easinessFactor: 2.5, intervalDays: 0, repetitions: 0, nextReviewDay: 0 });

    expect(events.map((event) => event.type)).toEqual([
      'session_started',
      'card_rated',
      'card_recycled',
      'card_rated',
      'card_mastered',
      'review_saved',
      'review_saved',
      'session_aborted',
    ]);
    expect(ctx.sessionEngine.getSessionState()?.phaseMessage).toBe('Session aborted: 1 of 3 cards mastered');
  });

  describe('deck removed mid-session', () => {
    beforeEach(() => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('drops the passing record and lets the next session start', async () => {
      const { deck: other } = await createTestDeck(ctx, 'French Basics', [['merci', 'thank you']]);
      await ctx.sessionEngine.startSession(deckId);
      await ctx.deckService.deleteDeck(deckId);

      const result = await ctx.sessionEngine.rateCard(cardA.id, 5);

      expect(result.passed).toBe(true);
      expect(result.nextCard?.id).toBe(cardB.id);
      expect(ctx.sessionEngine.getSessionState()?.pendingSaveCardIds).toEqual([]);

      await ctx.sessionEngine.abortSession();
      const state = await ctx.sessionEngine.startSession(other.id);
      expect(state.status).toBe('active');
      expect(ctx.sessionEngine.getCurrentCard()?.term).toBe('merci');
    });

    it('aborts cleanly after a replace-import and studies the new deck', async () => {
      const document = await ctx.exportService.exportDeck(deckId);
      await ctx.sessionEngine.startSession(deckId);
      await ctx.sessionEngine.rateCard(cardA.id, 1);

      const imported = await ctx.exportService.importDeck(document, { replaceExisting: true });
      const summary = await ctx.sessionEngine.abortSession();

      expect(imported.replaced).toBe(true);
      expect(summary.unsavedCardIds).toEqual([]);
      expect(await ctx.cardRepo.findById(cardA.id)).toBeNull();

      const state = await ctx.sessionEngine.startSession(imported.deck.id);
      expect(state.status).toBe('active');
      expect(ctx.sessionEngine.getCurrentCard()?.term).toBe('hola');
    });
  });
});
