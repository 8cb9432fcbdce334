/**
 * Flashcard Repository Implementation
 *
 * Data access for Flashcard entities. The card's review record lives in four
 * columns of the flashcards table; this repository assembles them into the
 * nested ReviewRecord of the domain model and back.
 *
 * The repository is also the SQLite implementation of the session engine's
 * DeckStore contract: `findDueCards` and `saveReviewRecord`.
 */

import { and, asc, count, eq, lte, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { flashcards } from '../schema';
import type { Flashcard, ReviewRecord } from '@/core/models';
import type { DeckStore } from '@/core/session/types';
import type { CardCatalog, NewFlashcard } from '@/core/decks/types';
import { ConflictError, NotFoundError } from '@/core/errors';
import { isUniqueViolation, type Repository } from './base';

/**
 * Input type for creating a new Flashcard. New cards get
 * SM2Scheduler.createInitialRecord() as their review record.
 */
export type CreateFlashcardInput = NewFlashcard;

/**
 * Maps a database row to a Flashcard domain model, nesting the review
 * columns into a ReviewRecord.
 */
export function mapFlashcardToDomain(row: typeof flashcards.$inferSelect): Flashcard {
  return {
    id: row.id,
    deckId: row.deckId,
    term: row.term,
    definition: row.definition,
    review: {
      easinessFactor: row.easinessFactor,
      intervalDays: row.intervalDays,
      repetitions: row.repetitions,
      nextReviewDay: row.nextReviewDay,
    },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

// Rows come back in insertion order when no other key decides
const insertionOrder = sql`rowid`;

/**
 * Repository for Flashcard entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new FlashcardRepository(db);
 *
 * // Cards due on day 3, most overdue first
 * const due = await repo.findDueCards('deck_abc123', 3);
 *
 * // Persist the outcome of a review
 * await repo.saveReviewRecord('card_xyz789', {
 *   easinessFactor: 2.5,
 *   intervalDays: 1,
 *   repetitions: 1,
 *   nextReviewDay: 4,
 * });
 * ```
 */
export class FlashcardRepository
  implements Repository<Flashcard, CreateFlashcardInput>, CardCatalog, DeckStore
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Flashcard | null> {
    const result = await this.db
      .select()
      .from(flashcards)
      .where(eq(flashcards.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapFlashcardToDomain(result[0]);
  }

  /**
   * Retrieves every card of a deck in the order they were added.
   */
  async findByDeckId(deckId: string): Promise<Flashcard[]> {
    const results = await this.db
      .select()
      .from(flashcards)
      .where(eq(flashcards.deckId, deckId))
      .orderBy(insertionOrder);

    return results.map(mapFlashcardToDomain);
  }

  /**
   * Finds the card with an exact term within a deck.
   */
  async findByTerm(deckId: string, term: string): Promise<Flashcard | null> {
    const result = await this.db
      .select()
      .from(flashcards)
      .where(and(eq(flashcards.deckId, deckId), eq(flashcards.term, term)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapFlashcardToDomain(result[0]);
  }

  /**
   * Finds the cards of a deck that are due on `today`: nextReviewDay on or
   * before it, ordered by nextReviewDay and then by insertion order.
   */
  async findDueCards(deckId: string, today: number): Promise<Flashcard[]> {
    const results = await this.db
      .select()
      .from(flashcards)
      .where(and(eq(flashcards.deckId, deckId), lte(flashcards.nextReviewDay, today)))
      .orderBy(asc(flashcards.nextReviewDay), insertionOrder);

    return results.map(mapFlashcardToDomain);
  }

  /**
   * Counts a deck's cards, and how many of them are due on `today`.
   */
  async countByDeck(deckId: string, today: number): Promise<{ total: number; due: number }> {
    const [totals] = await this.db
      .select({ total: count() })
      .from(flashcards)
      .where(eq(flashcards.deckId, deckId));

    const [due] = await this.db
      .select({ due: count() })
      .from(flashcards)
      .where(and(eq(flashcards.deckId, deckId), lte(flashcards.nextReviewDay, today)));

    return { total: totals?.total ?? 0, due: due?.due ?? 0 };
  }

  /**
   * @throws ConflictError if the deck already has a card with this term
   */
  async create(input: CreateFlashcardInput): Promise<Flashcard> {
    const now = new Date();

    try {
      const result = await this.db
        .insert(flashcards)
        .values({
          id: input.id,
          deckId: input.deckId,
          term: input.term,
          definition: input.definition,
          easinessFactor: input.review.easinessFactor,
          intervalDays: input.review.intervalDays,
          repetitions: input.review.repetitions,
          nextReviewDay: input.review.nextReviewDay,
          createdAt: now,
          updatedAt: now,
        })
        .returning();

      return mapFlashcardToDomain(result[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`The deck already has a card with the term '${input.term}'`);
      }
      throw error;
    }
  }

  /**
   * Replaces the four review columns of a card. Writing the same record
   * again leaves the row's review state unchanged.
   *
   * @returns The updated card
   * @throws NotFoundError if the card does not exist
   */
  async updateReviewRecord(cardId: string, record: ReviewRecord): Promise<Flashcard> {
    const result = await this.db
      .update(flashcards)
      .set({
        easinessFactor: record.easinessFactor,
        intervalDays: record.intervalDays,
        repetitions: record.repetitions,
        nextReviewDay: record.nextReviewDay,
        updatedAt: new Date(),
      })
      .where(eq(flashcards.id, cardId))
      .returning();

    if (result.length === 0) {
      throw new NotFoundError('Flashcard', cardId);
    }

    return mapFlashcardToDomain(result[0]);
  }

  /**
   * DeckStore implementation used by the session engine.
   */
  async saveReviewRecord(cardId: string, record: ReviewRecord): Promise<void> {
    await this.updateReviewRecord(cardId, record);
  }
}
