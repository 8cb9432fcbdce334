/**
 * Deck Repository Implementation
 *
 * Data access for Deck entities, plus the one multi-table write in the
 * application: creating a deck together with its cards (used by import),
 * optionally replacing an existing deck, in a single transaction.
 */

import { asc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { decks, flashcards } from '../schema';
import type { Deck, Flashcard } from '@/core/models';
import type { DeckCatalog, NewDeck } from '@/core/decks/types';
import { ConflictError, NotFoundError } from '@/core/errors';
import { isUniqueViolation, type Repository } from './base';
import { mapFlashcardToDomain, type CreateFlashcardInput } from './flashcard.repository';

/**
 * Input type for creating a new Deck.
 */
export type CreateDeckInput = NewDeck;

/**
 * A deck and its cards, as returned by createWithCards.
 */
export interface DeckWithCards {
  deck: Deck;
  cards: Flashcard[];
}

function mapToDomain(row: typeof decks.$inferSelect): Deck {
  return {
    id: row.id,
    name: row.name,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for Deck entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new DeckRepository(db);
 *
 * const deck = await repo.create({ id: 'deck_' + randomUUID(), name: 'Spanish Basics' });
 *
 * // Find by name (case-insensitive)
 * const found = await repo.findByName('spanish basics');
 * ```
 */
export class DeckRepository implements Repository<Deck, CreateDeckInput>, DeckCatalog {
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<Deck | null> {
    const result = await this.db.select().from(decks).where(eq(decks.id, id)).limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves all decks ordered by name.
   */
  async findAll(): Promise<Deck[]> {
    const results = await this.db.select().from(decks).orderBy(asc(decks.name));
    return results.map(mapToDomain);
  }

  /**
   * Finds a deck by name, ignoring case.
   *
   * @example
   * ```typescript
   * // Both find "Spanish Basics"
   * await repo.findByName('Spanish Basics');
   * await repo.findByName('SPANISH BASICS');
   * ```
   */
  async findByName(name: string): Promise<Deck | null> {
    // SQLite's LOWER() for case-insensitive comparison
    const result = await this.db
      .select()
      .from(decks)
      .where(sql`LOWER(${decks.name}) = LOWER(${name})`)
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * @throws ConflictError if the name is already taken
   */
  async create(input: CreateDeckInput): Promise<Deck> {
    const now = new Date();

    try {
      const result = await this.db
        .insert(decks)
        .values({ id: input.id, name: input.name, createdAt: now, updatedAt: now })
        .returning();

      return mapToDomain(result[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A deck named '${input.name}' already exists`);
      }
      throw error;
    }
  }

  /**
   * Deletes a deck and, through the cascading foreign key, all its cards.
   *
   * @throws NotFoundError if the deck does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(decks)
      .where(eq(decks.id, id))
      .returning({ id: decks.id });

    if (result.length === 0) {
      throw new NotFoundError('Deck', id);
    }
  }

  /**
   * Creates a deck and all of its cards atomically. When `replaceDeckId` is
   * given, that deck (and its cards) is deleted in the same transaction.
   *
   * @param input - The deck to create
   * @param cards - Cards to create in the deck, in order
   * @param replaceDeckId - Optional deck to delete first
   * @throws ConflictError if the deck name or a term is already taken
   */
  async createWithCards(
    input: CreateDeckInput,
    cards: Omit<CreateFlashcardInput, 'deckId'>[],
    replaceDeckId?: string
  ): Promise<DeckWithCards> {
    const now = new Date();

    try {
      // better-sqlite3 transactions are synchronous
      return this.db.transaction((tx) => {
        if (replaceDeckId !== undefined) {
          tx.delete(decks).where(eq(decks.id, replaceDeckId)).run();
        }

        const [deckRow] = tx
          .insert(decks)
          .values({ id: input.id, name: input.name, createdAt: now, updatedAt: now })
          .returning()
          .all();

        const cardRows = cards.map((card) =>
          tx
            .insert(flashcards)
            .values({
              id: card.id,
              deckId: deckRow.id,
              term: card.term,
              definition: card.definition,
              easinessFactor: card.review.easinessFactor,
              intervalDays: card.review.intervalDays,
              repetitions: card.review.repetitions,
              nextReviewDay: card.review.nextReviewDay,
              createdAt: now,
              updatedAt: now,
            })
            .returning()
            .all()
        ).flat();

        return {
          deck: mapToDomain(deckRow),
          cards: cardRows.map(mapFlashcardToDomain),
        };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          `Deck '${input.name}' conflicts with an existing deck or contains a duplicate term`
        );
      }
      throw error;
    }
  }
}
