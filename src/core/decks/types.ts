/**
 * Storage contracts used by DeckService and ExportService.
 *
 * The SQLite repositories implement these; core code never imports them
 * directly.
 */

import type { Deck, Flashcard, ReviewRecord } from '../models';

export interface NewDeck {
  /** Prefixed id, e.g. 'deck_3f2a...' */
  id: string;
  name: string;
}

export interface NewFlashcard {
  /** Prefixed id, e.g. 'card_9b1c...' */
  id: string;
  deckId: string;
  term: string;
  definition: string;
  review: ReviewRecord;
}

/**
 * Persistence of decks.
 */
export interface DeckCatalog {
  findById(id: string): Promise<Deck | null>;

  /** Case-insensitive */
  findByName(name: string): Promise<Deck | null>;

  /** Ordered by name */
  findAll(): Promise<Deck[]>;

  /** @throws ConflictError if the name is taken */
  create(input: NewDeck): Promise<Deck>;

  /**
   * Deletes the deck and its cards.
   *
   * @throws NotFoundError if the deck does not exist
   */
  delete(id: string): Promise<void>;

  /**
   * Creates a deck with its cards in one transaction, deleting
   * `replaceDeckId` first when given.
   *
   * @throws ConflictError if the name or a term is taken
   */
  createWithCards(
    deck: NewDeck,
    cards: Omit<NewFlashcard, 'deckId'>[],
    replaceDeckId?: string
  ): Promise<{ deck: Deck; cards: Flashcard[] }>;
}

/**
 * Persistence of cards, queried per deck.
 */
export interface CardCatalog {
  /** In the order they were added */
  findByDeckId(deckId: string): Promise<Flashcard[]>;

  findByTerm(deckId: string, term: string): Promise<Flashcard | null>;

  /** Cards with `nextReviewDay <= today`, earliest due first */
  findDueCards(deckId: string, today: number): Promise<Flashcard[]>;

  countByDeck(deckId: string, today: number): Promise<{ total: number; due: number }>;

  /** @throws ConflictError if the deck already has the term */
  create(input: NewFlashcard): Promise<Flashcard>;
}
