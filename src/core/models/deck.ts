/**
 * Deck and Flashcard Domain Types
 *
 * A Deck is a named collection of flashcards. Deck names are unique, and
 * lookups by name ignore case. Within a deck each term appears at most once.
 *
 * This module contains only pure TypeScript types with no runtime dependencies.
 */

import type { ReviewRecord } from './review-record';

/**
 * A named collection of flashcards.
 *
 * @example
 * ```typescript
 * const deck: Deck = {
 *   id: 'deck_abc123',
 *   name: 'Spanish Basics',
 *   createdAt: new Date('2024-01-15'),
 *   updatedAt: new Date('2024-01-15'),
 * };
 * ```
 */
export interface Deck {
  /** Unique identifier, a prefixed UUID such as 'deck_abc123' */
  id: string;

  /** Human-readable, unique deck name */
  name: string;

  createdAt: Date;

  updatedAt: Date;
}

/**
 * A single term/definition pair together with its scheduling state.
 */
export interface Flashcard {
  /** Unique identifier, a prefixed UUID such as 'card_xyz789' */
  id: string;

  /** ID of the owning deck */
  deckId: string;

  /** Prompt shown to the learner (front of the card) */
  term: string;

  /** Answer revealed after the learner attempts recall (back of the card) */
  definition: string;

  /** Current SM-2 state; replaced wholesale on every persisted review */
  review: ReviewRecord;

  createdAt: Date;

  updatedAt: Date;
}

/**
 * Card counts shown next to a deck in listings.
 */
export interface DeckSummary {
  /** Number of cards in the deck */
  totalCards: number;

  /** Cards whose nextReviewDay is on or before the current simulated day */
  dueCards: number;
}

/**
 * A deck decorated with its summary counts.
 */
export interface DeckWithSummary extends Deck {
  summary: DeckSummary;
}
