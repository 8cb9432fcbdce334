/**
 * Core Domain Models - Barrel Export
 *
 * Re-exports all domain types for convenient importing. These types form the
 * contract between the scheduler, the session engine, storage and the outer
 * surfaces, and have no runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { Deck, Flashcard, ReviewRecord } from '@/core/models';
 * ```
 */

// ReviewRecord - SM-2 scheduling state of a card
export type { ReviewRecord } from './review-record';

// Deck types - decks, cards and listing summaries
export type { Deck, Flashcard, DeckSummary, DeckWithSummary } from './deck';
