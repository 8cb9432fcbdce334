/**
 * Database Schema Definitions for Spaced Review
 *
 * Drizzle ORM schema definitions for SQLite:
 * - Decks: named collections of flashcards
 * - Flashcards: term/definition pairs with their SM-2 review record
 *   flattened into columns
 * - App State: key/value pairs for process-wide values such as the
 *   simulated current day
 *
 * Creation and modification timestamps are stored as milliseconds since
 * epoch (integer). Review days are plain integers on the simulated calendar.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';

/**
 * Decks Table
 *
 * Deck names are unique regardless of case; lookups go through LOWER().
 */
export const decks = sqliteTable(
  'decks',
  {
    // Unique identifier for the deck (prefixed UUID, e.g. 'deck_...')
    id: text('id').primaryKey(),

    // Human-readable deck name (e.g., "Spanish Basics")
    name: text('name').notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('decks_name_unique').on(table.name)]
);

/**
 * Flashcards Table
 *
 * Each row carries the card's current SM-2 review record. A term appears at
 * most once per deck, and deleting a deck deletes its cards.
 */
export const flashcards = sqliteTable(
  'flashcards',
  {
    // Unique identifier for the card (prefixed UUID, e.g. 'card_...')
    id: text('id').primaryKey(),

    // Owning deck; cards are removed together with their deck
    deckId: text('deck_id')
      .notNull()
      .references(() => decks.id, { onDelete: 'cascade' }),

    // Prompt shown to the learner
    term: text('term').notNull(),

    // Answer revealed after the recall attempt
    definition: text('definition').notNull(),

    // === SM-2 review record ===
    easinessFactor: real('easiness_factor').notNull().default(2.5),
    intervalDays: integer('interval_days').notNull().default(0),
    repetitions: integer('repetitions').notNull().default(0),
    nextReviewDay: integer('next_review_day').notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('flashcards_deck_term_unique').on(table.deckId, table.term),
    index('flashcards_deck_due_idx').on(table.deckId, table.nextReviewDay),
  ]
);

/**
 * App State Table
 *
 * Small key/value store. The simulated clock keeps its day under
 * 'current_day'.
 */
export const appState = sqliteTable('app_state', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
});

// Type exports for type-safe database operations
export type DeckRow = typeof decks.$inferSelect;
export type NewDeckRow = typeof decks.$inferInsert;

export type FlashcardRow = typeof flashcards.$inferSelect;
export type NewFlashcardRow = typeof flashcards.$inferInsert;

export type AppStateRow = typeof appState.$inferSelect;
