/**
 * Deck Export Types for Spaced Review
 *
 * A deck is exported as a single JSON document holding its name and every
 * card with its full review record, so an export followed by an import
 * restores the deck exactly. Documents written by hand may leave out
 * `version` and any card's `review`; such cards start fresh on import.
 *
 * @example
 * ```json
 * {
 *   "version": 1,
 *   "name": "Spanish Basics",
 *   "flashcards": [
 *     {
 *       "term": "hola",
 *       "definition": "hello",
 *       "review": { "easinessFactor": 2.5, "intervalDays": 0, "repetitions": 0, "nextReviewDay": 0 }
 *     }
 *   ]
 * }
 * ```
 */

import { z } from 'zod';
import type { Deck } from '../models';

/** Current document format version */
export const DECK_EXPORT_VERSION = 1;

/**
 * Review record as stored in a document. Mirrors the invariants of
 * ReviewRecord: easiness factor at least 1.3, non-negative counters, and an
 * interval of at least one day once a card has been passed.
 */
export const reviewRecordSchema = z
  .object({
    easinessFactor: z.number().finite().min(1.3),
    intervalDays: z.number().int().min(0),
    repetitions: z.number().int().min(0),
    nextReviewDay: z.number().int().min(0),
  })
  .refine((record) => record.repetitions === 0 || record.intervalDays >= 1, {
    message: 'intervalDays must be at least 1 once repetitions is positive',
    path: ['intervalDays'],
  });

export const exportedCardSchema = z.object({
  term: z.string().trim().min(1, 'term must not be empty'),
  definition: z.string().trim().min(1, 'definition must not be empty'),
  review: reviewRecordSchema.optional(),
});

export const deckExportSchema = z
  .object({
    version: z.literal(DECK_EXPORT_VERSION).optional(),
    name: z.string().trim().min(1, 'name must not be empty'),
    flashcards: z.array(exportedCardSchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.flashcards.forEach((card, index) => {
      if (seen.has(card.term)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate term '${card.term}'`,
          path: ['flashcards', index, 'term'],
        });
      }
      seen.add(card.term);
    });
  });

export type ExportedCard = z.infer<typeof exportedCardSchema>;

/**
 * A validated deck document.
 */
export type DeckExport = z.infer<typeof deckExportSchema>;

/**
 * Options for importDeck.
 */
export interface ImportOptions {
  /**
   * Replace a deck that already has the document's name (ignoring case).
   * Without it, such an import fails with ConflictError.
   * Default: false
   */
  replaceExisting?: boolean;
}

/**
 * Outcome of an import.
 */
export interface ImportResult {
  deck: Deck;
  cardCount: number;
  /** True when an existing deck of the same name was replaced */
  replaced: boolean;
}
