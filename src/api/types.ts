/**
 * API Response Types
 *
 * Every endpoint answers with one of two envelopes, so clients can branch on
 * `success` before touching the payload:
 *
 * @example
 * ```typescript
 * // Success response
 * const response: ApiResponse<DeckWithSummary[]> = {
 *   success: true,
 *   data: [{ id: 'deck_1', name: 'Spanish Basics', ... }],
 * };
 *
 * // Error response
 * const error: ApiErrorResponse = {
 *   success: false,
 *   error: { code: 'NOT_FOUND', message: "Deck with id 'deck_1' not found" },
 * };
 * ```
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

/**
 * Standard success response wrapper.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/**
 * Error information carried by a failed response.
 */
export interface ApiError {
  /** Machine-readable error code, e.g. 'INVALID_RATING' */
  code: string;
  /** Human-readable description */
  message: string;
  /** Optional structured details, such as validation issues */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

/**
 * One failed field of a request body.
 */
export interface ValidationErrorDetail {
  /** Dotted path to the field, e.g. 'quality' */
  path: string;
  message: string;
}

// ============================================================================
// Request Body Schemas
// ============================================================================

/**
 * POST /api/decks
 *
 * Blank names pass this schema and are rejected by DeckService, so the
 * message is the same for the API and the CLI.
 */
export const createDeckSchema = z.object({
  name: z.string({ required_error: 'name is required' }),
});

/**
 * POST /api/decks/:id/cards
 */
export const addCardSchema = z.object({
  term: z.string({ required_error: 'term is required' }),
  definition: z.string({ required_error: 'definition is required' }),
});

/**
 * POST /api/decks/import
 *
 * `document` is either the parsed export document or its JSON text; its
 * contents are validated by ExportService.
 */
export const importDeckSchema = z.object({
  document: z.unknown(),
  replaceExisting: z.boolean().optional(),
});

/**
 * POST /api/session/start
 */
export const startSessionSchema = z.object({
  deckId: z.string().min(1, 'deckId is required'),
});

/**
 * POST /api/session/rate
 *
 * Any number is accepted here; the engine rejects qualities outside 0-5
 * with INVALID_RATING.
 */
export const rateCardSchema = z.object({
  cardId: z.string().min(1, 'cardId is required'),
  quality: z.number({ required_error: 'quality is required' }),
});

export type CreateDeckBody = z.infer<typeof createDeckSchema>;
export type AddCardBody = z.infer<typeof addCardSchema>;
export type ImportDeckBody = z.infer<typeof importDeckSchema>;
export type StartSessionBody = z.infer<typeof startSessionSchema>;
export type RateCardBody = z.infer<typeof rateCardSchema>;
