/**
 * Test Helpers
 *
 * Data factories and response helpers shared by the integration tests.
 */

import type { Hono } from 'hono';
import { vi } from 'vitest';
import { z } from 'zod';
import type { Deck, Flashcard } from '../src/core/models';
import type { TestContext } from './setup';
import { stripAnsi } from '../src/cli/utils/terminal';

// ============================================================================
// Data Factories
// ============================================================================

/**
 * Creates a deck and adds the given [term, definition] pairs in order.
 */
export async function createTestDeck(
  ctx: TestContext,
  name: string,
  cards: [string, string][] = []
): Promise<{ deck: Deck; cards: Flashcard[] }> {
  const deck = await ctx.deckService.createDeck(name);
  const created: Flashcard[] = [];
  for (const [term, definition] of cards) {
    created.push(await ctx.deckService.addCard(deck.id, term, definition));
  }
  return { deck, cards: created };
}

// ============================================================================
// Console Capture
// ============================================================================

export interface CapturedOutput {
  /** Every console.log call so far, arguments joined by spaces, colors removed */
  lines(): string[];
  /** All lines joined with newlines */
  text(): string;
}

/**
 * Replaces console.log with a spy that records what the CLI prints.
 * Restore with vi.restoreAllMocks().
 */
export function captureConsole(): CapturedOutput {
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  const lines = () => logSpy.mock.calls.map((args) => stripAnsi(args.map(String).join(' ')));
  return { lines, text: () => lines().join('\n') };
}

// ============================================================================
// HTTP Helpers
// ============================================================================

/**
 * Sends a request to the app, JSON-encoding `body` when given.
 */
export async function sendJson(
  app: Hono,
  method: string,
  path: string,
  body?: unknown
): Promise<Response> {
  if (body === undefined) {
    return app.request(path, { method });
  }
  return app.request(path, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

const envelopeSchema = z.union([
  z.object({ success: z.literal(true), data: z.unknown() }),
  z.object({
    success: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    }),
  }),
]);

export type ApiEnvelope = z.infer<typeof envelopeSchema>;

/**
 * Parses a response body as an API envelope.
 */
export async function readEnvelope(response: Response): Promise<ApiEnvelope> {
  return envelopeSchema.parse(await response.json());
}

/**
 * Parses a success response and validates its data with `schema`.
 *
 * @throws Error if the response is an error envelope
 */
export async function readData<T>(response: Response, schema: z.ZodType<T>): Promise<T> {
  const envelope = await readEnvelope(response);
  if (!envelope.success) {
    throw new Error(`Expected success response but got: ${JSON.stringify(envelope)}`);
  }
  return schema.parse(envelope.data);
}

/**
 * Parses an error response and returns its error object.
 *
 * @throws Error if the response is a success envelope
 */
export async function readError(
  response: Response
): Promise<{ code: string; message: string; details?: unknown }> {
  const envelope = await readEnvelope(response);
  if (envelope.success) {
    throw new Error(`Expected error response but got success: ${JSON.stringify(envelope)}`);
  }
  return envelope.error;
}
