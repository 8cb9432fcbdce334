/**
 * Response helpers that wrap payloads in the standard envelopes of ../types.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * Sends `{ success: true, data }`.
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => success(c, await deckService.createDeck(name), 201));
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

/**
 * Sends `{ success: false, error: { code, message, details? } }`.
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
