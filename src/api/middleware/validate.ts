/**
 * Request Body Validation Middleware
 *
 * Parses the JSON body against a Zod schema before the route handler runs.
 * The parsed value is stored as the `validatedBody` context variable, typed
 * from the schema for the handler that follows the middleware:
 *
 * @example
 * ```typescript
 * router.post('/', validate(createDeckSchema), async (c) => {
 *   const { name } = c.get('validatedBody');
 *   return success(c, await deckService.createDeck(name), 201);
 * });
 * ```
 *
 * Failures are thrown as AppError and rendered by the error handler:
 * - malformed JSON: 400 INVALID_JSON
 * - schema mismatch: 400 VALIDATION_ERROR with one detail per issue
 */

import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';
import { AppError, ErrorCodes } from './error-handler';
import type { ValidationErrorDetail } from '../types';

/**
 * Context variables set by validate().
 */
export interface ValidatedBodyEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Converts Zod issues into response details.
 */
export function toValidationDetails(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Creates a middleware that validates the JSON request body.
 *
 * @param schema - Zod schema the body must satisfy
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T
): MiddlewareHandler<ValidatedBodyEnv<z.infer<T>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400);
      }
      throw err;
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new AppError(
        ErrorCodes.VALIDATION_ERROR,
        'Invalid request body',
        400,
        toValidationDetails(result.error)
      );
    }

    c.set('validatedBody', result.data);
    await next();
  };
}
