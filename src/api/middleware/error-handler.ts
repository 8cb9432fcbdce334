/**
 * Error Handler for the Spaced Review API
 *
 * Turns every thrown error into the standard error envelope:
 *
 * - DomainError subclasses from the core keep their code and get the HTTP
 *   status their code maps to (INVALID_RATING 400, NOT_FOUND 404, ...)
 * - AppError carries a code and status for errors that exist only in HTTP
 * - anything else is a 500; its message and stack are shown outside
 *   production only
 *
 * Registered with `app.onError`, so errors thrown by route handlers and by
 * other middleware reach it.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * router.get('/:id', async (c) => {
 *   // NotFoundError becomes a 404 { code: 'NOT_FOUND' } response
 *   return success(c, await deckService.getDeck(c.req.param('id')));
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  DomainError,
  DomainErrorCodes,
  ImportValidationError,
  PersistenceError,
  type DomainErrorCode,
} from '@/core/errors';
import type { ApiErrorResponse } from '../types';

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Codes used by the API itself, on top of the domain codes.
 */
export const ErrorCodes = {
  ...DomainErrorCodes,
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_JSON: 'INVALID_JSON',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status for each domain error code.
 */
export const DOMAIN_ERROR_STATUS: Record<DomainErrorCode, ContentfulStatusCode> = {
  INVALID_RATING: 400,
  VALIDATION_ERROR: 400,
  INVALID_IMPORT: 400,
  NOT_FOUND: 404,
  INVALID_SESSION_OPERATION: 409,
  CONFLICT: 409,
  PERSISTENCE_FAILURE: 503,
};

// ============================================================================
// AppError
// ============================================================================

/**
 * An error raised by the HTTP layer with an explicit status.
 *
 * @example
 * ```typescript
 * throw new AppError(ErrorCodes.BAD_REQUEST, 'Unsupported export format', 400);
 * ```
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Structured details for domain errors that carry more than a message.
 */
function domainErrorDetails(error: DomainError): unknown {
  if (error instanceof ImportValidationError) {
    return { issues: error.issues };
  }
  if (error instanceof PersistenceError && error.cardIds.length > 0) {
    return { cardIds: error.cardIds };
  }
  return undefined;
}

/**
 * Builds the response body and status for any thrown value.
 *
 * @param error - The thrown value
 * @param isProduction - Hides internal messages and stacks when true
 */
export function formatErrorResponse(
  error: unknown,
  isProduction: boolean = process.env.NODE_ENV === 'production'
): { response: ApiErrorResponse; statusCode: ContentfulStatusCode } {
  if (error instanceof DomainError) {
    const details = domainErrorDetails(error);
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(details !== undefined && { details }),
        },
      },
      statusCode: DOMAIN_ERROR_STATUS[error.code],
    };
  }

  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isProduction
            ? 'An unexpected error occurred. Please try again.'
            : error.message,
          ...(!isProduction && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  // Non-Error throws
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(!isProduction && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Creates the application's error handler.
 *
 * Expected client errors (4xx) are logged as one line; server errors are
 * logged with the error itself.
 */
export function errorHandler(isProduction?: boolean): ErrorHandler {
  return (err, c) => {
    const { response, statusCode } = formatErrorResponse(err, isProduction);

    if (statusCode >= 500) {
      console.error('[Error Handler]', err);
    } else {
      console.warn(`[Error Handler] ${c.req.method} ${c.req.path}: ${response.error.code} ${response.error.message}`);
    }

    return c.json(response, statusCode);
  };
}
