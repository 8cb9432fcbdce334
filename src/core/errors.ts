/**
 * Domain Errors
 *
 * Every failure the core can report is a subclass of DomainError carrying a
 * machine-readable `code`. The API error handler maps these codes to HTTP
 * statuses, and the CLI prints the message. All of them are recoverable: the
 * operation that raised one either made no change, or (for PersistenceError)
 * left its computed result pending for a retry.
 *
 * @example
 * ```typescript
 * try {
 *   await engine.rateCard(cardId, quality);
 * } catch (error) {
 *   if (error instanceof PersistenceError) {
 *     console.warn('Unsaved cards:', error.cardIds);
 *   }
 * }
 * ```
 */

/**
 * Machine-readable codes for every DomainError subclass.
 */
export const DomainErrorCodes = {
  INVALID_RATING: 'INVALID_RATING',
  INVALID_SESSION_OPERATION: 'INVALID_SESSION_OPERATION',
  PERSISTENCE_FAILURE: 'PERSISTENCE_FAILURE',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INVALID_IMPORT: 'INVALID_IMPORT',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type DomainErrorCode = (typeof DomainErrorCodes)[keyof typeof DomainErrorCodes];

/**
 * Base class for all errors raised by the core.
 */
export abstract class DomainError extends Error {
  /** Machine-readable error code */
  public readonly code: DomainErrorCode;

  protected constructor(code: DomainErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A quality rating outside the integers 0..5 was supplied.
 * Raised before any state is touched.
 */
export class InvalidRatingError extends DomainError {
  public readonly quality: unknown;

  constructor(quality: unknown) {
    super(
      DomainErrorCodes.INVALID_RATING,
      `Quality rating must be an integer from 0 to 5, got ${String(quality)}`
    );
    this.quality = quality;
  }
}

/**
 * An operation was attempted in a session state that does not allow it:
 * rating with no active session, rating a card that is not queued, or
 * starting a session while one is active or has unsaved records.
 */
export class InvalidSessionOperationError extends DomainError {
  constructor(message: string) {
    super(DomainErrorCodes.INVALID_SESSION_OPERATION, message);
  }
}

/**
 * A write to the store failed. The in-memory result is kept and the listed
 * cards remain pending until a retry succeeds.
 */
export class PersistenceError extends DomainError {
  /** Cards whose records could not be saved (empty for non-card writes) */
  public readonly cardIds: string[];

  constructor(message: string, cardIds: string[] = [], cause?: unknown) {
    super(DomainErrorCodes.PERSISTENCE_FAILURE, message, cause);
    this.cardIds = cardIds;
  }
}

/**
 * A deck or card with the given identifier does not exist.
 */
export class NotFoundError extends DomainError {
  public readonly resource: string;
  public readonly id: string;

  constructor(resource: string, id: string) {
    super(DomainErrorCodes.NOT_FOUND, `${resource} with id '${id}' not found`);
    this.resource = resource;
    this.id = id;
  }
}

/**
 * A deck name or a term within a deck is already taken.
 */
export class ConflictError extends DomainError {
  constructor(message: string) {
    super(DomainErrorCodes.CONFLICT, message);
  }
}

/**
 * A deck name, term or definition was empty or otherwise unusable.
 */
export class ValidationError extends DomainError {
  constructor(message: string) {
    super(DomainErrorCodes.VALIDATION_ERROR, message);
  }
}

/**
 * One problem found while validating an import document.
 */
export interface ImportIssue {
  /** Dotted path into the document, e.g. 'flashcards.2.term' */
  path: string;
  message: string;
}

/**
 * An import document was malformed. No deck or card was created.
 */
export class ImportValidationError extends DomainError {
  public readonly issues: ImportIssue[];

  constructor(issues: ImportIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(DomainErrorCodes.INVALID_IMPORT, `Invalid deck document: ${summary}`);
    this.issues = issues;
  }
}
