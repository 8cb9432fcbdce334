/**
 * Base Repository Interface for Spaced Review
 *
 * This module defines the generic repository interface that entity
 * repositories implement. The Repository pattern keeps Drizzle queries out of
 * business logic: services and the session engine work with domain models and
 * never see database rows.
 */

import Database from 'better-sqlite3';

/**
 * Lookup by id and creation, shared by every entity repository.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 *
 * @example
 * ```typescript
 * class DeckRepository implements Repository<Deck, CreateDeckInput> {
 *   async findById(id: string): Promise<Deck | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T, CreateInput> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Creates a new entity and persists it to the database.
   *
   * @returns The created domain model with timestamps
   */
  create(input: CreateInput): Promise<T>;
}

/**
 * Whether an error raised by a write is a UNIQUE constraint violation.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return error.code === 'SQLITE_CONSTRAINT_UNIQUE';
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isUniqueViolation(error.cause);
  }
  return false;
}
