/**
 * Repository Layer - Barrel Export
 *
 * Each repository provides:
 * - Lookup by id and creation (the shared Repository interface)
 * - Entity-specific queries (e.g., findByName, findDueCards)
 * - Mapping between DB rows and domain models
 *
 * @example
 * ```typescript
 * import {
 *   DeckRepository,
 *   FlashcardRepository,
 *   AppStateRepository,
 * } from '@/storage/repositories';
 *
 * const deckRepo = new DeckRepository(db);
 * const cardRepo = new FlashcardRepository(db);
 * const appStateRepo = new AppStateRepository(db);
 * ```
 */

// Base repository interface
export { type Repository, isUniqueViolation } from './base';

// Deck repository and types
export {
  DeckRepository,
  type CreateDeckInput,
  type DeckWithCards,
} from './deck.repository';

// Flashcard repository and types
export {
  FlashcardRepository,
  mapFlashcardToDomain,
  type CreateFlashcardInput,
} from './flashcard.repository';

// Key/value app state, including the simulated clock's day
export { AppStateRepository, CURRENT_DAY_KEY } from './app-state.repository';
