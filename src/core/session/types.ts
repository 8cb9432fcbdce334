/**
 * Session Engine Types
 *
 * This module defines the types used by the SessionEngine for running a
 * review session over one deck's due cards:
 *
 * 1. **Storage contract**: DeckStore is the only way the engine reads cards
 *    and writes review records.
 *
 * 2. **Event tracking**: SessionEvent lets the CLI, the API and tests follow
 *    the session without polling.
 *
 * 3. **Dependencies**: SessionEngineDependencies lists the injected services.
 *
 * 4. **State views**: SessionState, RateCardResult and SessionSummary are the
 *    read-only snapshots handed to callers.
 */

import type { Flashcard, ReviewRecord } from '../models';
import type { SM2Scheduler } from '../sm2/scheduler';
import type { QualityRating } from '../sm2/types';
import type { DayProvider } from '../clock/simulated-clock';

// ============================================================================
// Storage Contract
// ============================================================================

/**
 * Persistence contract consumed by the SessionEngine.
 *
 * Implemented by FlashcardRepository for SQLite; tests substitute in-memory
 * versions.
 */
export interface DeckStore {
  /**
   * Cards of the deck whose nextReviewDay is on or before `today`, ordered
   * by nextReviewDay ascending, ties broken by insertion order.
   */
  findDueCards(deckId: string, today: number): Promise<Flashcard[]>;

  /**
   * Replaces the card's review record. Saving the same record twice has the
   * same effect as saving it once.
   *
   * @throws NotFoundError if the card does not exist; the session engine
   *         then drops the record instead of keeping it pending
   */
  saveReviewRecord(cardId: string, record: ReviewRecord): Promise<void>;
}

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * Engine lifecycle: idle before the first session, active while cards remain,
 * complete once both queues are empty or the session was aborted.
 */
export type SessionStatus = 'idle' | 'active' | 'complete';

/**
 * Which queue the session is drawing from: the initial pass over due cards,
 * or the review of cards that failed.
 */
export type SessionPhase = 'first_pass' | 'review';

// ============================================================================
// Events
// ============================================================================

/**
 * Typed event payloads, discriminated on `type`.
 */
export type SessionEventData =
  | { type: 'session_started'; deckId: string; day: number; cardCount: number }
  | { type: 'card_rated'; cardId: string; quality: QualityRating; record: ReviewRecord; attempt: number }
  | { type: 'card_recycled'; cardId: string; recycleQueueLength: number }
  | { type: 'card_mastered'; cardId: string; masteredCount: number; totalCards: number }
  | { type: 'review_saved'; cardId: string; record: ReviewRecord }
  | { type: 'review_save_failed'; cardId: string; message: string }
  | { type: 'review_discarded'; cardId: string }
  | { type: 'session_completed'; summary: SessionSummary }
  | { type: 'session_aborted'; summary: SessionSummary };

export type SessionEventType = SessionEventData['type'];

/**
 * A session event with its typed payload.
 */
export interface SessionEvent {
  type: SessionEventType;
  data: SessionEventData;
  timestamp: Date;
}

export type SessionEventListener = (event: SessionEvent) => void;

// ============================================================================
// Dependencies
// ============================================================================

/**
 * Dependencies required by SessionEngine.
 *
 * @example
 * ```typescript
 * const engine = new SessionEngine({
 *   scheduler: new SM2Scheduler(),
 *   clock,
 *   store: new FlashcardRepository(db),
 * });
 * ```
 */
export interface SessionEngineDependencies {
  /** SM-2 scheduler used for every rating */
  scheduler: SM2Scheduler;

  /** Source of the current simulated day */
  clock: DayProvider;

  /** Due-card query and review-record persistence */
  store: DeckStore;
}

// ============================================================================
// Snapshots
// ============================================================================

/**
 * Result of a single rating.
 */
export interface RateCardResult {
  cardId: string;
  quality: QualityRating;
  /** Record computed from this rating; persisted only if `passed` */
  record: ReviewRecord;
  passed: boolean;
  /** Number of times this card has been rated in the session, this one included */
  attempt: number;
  /** Card to present next, or null when the session just completed */
  nextCard: Flashcard | null;
  status: SessionStatus;
}

/**
 * Current session state for UI display and external consumers.
 * Returned by SessionEngine.getSessionState().
 */
export interface SessionState {
  status: Exclude<SessionStatus, 'idle'>;
  deckId: string;
  /** Simulated day the session was started on */
  day: number;
  phase: SessionPhase;
  /** Progress line such as "Round 1: 4 cards" or "Review: 2 cards to retry" */
  phaseMessage: string;
  currentCard: Flashcard | null;
  /** Card ids still waiting for their first rating, in order */
  primaryQueue: string[];
  /** Failed card ids waiting for another attempt, in order */
  recycleQueue: string[];
  masteredCardIds: string[];
  /** Cards whose latest record could not be saved yet */
  pendingSaveCardIds: string[];
  totalCards: number;
  masteredCount: number;
  remainingCount: number;
}

/**
 * Totals for a finished (or running) session.
 */
export interface SessionSummary {
  deckId: string;
  day: number;
  totalCards: number;
  masteredCards: number;
  totalAttempts: number;
  failedAttempts: number;
  /** True if the session ended through abortSession() */
  aborted: boolean;
  /** Cards that were never passed in this session */
  unmasteredCardIds: string[];
  /** Cards whose latest record is still waiting to be saved */
  unsavedCardIds: string[];
}
