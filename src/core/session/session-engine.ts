/**
 * Session Engine - Review Session State Machine
 *
 * The SessionEngine runs one review session at a time over a deck's due
 * cards:
 *
 * 1. **Start**: loads the cards due today, in due order, into the primary
 *    queue. A deck with nothing due completes immediately.
 *
 * 2. **Rating**: each rating runs the SM-2 scheduler on the card's latest
 *    record. A failing rating (below 3) sends the card to the back of the
 *    recycle queue without saving anything; a passing rating masters the card
 *    and saves its record.
 *
 * 3. **Completion**: the session completes when both queues are empty, so
 *    every due card is passed exactly once before the session ends.
 *
 * 4. **Abort**: stopping early saves the latest computed record of every
 *    card that was rated but never passed. This is a partial commit: the
 *    failures the learner produced are kept, cards never shown are untouched.
 *
 * Session Flow:
 * ```
 *            startSession()
 *   idle ──────────────────────▶ active ──── rateCard() ───┐
 *     ▲                           │  ▲                     │
 *     │                           │  └─── cards remain ────┘
 *     │      queues empty or      ▼
 *     └──── abortSession() ──▶ complete ── startSession() ──▶ active
 * ```
 *
 * A recycled card is scheduled from the record its previous attempt
 * produced, so two fails in a row compound their easiness penalty. Only the
 * final record per card is ever written.
 *
 * @example
 * ```typescript
 * const engine = new SessionEngine({ scheduler, clock, store });
 *
 * await engine.startSession(deck.id);
 *
 * let card = engine.getCurrentCard();
 * while (card) {
 *   const quality = await askLearner(card);
 *   const result = await engine.rateCard(card.id, quality);
 *   card = result.nextCard;
 * }
 *
 * console.log(engine.getSummary());
 * ```
 */

import type { Flashcard, ReviewRecord } from '../models';
import type { SM2Scheduler } from '../sm2/scheduler';
import { assertQualityRating, isPassingRating } from '../sm2/types';
import type { DayProvider } from '../clock/simulated-clock';
import { InvalidSessionOperationError, NotFoundError, PersistenceError } from '../errors';
import { SerialExecutor } from '../utils/serial-executor';
import type {
  DeckStore,
  RateCardResult,
  SessionEngineDependencies,
  SessionEventData,
  SessionEventListener,
  SessionPhase,
  SessionState,
  SessionStatus,
  SessionSummary,
} from './types';

/**
 * Per-card bookkeeping for the running session.
 */
interface CardProgress {
  /** Card as loaded at session start */
  card: Flashcard;
  /** Latest computed record; the card's stored record until first rated */
  record: ReviewRecord;
  attempts: number;
  failedAttempts: number;
  mastered: boolean;
  /** Record that must still reach the store, or null when nothing is owed */
  pendingRecord: ReviewRecord | null;
}

/**
 * SessionEngine orchestrates review sessions.
 *
 * Mutating calls (`startSession`, `rateCard`, `abortSession`,
 * `retryPendingSaves`) are applied one at a time in call order, including
 * their writes to the store. Read-only calls reflect the state after the
 * last completed mutation.
 */
export class SessionEngine {
  // === Dependencies (injected) ===
  private readonly scheduler: SM2Scheduler;
  private readonly clock: DayProvider;
  private readonly store: DeckStore;

  private readonly executor = new SerialExecutor();
  private eventListener: SessionEventListener | undefined;

  // === Session state ===
  private status: SessionStatus = 'idle';
  private deckId: string | null = null;
  private sessionDay = 0;
  private aborted = false;
  private progress = new Map<string, CardProgress>();
  private cardOrder: string[] = [];
  private primaryQueue: string[] = [];
  private recycleQueue: string[] = [];

  constructor(deps: SessionEngineDependencies) {
    this.scheduler = deps.scheduler;
    this.clock = deps.clock;
    this.store = deps.store;
  }

  /**
   * Sets an event listener to receive session events.
   *
   * Only one listener is supported at a time. Setting a new listener
   * replaces the previous one. Pass undefined to remove the listener.
   *
   * @example
   * ```typescript
   * engine.setEventListener((event) => {
   *   console.log(`[${event.type}]`, event.data);
   * });
   * ```
   */
  setEventListener(listener: SessionEventListener | undefined): void {
    this.eventListener = listener;
  }

  private emitEvent(data: SessionEventData): void {
    if (this.eventListener) {
      this.eventListener({
        type: data.type,
        data,
        timestamp: new Date(),
      });
    }
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Starts a session over the cards of `deckId` that are due today.
   *
   * @returns The new session state; its status is 'complete' right away when
   *          no card is due
   * @throws InvalidSessionOperationError if a session is already active, or
   *         if the previous session still has records that were not saved
   */
  startSession(deckId: string): Promise<SessionState> {
    return this.executor.run(async () => {
      if (this.status === 'active') {
        throw new InvalidSessionOperationError(
          'A session is already active; finish or abort it first'
        );
      }

      const unsaved = this.getPendingCardIds();
      if (unsaved.length > 0) {
        throw new InvalidSessionOperationError(
          `The previous session has ${unsaved.length} unsaved review record(s); retry saving them first`
        );
      }

      const today = this.clock.today();
      const dueCards = await this.store.findDueCards(deckId, today);

      this.resetState();
      this.deckId = deckId;
      this.sessionDay = today;

      for (const card of dueCards) {
        this.progress.set(card.id, {
          card,
          record: card.review,
          attempts: 0,
          failedAttempts: 0,
          mastered: false,
          pendingRecord: null,
        });
        this.cardOrder.push(card.id);
        this.primaryQueue.push(card.id);
      }

      this.status = 'active';
      this.emitEvent({
        type: 'session_started',
        deckId,
        day: today,
        cardCount: dueCards.length,
      });

      if (dueCards.length === 0) {
        this.completeSession();
      }

      return this.buildState(deckId);
    });
  }

  /**
   * Rates a queued card and advances the session.
   *
   * Checks run in this order, and a failed check changes nothing:
   * no active session, invalid quality, card not queued.
   *
   * @param cardId - Any card currently in the primary or recycle queue
   * @param quality - SM-2 quality, an integer from 0 to 5
   * @throws InvalidSessionOperationError if no session is active or the card
   *         is not waiting for review
   * @throws InvalidRatingError if `quality` is not an integer from 0 to 5
   * @throws PersistenceError if a passing record could not be saved; the
   *         rating still counts and the record stays pending
   */
  rateCard(cardId: string, quality: number): Promise<RateCardResult> {
    return this.executor.run(async () => {
      if (this.status !== 'active') {
        throw new InvalidSessionOperationError('No active session to rate cards in');
      }
      assertQualityRating(quality);

      const progress = this.progress.get(cardId);
      if (!progress || !this.removeFromQueues(cardId)) {
        throw new InvalidSessionOperationError(
          `Card '${cardId}' is not waiting for review in this session`
        );
      }

      const record = this.scheduler.schedule(progress.record, quality, this.clock.today());
      progress.record = record;
      progress.attempts += 1;

      this.emitEvent({
        type: 'card_rated',
        cardId,
        quality,
        record,
        attempt: progress.attempts,
      });

      const passed = isPassingRating(quality);
      let saveError: unknown = null;

      if (passed) {
        progress.mastered = true;
        progress.pendingRecord = record;
        this.emitEvent({
          type: 'card_mastered',
          cardId,
          masteredCount: this.getMasteredCardIds().length,
          totalCards: this.cardOrder.length,
        });
        saveError = await this.savePending(progress);
      } else {
        progress.failedAttempts += 1;
        this.recycleQueue.push(cardId);
        this.emitEvent({
          type: 'card_recycled',
          cardId,
          recycleQueueLength: this.recycleQueue.length,
        });
      }

      if (this.primaryQueue.length === 0 && this.recycleQueue.length === 0) {
        this.completeSession();
      }

      if (saveError !== null) {
        throw new PersistenceError(
          `Failed to save the review record for card '${cardId}'`,
          [cardId],
          saveError
        );
      }

      return {
        cardId,
        quality,
        record,
        passed,
        attempt: progress.attempts,
        nextCard: this.getCurrentCard(),
        status: this.status,
      };
    });
  }

  /**
   * Ends the active session early.
   *
   * Every card rated at least once but never passed has its latest computed
   * record saved. Cards that were never rated keep their stored record. The
   * session moves to 'complete' even when some saves fail.
   *
   * @returns Summary of the aborted session
   * @throws InvalidSessionOperationError if no session is active
   * @throws PersistenceError naming every card whose record could not be
   *         saved; those records stay pending
   */
  abortSession(): Promise<SessionSummary> {
    return this.executor.run(async () => {
      if (this.status !== 'active') {
        throw new InvalidSessionOperationError('No active session to abort');
      }

      for (const progress of this.progress.values()) {
        if (progress.attempts > 0 && !progress.mastered) {
          progress.pendingRecord = progress.record;
        }
      }

      this.primaryQueue = [];
      this.recycleQueue = [];
      this.status = 'complete';
      this.aborted = true;

      const failed = await this.saveAllPending();
      const summary = this.buildSummary();
      this.emitEvent({ type: 'session_aborted', summary });

      if (failed.length > 0) {
        throw new PersistenceError(
          `Failed to save review records for ${failed.length} card(s) while aborting`,
          failed
        );
      }

      return summary;
    });
  }

  /**
   * Re-sends every record that previously failed to save. Records are sent
   * as computed; nothing is rescheduled.
   *
   * @returns Ids of the cards saved by this call
   * @throws PersistenceError naming the cards that still could not be saved
   */
  retryPendingSaves(): Promise<string[]> {
    return this.executor.run(async () => {
      const attempted = this.getPendingCardIds();
      const failed = await this.saveAllPending();

      if (failed.length > 0) {
        throw new PersistenceError(
          `Failed to save review records for ${failed.length} card(s)`,
          failed
        );
      }

      return attempted;
    });
  }

  // ============================================================================
  // Queries
  // ============================================================================

  /**
   * The card to present next: head of the primary queue, otherwise head of
   * the recycle queue, otherwise null. Its `review` field carries the latest
   * computed record.
   */
  getCurrentCard(): Flashcard | null {
    if (this.status !== 'active') {
      return null;
    }
    const cardId = this.primaryQueue[0] ?? this.recycleQueue[0];
    return cardId === undefined ? null : this.toCurrentCard(cardId);
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  /**
   * Gets the current session state for UI display.
   *
   * @returns Session state, or null before the first session
   */
  getSessionState(): SessionState | null {
    if (this.deckId === null) {
      return null;
    }
    return this.buildState(this.deckId);
  }

  /**
   * Totals for the current or most recent session, or null before the first.
   */
  getSummary(): SessionSummary | null {
    if (this.deckId === null) {
      return null;
    }
    return this.buildSummary();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private resetState(): void {
    this.status = 'idle';
    this.deckId = null;
    this.sessionDay = 0;
    this.aborted = false;
    this.progress = new Map();
    this.cardOrder = [];
    this.primaryQueue = [];
    this.recycleQueue = [];
  }

  private completeSession(): void {
    this.status = 'complete';
    this.emitEvent({ type: 'session_completed', summary: this.buildSummary() });
  }

  /**
   * Removes the card from whichever queue holds it.
   *
   * @returns false if the card was in neither queue
   */
  private removeFromQueues(cardId: string): boolean {
    const primaryIndex = this.primaryQueue.indexOf(cardId);
    if (primaryIndex !== -1) {
      this.primaryQueue.splice(primaryIndex, 1);
      return true;
    }
    const recycleIndex = this.recycleQueue.indexOf(cardId);
    if (recycleIndex !== -1) {
      this.recycleQueue.splice(recycleIndex, 1);
      return true;
    }
    return false;
  }

  /**
   * Writes the card's pending record. A card deleted since the session
   * started (its deck removed or replaced) has nothing left to update, so
   * its record is dropped rather than kept pending.
   *
   * @returns null on success or drop, otherwise the store's error
   */
  private async savePending(progress: CardProgress): Promise<unknown> {
    const record = progress.pendingRecord;
    if (record === null) {
      return null;
    }

    const cardId = progress.card.id;
    try {
      await this.store.saveReviewRecord(cardId, record);
    } catch (error) {
      if (error instanceof NotFoundError) {
        progress.pendingRecord = null;
        console.warn(`[SessionEngine] Card ${cardId} no longer exists; dropping its review record`);
        this.emitEvent({ type: 'review_discarded', cardId });
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[SessionEngine] Failed to save review record for ${cardId}:`, message);
      this.emitEvent({ type: 'review_save_failed', cardId, message });
      return error;
    }

    progress.pendingRecord = null;
    this.emitEvent({ type: 'review_saved', cardId, record });
    return null;
  }

  /**
   * Attempts every pending save in card order.
   *
   * @returns Ids of the cards that still failed
   */
  private async saveAllPending(): Promise<string[]> {
    const failed: string[] = [];
    for (const cardId of this.cardOrder) {
      const progress = this.progress.get(cardId);
      if (!progress || progress.pendingRecord === null) {
        continue;
      }
      const error = await this.savePending(progress);
      if (error !== null) {
        failed.push(cardId);
      }
    }
    return failed;
  }

  private getPendingCardIds(): string[] {
    return this.cardOrder.filter((cardId) => this.progress.get(cardId)?.pendingRecord != null);
  }

  private getMasteredCardIds(): string[] {
    return this.cardOrder.filter((cardId) => this.progress.get(cardId)?.mastered === true);
  }

  private toCurrentCard(cardId: string): Flashcard | null {
    const progress = this.progress.get(cardId);
    if (!progress) {
      return null;
    }
    return { ...progress.card, review: { ...progress.record } };
  }

  private getPhase(): SessionPhase {
    return this.primaryQueue.length > 0 ? 'first_pass' : 'review';
  }

  private getPhaseMessage(): string {
    const total = this.cardOrder.length;
    if (this.status === 'complete') {
      const verb = this.aborted ? 'aborted' : 'complete';
      return `Session ${verb}: ${this.getMasteredCardIds().length} of ${total} cards mastered`;
    }
    if (this.getPhase() === 'first_pass') {
      return `Round 1: ${total} cards`;
    }
    return `Review: ${this.recycleQueue.length} cards to retry`;
  }

  private buildState(deckId: string): SessionState {
    const masteredCardIds = this.getMasteredCardIds();
    const status: Exclude<SessionStatus, 'idle'> =
      this.status === 'active' ? 'active' : 'complete';

    return {
      status,
      deckId,
      day: this.sessionDay,
      phase: this.getPhase(),
      phaseMessage: this.getPhaseMessage(),
      currentCard: this.getCurrentCard(),
      primaryQueue: [...this.primaryQueue],
      recycleQueue: [...this.recycleQueue],
      masteredCardIds,
      pendingSaveCardIds: this.getPendingCardIds(),
      totalCards: this.cardOrder.length,
      masteredCount: masteredCardIds.length,
      remainingCount: this.cardOrder.length - masteredCardIds.length,
    };
  }

  private buildSummary(): SessionSummary {
    let totalAttempts = 0;
    let failedAttempts = 0;
    const unmasteredCardIds: string[] = [];

    for (const cardId of this.cardOrder) {
      const progress = this.progress.get(cardId);
      if (!progress) {
        continue;
      }
      totalAttempts += progress.attempts;
      failedAttempts += progress.failedAttempts;
      if (!progress.mastered) {
        unmasteredCardIds.push(cardId);
      }
    }

    return {
      deckId: this.deckId ?? '',
      day: this.sessionDay,
      totalCards: this.cardOrder.length,
      masteredCards: this.cardOrder.length - unmasteredCardIds.length,
      totalAttempts,
      failedAttempts,
      aborted: this.aborted,
      unmasteredCardIds,
      unsavedCardIds: this.getPendingCardIds(),
    };
  }
}
