/**
 * ReviewRecord Domain Types
 *
 * A ReviewRecord holds the SM-2 scheduling state of a single flashcard. Every
 * flashcard owns exactly one record, created together with the card and
 * deleted together with it. The record only ever changes through the
 * SM2Scheduler, which produces a fresh record from the previous one and the
 * learner's quality rating.
 *
 * Days are plain integers on the simulated calendar kept by SimulatedClock,
 * so "due" means `nextReviewDay <= today` with no wall-clock involvement.
 */

/**
 * SM-2 scheduling state for a flashcard.
 *
 * @example
 * ```typescript
 * const record: ReviewRecord = {
 *   easinessFactor: 2.36,
 *   intervalDays: 6,
 *   repetitions: 2,
 *   nextReviewDay: 9,
 * };
 * ```
 */
export interface ReviewRecord {
  /**
   * How easy the card is for this learner. Never below 1.3, no upper bound.
   * New cards start at 2.5.
   */
  easinessFactor: number;

  /**
   * Days between the last review and the next one. 0 only for cards that
   * have never been passed; at least 1 once `repetitions >= 1`.
   */
  intervalDays: number;

  /**
   * Consecutive passing reviews. Reset to 0 by a failing rating.
   */
  repetitions: number;

  /**
   * Simulated day on which the card is next due.
   */
  nextReviewDay: number;
}
