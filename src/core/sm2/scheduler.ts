/**
 * SM-2 Scheduler - Spaced Repetition Scheduling Engine
 *
 * Implements the SuperMemo-2 algorithm on integer days. Given a card's current
 * ReviewRecord, a quality rating and the current simulated day, it produces
 * the card's next ReviewRecord. The scheduler holds no state beyond its
 * configuration, so the same inputs always yield the same output and a single
 * instance can be shared freely.
 *
 * The update rule, for quality q and easiness factor ef:
 *
 * 1. ef' = max(min, ef + (0.1 - (5 - q) * (0.08 + (5 - q) * 0.02)))
 *    (applied on every rating, pass or fail)
 * 2. pass (q >= 3): repetitions + 1, interval 1 after the first pass,
 *    6 after the second, round(previous interval * ef') afterwards
 *    fail (q < 3): repetitions 0, interval 1
 * 3. interval is never less than 1
 * 4. nextReviewDay = today + interval
 */

import type { ReviewRecord } from '../models';
import { assertQualityRating, isPassingRating } from './types';

/**
 * Configuration options for the SM2Scheduler.
 */
export interface SM2SchedulerConfig {
  /**
   * Easiness factor given to new cards.
   * Default: 2.5
   */
  initialEasinessFactor: number;

  /**
   * Floor for the easiness factor. Cards that keep failing settle here
   * instead of shrinking their intervals indefinitely.
   * Default: 1.3
   */
  minimumEasinessFactor: number;
}

const DEFAULT_CONFIG: SM2SchedulerConfig = {
  initialEasinessFactor: 2.5,
  minimumEasinessFactor: 1.3,
};

/** Interval after the first successful review */
const FIRST_INTERVAL_DAYS = 1;

/** Interval after the second consecutive successful review */
const SECOND_INTERVAL_DAYS = 6;

/**
 * SM2Scheduler computes review records with the SM-2 algorithm.
 *
 * @example
 * ```typescript
 * const scheduler = new SM2Scheduler();
 *
 * // A card added on day 0 is due immediately
 * const record = scheduler.createInitialRecord(0);
 *
 * // The learner recalls it with some hesitation
 * const next = scheduler.schedule(record, 4, 0);
 * // next = { easinessFactor: 2.5, intervalDays: 1, repetitions: 1, nextReviewDay: 1 }
 * ```
 */
export class SM2Scheduler {
  private readonly config: SM2SchedulerConfig;

  /**
   * @param config - Optional partial configuration to override defaults
   * @throws Error if the minimum easiness factor is not positive or the
   *         initial factor is below the minimum
   */
  constructor(config?: Partial<SM2SchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (!(this.config.minimumEasinessFactor > 0)) {
      throw new Error(
        `minimumEasinessFactor must be positive, got ${this.config.minimumEasinessFactor}`
      );
    }
    if (!(this.config.initialEasinessFactor >= this.config.minimumEasinessFactor)) {
      throw new Error(
        `initialEasinessFactor (${this.config.initialEasinessFactor}) must not be below ` +
          `minimumEasinessFactor (${this.config.minimumEasinessFactor})`
      );
    }
  }

  /**
   * Creates the record for a newly added card. The card is due on the day
   * it is created.
   *
   * @param today - Current simulated day
   */
  createInitialRecord(today: number): ReviewRecord {
    return {
      easinessFactor: this.config.initialEasinessFactor,
      intervalDays: 0,
      repetitions: 0,
      nextReviewDay: today,
    };
  }

  /**
   * Computes the record that follows `record` after a review of the given
   * quality on day `today`. The input record is not modified.
   *
   * @param record - The card's current record
   * @param quality - Rating of the recall attempt; must be an integer 0..5
   * @param today - Day on which the review happened
   * @returns The card's next record
   * @throws InvalidRatingError if `quality` is not an integer from 0 to 5
   *
   * @example
   * ```typescript
   * // Third consecutive pass: interval grows by the easiness factor
   * scheduler.schedule(
   *   { easinessFactor: 2.5, intervalDays: 6, repetitions: 2, nextReviewDay: 7 },
   *   5,
   *   7
   * );
   * // => { easinessFactor: 2.6, intervalDays: 16, repetitions: 3, nextReviewDay: 23 }
   * ```
   */
  schedule(record: ReviewRecord, quality: number, today: number): ReviewRecord {
    assertQualityRating(quality);

    const easinessFactor = this.nextEasinessFactor(record.easinessFactor, quality);

    let repetitions: number;
    let intervalDays: number;

    if (isPassingRating(quality)) {
      repetitions = record.repetitions + 1;
      if (repetitions === 1) {
        intervalDays = FIRST_INTERVAL_DAYS;
      } else if (repetitions === 2) {
        intervalDays = SECOND_INTERVAL_DAYS;
      } else {
        intervalDays = Math.round(record.intervalDays * easinessFactor);
      }
    } else {
      repetitions = 0;
      intervalDays = FIRST_INTERVAL_DAYS;
    }

    intervalDays = Math.max(1, intervalDays);

    return {
      easinessFactor,
      intervalDays,
      repetitions,
      nextReviewDay: today + intervalDays,
    };
  }

  /**
   * Whether a card with this record should be reviewed on `today`.
   */
  isDue(record: ReviewRecord, today: number): boolean {
    return record.nextReviewDay <= today;
  }

  /**
   * Gets a copy of the current scheduler configuration.
   */
  getConfig(): SM2SchedulerConfig {
    return { ...this.config };
  }

  private nextEasinessFactor(easinessFactor: number, quality: number): number {
    const distance = 5 - quality;
    const adjusted = easinessFactor + (0.1 - distance * (0.08 + distance * 0.02));
    return Math.max(this.config.minimumEasinessFactor, adjusted);
  }
}
