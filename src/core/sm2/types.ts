/**
 * SM-2 Rating Types
 *
 * The learner grades each recall attempt on the classic SM-2 scale of 0 to 5.
 * Grades of 3 and above count as a pass; anything lower is a fail that resets
 * the card's repetition count and sends it back into the session's recycle
 * queue.
 */

import { InvalidRatingError } from '../errors';

/**
 * Quality of a recall attempt, 0 (blackout) through 5 (perfect).
 */
export type QualityRating = 0 | 1 | 2 | 3 | 4 | 5;

/** Lowest quality that counts as a successful recall */
export const PASSING_QUALITY = 3;

/** All valid ratings in ascending order */
export const QUALITY_RATINGS: readonly QualityRating[] = [0, 1, 2, 3, 4, 5];

/**
 * Meaning of each grade, shown to learners when they are asked to rate.
 */
export const QUALITY_RATING_DESCRIPTIONS: Record<QualityRating, string> = {
  0: 'complete blackout',
  1: 'incorrect, but the answer felt familiar',
  2: 'incorrect, but the answer seemed easy to recall',
  3: 'correct, with serious difficulty',
  4: 'correct, after some hesitation',
  5: 'perfect response',
};

/**
 * Type guard for QualityRating. Rejects non-numbers, fractions and values
 * outside 0..5.
 */
export function isQualityRating(value: unknown): value is QualityRating {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 5
  );
}

/**
 * Narrows `value` to a QualityRating or throws InvalidRatingError.
 */
export function assertQualityRating(value: unknown): asserts value is QualityRating {
  if (!isQualityRating(value)) {
    throw new InvalidRatingError(value);
  }
}

/**
 * Whether a rating counts as a pass (3 or higher).
 */
export function isPassingRating(quality: QualityRating): boolean {
  return quality >= PASSING_QUALITY;
}
