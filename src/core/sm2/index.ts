/**
 * SM-2 Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { SM2Scheduler, isQualityRating } from '@/core/sm2';
 *
 * const scheduler = new SM2Scheduler();
 * const next = scheduler.schedule(card.review, 4, clock.today());
 * ```
 */

export { SM2Scheduler, type SM2SchedulerConfig } from './scheduler';

export {
  type QualityRating,
  PASSING_QUALITY,
  QUALITY_RATINGS,
  QUALITY_RATING_DESCRIPTIONS,
  isQualityRating,
  assertQualityRating,
  isPassingRating,
} from './types';
