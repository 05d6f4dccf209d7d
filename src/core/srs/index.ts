/**
 * Spaced Repetition Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { ReviewScheduler, reviewPriority } from '@/core/srs';
 *
 * const scheduler = new ReviewScheduler();
 * const due = scheduler.dueConcepts(schedule, new Date());
 * const priority = reviewPriority(classification.weak, due);
 * ```
 */

export {
  ReviewScheduler,
  reviewPriority,
  type ReviewOutcome,
  type ReviewSchedulerConfig,
} from './scheduler';
export { confidenceWeightedPolicy, type IntervalPolicy } from './policy';
export { toDateKey, parseDateKey, addDays, daysUntil } from './dates';
