/**
 * Interval Policies
 *
 * An IntervalPolicy turns the previous interval and the outcome of one graded
 * attempt into the next interval in days. The scheduler owns everything else
 * (dates, the floor of one day, entry bookkeeping), so a policy can be
 * swapped without touching it.
 */

import type { ReviewConfidence } from '../models';

export interface IntervalPolicy {
  /**
   * @param previousInterval - Interval before this attempt; 0 for a concept never graded
   */
  nextInterval(previousInterval: number, correct: boolean, confidence: ReviewConfidence): number;
}

/**
 * Confidence-weighted intervals:
 *
 * - correct, high confidence: double, at least 5 days
 * - correct, low/medium confidence: one more day, at least 2 days
 * - incorrect: back to 1 day
 */
export const confidenceWeightedPolicy: IntervalPolicy = {
  nextInterval(previousInterval, correct, confidence) {
    if (!correct) return 1;
    if (confidence === 'high') return Math.max(previousInterval * 2, 5);
    return Math.max(previousInterval + 1, 2);
  },
};
