/**
 * Review Scheduler - Spaced Repetition for Concepts
 *
 * Keeps one SRSEntry per graded concept and answers which concepts are due.
 * The interval arithmetic is delegated to an IntervalPolicy; the scheduler
 * enforces that intervals are whole days and never below one.
 *
 * @example
 * ```typescript
 * const scheduler = new ReviewScheduler();
 * const today = new Date('2024-01-15T10:00:00Z');
 *
 * const entry = scheduler.update(undefined, {
 *   concept: 'Recursion',
 *   correct: true,
 *   confidence: 'low',
 * }, today);
 * // { concept: 'Recursion', intervalDays: 2, nextReview: '2024-01-17' }
 * ```
 */

import type { ReviewConfidence, SRSEntry } from '../models';
import { isCorruptedConcept, DEFAULT_CLASSIFIER_OPTIONS } from '../mastery';
import { addDays, toDateKey } from './dates';
import { confidenceWeightedPolicy, type IntervalPolicy } from './policy';

/**
 * Outcome of one graded attempt, as the scheduler sees it.
 */
export interface ReviewOutcome {
  concept: string;
  correct: boolean;
  confidence: ReviewConfidence;
}

export interface ReviewSchedulerConfig {
  policy: IntervalPolicy;
  /** Entries with longer concept names are corrupted and never reported due */
  maxConceptLength: number;
}

const DEFAULT_CONFIG: ReviewSchedulerConfig = {
  policy: confidenceWeightedPolicy,
  maxConceptLength: DEFAULT_CLASSIFIER_OPTIONS.maxConceptLength,
};

export class ReviewScheduler {
  private config: ReviewSchedulerConfig;

  constructor(config?: Partial<ReviewSchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Computes the entry after one graded attempt.
   *
   * @param entry - Current entry, or undefined if the concept was never graded
   * @param outcome - The graded attempt
   * @param today - Grading date (defaults to now)
   * @throws Error if `entry` belongs to a different concept
   */
  update(entry: SRSEntry | undefined, outcome: ReviewOutcome, today: Date = new Date()): SRSEntry {
    if (entry && entry.concept !== outcome.concept) {
      throw new Error(
        `Schedule entry for '${entry.concept}' cannot be updated with an attempt on '${outcome.concept}'`
      );
    }

    const previousInterval = entry?.intervalDays ?? 0;
    const proposed = this.config.policy.nextInterval(
      previousInterval,
      outcome.correct,
      outcome.confidence
    );
    const intervalDays = Math.max(1, Math.round(proposed));

    return {
      concept: outcome.concept,
      intervalDays,
      nextReview: addDays(today, intervalDays),
    };
  }

  /**
   * Returns a new schedule with one attempt applied. The input is not mutated.
   */
  applyReview(
    schedule: readonly SRSEntry[],
    outcome: ReviewOutcome,
    today: Date = new Date()
  ): SRSEntry[] {
    const index = schedule.findIndex((entry) => entry.concept === outcome.concept);
    const updated = this.update(index === -1 ? undefined : schedule[index], outcome, today);

    if (index === -1) {
      return [...schedule, updated];
    }
    return schedule.map((entry, i) => (i === index ? updated : entry));
  }

  /**
   * Concepts whose next review is on or before `asOf`, earliest first.
   * Corrupted entries are never reported due.
   */
  dueConcepts(schedule: readonly SRSEntry[], asOf: Date = new Date()): string[] {
    const today = toDateKey(asOf);
    return schedule
      .filter(
        (entry) =>
          entry.nextReview <= today &&
          !isCorruptedConcept(entry.concept, this.config.maxConceptLength)
      )
      .sort((a, b) => a.nextReview.localeCompare(b.nextReview) || a.concept.localeCompare(b.concept))
      .map((entry) => entry.concept);
  }
}

/**
 * Review-priority list: weak concepts first (in their given order), then
 * due concepts not already listed.
 */
export function reviewPriority(weak: readonly string[], due: readonly string[]): string[] {
  const priority = [...weak];
  for (const concept of due) {
    if (!priority.includes(concept)) priority.push(concept);
  }
  return priority;
}
