/**
 * Concept Tracking Types
 *
 * Per-concept performance counters (the ledger) and spaced-repetition
 * entries (the schedule). Both are keyed by canonical concept name, so the
 * same concept always aggregates into the same record.
 */

/**
 * Attempt counters for one canonical concept.
 *
 * Invariant: `0 <= correct <= total`.
 */
export interface ConceptRecord {
  concept: string;
  correct: number;
  total: number;
}

/**
 * Review schedule entry for one canonical concept.
 */
export interface SRSEntry {
  concept: string;

  /** Days between the last grading and the next review; always >= 1 */
  intervalDays: number;

  /** Calendar date of the next review, formatted YYYY-MM-DD */
  nextReview: string;
}

/**
 * How sure the learner felt about an answer, self-reported at grading time.
 *
 * - 'low': guessed or unsure
 * - 'medium': reasonably sure
 * - 'high': certain; only this level lets a correct answer double the interval
 */
export type ReviewConfidence = 'low' | 'medium' | 'high';
