/**
 * Weak-Concept Classifier
 *
 * Partitions ledger records by observed accuracy:
 *
 * - weak: total > 0 and correct / total < threshold
 * - strong: total > 0 and correct / total >= threshold
 * - untested: total == 0 (neither weak nor strong)
 * - corrupted: concept name longer than the canonical bound; excluded from
 *   every other partition
 *
 * Concepts with fewer than `lowConfidenceBelow` attempts are also listed in
 * `lowConfidence`. That list is for display only and never moves a concept
 * between weak and strong.
 */

import type { ConceptRecord, SRSEntry } from '../models';

export interface ClassifierOptions {
  /** Accuracy ratio separating weak from strong, in (0, 1] */
  threshold: number;
  maxConceptLength: number;
  lowConfidenceBelow: number;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  threshold: 0.8,
  maxConceptLength: 50,
  lowConfidenceBelow: 3,
};

export interface ConceptClassification {
  /** Weak concepts, lowest accuracy first (ties by name) */
  weak: string[];
  /** Strong concepts, by name */
  strong: string[];
  /** Over-length concept names; their presence blocks focused quizzes */
  corrupted: string[];
  untested: string[];
  lowConfidence: string[];
}

/**
 * True when a concept name violates the canonical length bound.
 */
export function isCorruptedConcept(concept: string, maxConceptLength: number): boolean {
  return concept.length > maxConceptLength;
}

/**
 * Classifies ledger records.
 *
 * @throws RangeError if the threshold is outside (0, 1]
 *
 * @example
 * ```typescript
 * classify([{ concept: 'Recursion', correct: 3, total: 5 }]);
 * // { weak: ['Recursion'], strong: [], corrupted: [], untested: [], lowConfidence: [] }
 * ```
 */
export function classify(
  records: readonly ConceptRecord[],
  options: Partial<ClassifierOptions> = {}
): ConceptClassification {
  const opts: ClassifierOptions = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };

  if (!(opts.threshold > 0 && opts.threshold <= 1)) {
    throw new RangeError(`Weak threshold must be in (0, 1], got ${opts.threshold}`);
  }

  const weak: { concept: string; accuracy: number }[] = [];
  const strong: string[] = [];
  const corrupted: string[] = [];
  const untested: string[] = [];
  const lowConfidence: string[] = [];

  for (const record of records) {
    if (isCorruptedConcept(record.concept, opts.maxConceptLength)) {
      corrupted.push(record.concept);
      continue;
    }

    if (record.total === 0) {
      untested.push(record.concept);
      continue;
    }

    const accuracy = record.correct / record.total;
    if (accuracy < opts.threshold) {
      weak.push({ concept: record.concept, accuracy });
    } else {
      strong.push(record.concept);
    }

    if (record.total < opts.lowConfidenceBelow) {
      lowConfidence.push(record.concept);
    }
  }

  weak.sort((a, b) => a.accuracy - b.accuracy || a.concept.localeCompare(b.concept));

  return {
    weak: weak.map((entry) => entry.concept),
    strong: strong.sort((a, b) => a.localeCompare(b)),
    corrupted: corrupted.sort((a, b) => a.localeCompare(b)),
    untested: untested.sort((a, b) => a.localeCompare(b)),
    lowConfidence: lowConfidence.sort((a, b) => a.localeCompare(b)),
  };
}

/**
 * Schedule entries whose concept names violate the length bound.
 */
export function findCorruptedEntries(
  schedule: readonly SRSEntry[],
  maxConceptLength: number = DEFAULT_CLASSIFIER_OPTIONS.maxConceptLength
): string[] {
  return schedule
    .filter((entry) => isCorruptedConcept(entry.concept, maxConceptLength))
    .map((entry) => entry.concept)
    .sort((a, b) => a.localeCompare(b));
}
