/**
 * Canonical Syllabus Resolver
 *
 * Maps free-form concept labels from a generator onto the project's fixed
 * vocabulary so that ledger counters aggregate under one name per concept.
 *
 * Resolution order:
 * 1. Exact match: returned unchanged (resolving a canonical name is a no-op)
 * 2. Over-length label: corruption candidate
 * 3. Match after normalization (case, punctuation, spacing)
 * 4. Sentence-like label: corruption candidate
 * 5. Best character-trigram similarity at or above `minSimilarity`
 * 6. Otherwise: corruption candidate
 *
 * A corruption candidate is never forced onto the closest entry.
 */

import { SyllabusUnavailableError } from '../errors';
import { normalizeLabel, trigramCosine } from './similarity';

export interface ResolverOptions {
  /** Longest acceptable concept name, in characters */
  maxConceptLength: number;
  /** Lowest trigram similarity accepted as a match */
  minSimilarity: number;
  /** Labels with more words than this read as sentences, not topic names */
  maxWords: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  maxConceptLength: 50,
  minSimilarity: 0.6,
  maxWords: 8,
};

export type CorruptionReason = 'too_long' | 'sentence' | 'no_match';

export type ConceptResolution =
  | {
      status: 'resolved';
      concept: string;
      match: 'exact' | 'normalized' | 'similar';
      score: number;
    }
  | {
      status: 'corruption_candidate';
      label: string;
      reason: CorruptionReason;
      /** Closest syllabus entry, when one was scored */
      closest: string | null;
      score: number;
    };

function looksLikeSentence(label: string, maxWords: number): boolean {
  const trimmed = label.trim();
  if (/[.?!]$/.test(trimmed)) return true;
  return trimmed.split(/\s+/).length > maxWords;
}

/**
 * Resolves a raw label against a syllabus.
 *
 * @param rawLabel - Label as produced by the generator
 * @param syllabus - Canonical concept names for the project
 * @param options - Overrides for the default thresholds
 * @throws SyllabusUnavailableError if the syllabus is empty
 *
 * @example
 * ```typescript
 * resolveConcept('recursion', ['Recursion', 'Sorting']);
 * // { status: 'resolved', concept: 'Recursion', match: 'normalized', score: 1 }
 * ```
 */
export function resolveConcept(
  rawLabel: string,
  syllabus: readonly string[],
  options: Partial<ResolverOptions> = {}
): ConceptResolution {
  const opts: ResolverOptions = { ...DEFAULT_RESOLVER_OPTIONS, ...options };

  if (syllabus.length === 0) {
    throw new SyllabusUnavailableError(
      'Cannot resolve concept labels against an empty syllabus'
    );
  }

  if (syllabus.includes(rawLabel)) {
    return { status: 'resolved', concept: rawLabel, match: 'exact', score: 1 };
  }

  if (rawLabel.length > opts.maxConceptLength) {
    return { status: 'corruption_candidate', label: rawLabel, reason: 'too_long', closest: null, score: 0 };
  }

  const normalized = normalizeLabel(rawLabel);
  const normalizedMatch = syllabus.find((entry) => normalizeLabel(entry) === normalized);
  if (normalizedMatch !== undefined) {
    return { status: 'resolved', concept: normalizedMatch, match: 'normalized', score: 1 };
  }

  if (looksLikeSentence(rawLabel, opts.maxWords)) {
    return { status: 'corruption_candidate', label: rawLabel, reason: 'sentence', closest: null, score: 0 };
  }

  let closest: string | null = null;
  let bestScore = 0;
  for (const entry of syllabus) {
    const score = trigramCosine(normalized, normalizeLabel(entry));
    // Strictly greater: ties keep the earlier syllabus entry
    if (score > bestScore) {
      bestScore = score;
      closest = entry;
    }
  }

  if (closest !== null && bestScore >= opts.minSimilarity) {
    return { status: 'resolved', concept: closest, match: 'similar', score: bestScore };
  }

  return {
    status: 'corruption_candidate',
    label: rawLabel,
    reason: 'no_match',
    closest,
    score: bestScore,
  };
}

/**
 * Resolver bound to one project's syllabus and thresholds.
 */
export class ConceptResolver {
  private readonly syllabus: readonly string[];
  private readonly options: ResolverOptions;

  constructor(syllabus: readonly string[], options: Partial<ResolverOptions> = {}) {
    this.syllabus = syllabus;
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
  }

  resolve(rawLabel: string): ConceptResolution {
    return resolveConcept(rawLabel, this.syllabus, this.options);
  }

  /** True when the label is a syllabus entry verbatim. */
  isCanonical(label: string): boolean {
    return this.syllabus.includes(label);
  }
}
