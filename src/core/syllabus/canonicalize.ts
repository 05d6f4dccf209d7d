/**
 * Syllabus canonicalization: turns a generator's concept list into the
 * stored vocabulary.
 */

import { normalizeLabel } from './similarity';

export interface CanonicalizeOptions {
  maxConceptLength: number;
  maxEntries: number;
}

export const DEFAULT_CANONICALIZE_OPTIONS: CanonicalizeOptions = {
  maxConceptLength: 50,
  maxEntries: 30,
};

/**
 * Cleans a list of candidate concept names.
 *
 * Strips list markers and surrounding quotes, collapses whitespace, drops
 * blank and over-length names, and keeps the first of any names that are
 * equal after normalization. Order is preserved; the result is capped at
 * `maxEntries`.
 *
 * @example
 * ```typescript
 * canonicalizeSyllabus(['1. Recursion', 'recursion', '  Big-O   Notation ']);
 * // ['Recursion', 'Big-O Notation']
 * ```
 */
export function canonicalizeSyllabus(
  candidates: readonly string[],
  options: Partial<CanonicalizeOptions> = {}
): string[] {
  const opts: CanonicalizeOptions = { ...DEFAULT_CANONICALIZE_OPTIONS, ...options };
  const seen = new Set<string>();
  const result: string[] = [];

  for (const candidate of candidates) {
    const cleaned = candidate
      .replace(/^\s*(?:\d+[.)]|[-*•])\s+/, '')
      .replace(/^["'`]+|["'`]+$/g, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (cleaned.length === 0 || cleaned.length > opts.maxConceptLength) continue;

    const key = normalizeLabel(cleaned);
    if (key.length === 0 || seen.has(key)) continue;

    seen.add(key);
    result.push(cleaned);
    if (result.length >= opts.maxEntries) break;
  }

  return result;
}
