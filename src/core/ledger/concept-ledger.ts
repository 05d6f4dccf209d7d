/**
 * Concept Ledger
 *
 * Per-project attempt counters keyed by canonical concept name. The ledger
 * is pure aggregation: it does not decide what is weak or when anything is
 * due. Labels reaching it are expected to be canonical already (the quiz
 * round and the grader resolve them first).
 */

import type { ConceptRecord } from '../models';
import { ProjectNotFoundError } from '../errors';
import type { ProjectStore } from '@/storage/repositories';

/**
 * Returns a new ledger with one attempt applied. The input is not mutated.
 * A record is created (at 0/0) the first time a concept is seen.
 *
 * @example
 * ```typescript
 * let ledger: ConceptRecord[] = [];
 * ledger = applyAttempt(ledger, 'Recursion', true);
 * ledger = applyAttempt(ledger, 'Recursion', false);
 * // [{ concept: 'Recursion', correct: 1, total: 2 }]
 * ```
 */
export function applyAttempt(
  records: readonly ConceptRecord[],
  concept: string,
  correct: boolean
): ConceptRecord[] {
  let found = false;
  const next = records.map((record) => {
    if (record.concept !== concept) return record;
    found = true;
    return {
      concept,
      correct: record.correct + (correct ? 1 : 0),
      total: record.total + 1,
    };
  });

  if (!found) {
    next.push({ concept, correct: correct ? 1 : 0, total: 1 });
  }

  return next;
}

/**
 * Store-backed ledger operations for one project at a time.
 *
 * @example
 * ```typescript
 * const ledger = new ConceptLedger(projectRepo);
 * await ledger.recordAttempt('prj_abc', 'Recursion', true);
 * const records = await ledger.getAll('prj_abc');
 * ```
 */
export class ConceptLedger {
  constructor(private readonly store: ProjectStore) {}

  /**
   * Records one graded attempt and returns the updated record. The
   * read-modify-write is a single store transaction, so overlapping calls
   * for the same project all count.
   *
   * @throws ProjectNotFoundError if the project does not exist
   */
  async recordAttempt(projectId: string, concept: string, correct: boolean): Promise<ConceptRecord> {
    const next = await this.store.updateField(projectId, 'ledger', (records) =>
      applyAttempt(records, concept, correct)
    );

    const updated = next.find((record) => record.concept === concept);
    if (!updated) {
      throw new Error(`Ledger record for '${concept}' missing after update`);
    }
    return updated;
  }

  /**
   * @throws ProjectNotFoundError if the project does not exist
   */
  async getAll(projectId: string): Promise<ConceptRecord[]> {
    const records = await this.store.getField(projectId, 'ledger');
    if (records === null) {
      throw new ProjectNotFoundError(projectId);
    }
    return records;
  }

  /**
   * Clears every record and every schedule entry in one write.
   */
  async reset(projectId: string): Promise<void> {
    await this.store.saveProgress(projectId, [], []);
  }
}
