/**
 * Project Domain Types
 *
 * A Project is the scope for everything the mastery engine tracks. It is
 * created when a source document is first processed, and it owns exactly one
 * syllabus, one concept ledger and one review schedule.
 *
 * This module contains only pure TypeScript types with no runtime dependencies.
 */

import type { ConceptRecord, SRSEntry } from './concept';

/**
 * A study project built from one uploaded source document.
 *
 * @example
 * ```typescript
 * const project: Project = {
 *   id: 'prj_abc123',
 *   name: 'Algorithms 101',
 *   level: 'beginner',
 *   sourceText: 'Recursion is a technique where...',
 *   notes: '',
 *   createdAt: new Date('2024-01-15'),
 *   updatedAt: new Date('2024-01-15'),
 * };
 * ```
 */
export interface Project {
  /** Unique identifier (prefixed UUID, e.g. 'prj_...') */
  id: string;

  /** Human-readable project name, unique across projects */
  name: string;

  /** Study level the material is pitched at (e.g. 'beginner', 'advanced') */
  level: string;

  /** Extracted text of the source document; the material quizzes are drawn from */
  sourceText: string;

  /** Free-form study notes attached to the project */
  notes: string;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * Snapshot of everything the engine needs to make a decision for one project.
 *
 * Every classification, scheduling and targeting call receives this state
 * explicitly; nothing is read from module-level variables.
 */
export interface EngineState {
  projectId: string;
  /** Canonical concept names, in the order they were generated */
  syllabus: string[];
  ledger: ConceptRecord[];
  schedule: SRSEntry[];
}
