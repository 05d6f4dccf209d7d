/**
 * Core Domain Models - Barrel Export
 *
 * Re-exports all domain types for convenient importing. These types form
 * the contract between the engine modules and have no runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { ConceptRecord, SRSEntry, QuizItem } from '@/core/models';
 * ```
 */

export type { Project, EngineState } from './project';

export type { ConceptRecord, SRSEntry, ReviewConfidence } from './concept';

export type {
  QuizItemType,
  MultipleChoiceItem,
  TrueFalseItem,
  QuizItem,
  QuizPayload,
  QuizAnswer,
} from './quiz';
