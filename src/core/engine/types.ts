/**
 * Mastery Engine Types
 */

import type { ConceptRecord, QuizAnswer, QuizItem, SRSEntry } from '../models';
import type { ConceptClassification } from '../mastery';
import type { QuizRoundEvent } from '../targeting';
import type { ResolverOptions } from '../syllabus';

export interface MasteryEngineConfig {
  /** Accuracy below this marks a concept weak */
  weakThreshold: number;
  maxConceptLength: number;
  /** Items requested per quiz round */
  itemCount: number;
  generatorTimeoutMs: number;
  resolver: Partial<ResolverOptions>;
}

export interface MasteryReport {
  projectId: string;
  /** Stored syllabus; empty until generated or defined */
  syllabus: string[];
  classification: ConceptClassification;
  /** Concepts due for review as of the report date, earliest first */
  due: string[];
  /** Weak concepts first, then due ones */
  priority: string[];
  /** Every corrupted concept name in the ledger or the schedule */
  corrupted: string[];
  ledger: ConceptRecord[];
  schedule: SRSEntry[];
  asOf: string;
}

export interface GenerateQuizOptions {
  signal?: AbortSignal;
  asOf?: Date;
}

export interface GradeQuizInput {
  items: QuizItem[];
  answers: QuizAnswer[];
  asOf?: Date;
}

export interface GradedItem {
  itemId: number;
  concept: string;
  correct: boolean;
  given: string;
  correctAnswer: string;
  explanation: string;
}

export interface GradeResult {
  results: GradedItem[];
  score: { correct: number; total: number };
  /** Submitted items not graded because their concept is not a syllabus entry */
  rejected: { itemId: number; concept: string }[];
  /** Ledger records for the concepts touched by this quiz */
  updatedRecords: ConceptRecord[];
  /** Schedule entries for the concepts touched by this quiz */
  updatedSchedule: SRSEntry[];
}

export type RoundEventListener = (projectId: string, event: QuizRoundEvent) => void;
