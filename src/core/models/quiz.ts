/**
 * Quiz Payload Types
 *
 * The structured quiz record the content generator is asked to produce. Field
 * names are snake_case because they are the wire contract with the
 * generator; the sanitizer validates incoming text against exactly this shape.
 */

import type { ReviewConfidence } from './concept';

/** Question kind tag */
export type QuizItemType = 'MCQ' | 'T/F';

interface QuizItemBase {
  /** Integer id, unique within one quiz */
  id: number;
  question_text: string;
  /** One of `options`, verbatim */
  correct_answer: string;
  /** Concept the item tests; must be a syllabus entry before it is recorded */
  primary_concept: string;
  detailed_explanation: string;
}

/** Multiple choice question with exactly four options */
export interface MultipleChoiceItem extends QuizItemBase {
  type: 'MCQ';
  options: string[];
}

/** True/false question with exactly two options */
export interface TrueFalseItem extends QuizItemBase {
  type: 'T/F';
  options: string[];
}

export type QuizItem = MultipleChoiceItem | TrueFalseItem;

/**
 * Top-level object produced by the generator: `{ "quiz": [...] }`.
 */
export interface QuizPayload {
  quiz: QuizItem[];
}

/**
 * A learner's answer to one quiz item.
 */
export interface QuizAnswer {
  itemId: number;
  answer: string;
  confidence: ReviewConfidence;
}
