/**
 * Quiz Generator Prompt Builder
 *
 * Builds the single user message that asks the model for a quiz document.
 * The response is treated as untrusted and goes through the sanitizer, so
 * the prompt spells out the exact JSON shape the schema accepts:
 *
 * ```json
 * {"quiz": [{"id": 1, "type": "MCQ", "question_text": "...",
 *   "options": ["...", "...", "...", "..."], "correct_answer": "...",
 *   "primary_concept": "...", "detailed_explanation": "..."}]}
 * ```
 *
 * Two things matter most for downstream bookkeeping:
 *
 * 1. **Verbatim concept names**: `primary_concept` must be copied from the
 *    concept list. Anything else is resolved against the syllabus and may be
 *    rejected per item.
 * 2. **correct_answer is an option**: grading is an exact string match
 *    against the options, so the answer must repeat one of them exactly.
 */

import type { GenerationMode } from '../../core/generation/types';
import { escapePromptInput } from './escape';

export interface QuizPromptParams {
  concepts: readonly string[];
  sourceMaterial: string;
  itemCount: number;
  mode: GenerationMode;
  /** Study level, e.g. 'beginner'. Omitted from the prompt when blank. */
  level?: string;
}

const SECTION_TAGS = ['source_material', 'concepts'] as const;

/**
 * Builds the quiz generation prompt.
 *
 * @example
 * ```typescript
 * const prompt = buildQuizGenerationPrompt({
 *   concepts: ['Recursion', 'Base Case'],
 *   sourceMaterial: notes,
 *   itemCount: 10,
 *   mode: 'focused',
 * });
 * const response = await client.complete({ prompt });
 * const result = sanitizeQuizResponse(response.text);
 * ```
 */
export function buildQuizGenerationPrompt(params: QuizPromptParams): string {
  const conceptList = params.concepts
    .map((concept) => `- ${escapePromptInput(concept, SECTION_TAGS)}`)
    .join('\n');
  const material = escapePromptInput(params.sourceMaterial, SECTION_TAGS);
  const level = params.level?.trim();

  const focusInstruction =
    params.mode === 'focused'
      ? 'The learner is weak on, or due to review, the concepts below. Every question must target one of them, spread as evenly as the item count allows.'
      : 'Cover the concepts below broadly. Every question must target one of them.';

  return `You are writing a multiple-choice practice quiz from a learner's study material.

## Study Material
<source_material>
${material || '[No material provided]'}
</source_material>

## Concepts
${focusInstruction}
<concepts>
${conceptList}
</concepts>
${level ? `\nPitch the questions at a ${level} level.\n` : ''}
## Requirements

- Write exactly ${params.itemCount} questions, numbered with integer ids starting at 1.
- "type" is either "MCQ" (exactly 4 distinct options) or "T/F" (options exactly ["True", "False"]).
- "correct_answer" must repeat one of the options character for character.
- "primary_concept" must be copied verbatim from the concept list. Never invent, rephrase or combine concept names.
- "detailed_explanation" explains why the correct answer is right and the others are not.
- Every text field is non-empty.

## Response Format

Respond with ONLY a JSON object, no commentary before or after it:
{"quiz": [{"id": 1, "type": "MCQ", "question_text": "...", "options": ["...", "...", "...", "..."], "correct_answer": "...", "primary_concept": "...", "detailed_explanation": "..."}]}`;
}
