/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders for the two generation tasks:
 *
 * 1. **Quiz generation**: a quiz document over a concept list, parsed by the
 *    response sanitizer.
 * 2. **Syllabus generation**: the concept vocabulary for a project's study
 *    material.
 *
 * @example
 * ```typescript
 * import { buildQuizGenerationPrompt, buildSyllabusGenerationPrompt } from '@/llm/prompts';
 * ```
 */

export { buildQuizGenerationPrompt, type QuizPromptParams } from './quiz-generator';
export {
  buildSyllabusGenerationPrompt,
  parseSyllabusResponse,
  syllabusResponseSchema,
  type SyllabusPromptParams,
} from './syllabus-generator';
export { escapePromptInput, truncateForPrompt } from './escape';
