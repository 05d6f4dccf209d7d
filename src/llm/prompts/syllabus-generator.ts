/**
 * Syllabus Generator Prompt Builder
 *
 * Asks the model for the key concepts of a body of study material, as a
 * short list of names. The names become the project's canonical vocabulary,
 * so the prompt insists on short noun phrases rather than sentences.
 */

import { z } from 'zod';
import { sanitizeJson, type SanitizeResult } from '../../core/sanitizer';
import { escapePromptInput } from './escape';

export interface SyllabusPromptParams {
  sourceMaterial: string;
  maxConcepts: number;
  maxConceptLength: number;
}

/**
 * Shape of the syllabus response. Entries are validated loosely here and
 * canonicalized afterwards.
 */
export const syllabusResponseSchema = z.object({
  concepts: z.array(z.string()).min(1, 'at least one concept is required'),
});

export function buildSyllabusGenerationPrompt(params: SyllabusPromptParams): string {
  const material = escapePromptInput(params.sourceMaterial, ['source_material']);

  return `You are building the syllabus for a learner's study material: the list of distinct concepts a quiz about it should track.

## Study Material
<source_material>
${material || '[No material provided]'}
</source_material>

## Requirements

- List at most ${params.maxConcepts} concepts, most important first.
- Each concept is a short noun phrase of at most ${params.maxConceptLength} characters (for example "Binary Search" or "Photosynthesis").
- No sentences, no questions, no numbering, no duplicates.

## Response Format

Respond with ONLY a JSON object:
{"concepts": ["...", "..."]}`;
}

/**
 * Parses a syllabus response.
 *
 * @example
 * ```typescript
 * parseSyllabusResponse('Here you go: {"concepts": ["Recursion"]}');
 * // { ok: true, value: ['Recursion'] }
 * ```
 */
export function parseSyllabusResponse(raw: string): SanitizeResult<string[]> {
  const result = sanitizeJson(raw, syllabusResponseSchema);
  if (!result.ok) return result;
  return { ok: true, value: result.value.concepts };
}
