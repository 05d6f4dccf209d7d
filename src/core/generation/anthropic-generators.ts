/**
 * Anthropic-backed generators.
 *
 * Thin adapters from the generator interfaces to AnthropicClient. They build
 * the prompt, forward the caller's signal and return the raw text (quiz) or
 * the parsed name list (syllabus). Validation of quiz output stays with the
 * quiz round.
 */

import type { AnthropicClient } from '@/llm/client';
import {
  buildQuizGenerationPrompt,
  buildSyllabusGenerationPrompt,
  parseSyllabusResponse,
  truncateForPrompt,
} from '@/llm/prompts';
import type { ContentGenerator, QuizGenerationRequest, SyllabusGenerator } from './types';

/** The slice of AnthropicClient the adapters need. */
export type CompletionClient = Pick<AnthropicClient, 'complete'>;

export interface AnthropicGeneratorOptions {
  /** Source material beyond this many characters is cut before prompting */
  maxSourceChars: number;
  /** Per-request timeout handed to the client */
  timeoutMs?: number;
}

export class AnthropicQuizGenerator implements ContentGenerator {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: AnthropicGeneratorOptions
  ) {}

  async generate(request: QuizGenerationRequest, signal?: AbortSignal): Promise<string> {
    const prompt = buildQuizGenerationPrompt({
      ...request,
      sourceMaterial: truncateForPrompt(request.sourceMaterial, this.options.maxSourceChars),
    });

    const response = await this.client.complete({ prompt }, {
      signal,
      timeoutMs: this.options.timeoutMs,
    });

    if (response.truncated) {
      console.warn('[Generator] Quiz response hit the token limit and is likely truncated');
    }
    return response.text;
  }
}

export class AnthropicSyllabusGenerator implements SyllabusGenerator {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: AnthropicGeneratorOptions & {
      maxConcepts: number;
      maxConceptLength: number;
    }
  ) {}

  /**
   * @throws Error if the response cannot be parsed as a concept list
   */
  async generate(sourceMaterial: string, signal?: AbortSignal): Promise<string[]> {
    const prompt = buildSyllabusGenerationPrompt({
      sourceMaterial: truncateForPrompt(sourceMaterial, this.options.maxSourceChars),
      maxConcepts: this.options.maxConcepts,
      maxConceptLength: this.options.maxConceptLength,
    });

    const response = await this.client.complete({ prompt }, {
      signal,
      timeoutMs: this.options.timeoutMs,
    });

    const parsed = parseSyllabusResponse(response.text);
    if (!parsed.ok) {
      throw new Error(`Unusable syllabus response (${parsed.failure.kind}): ${parsed.failure.message}`);
    }
    return parsed.value;
  }
}
