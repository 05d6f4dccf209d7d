/**
 * LLM Module
 *
 * Completion client over the Anthropic SDK plus the prompt builders for
 * quiz and syllabus generation.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, buildQuizGenerationPrompt } from './llm';
 *
 * const client = new AnthropicClient();
 * const response = await client.complete(
 *   { prompt: buildQuizGenerationPrompt({ concepts, sourceMaterial, itemCount: 10, mode: 'general' }) },
 *   { signal, timeoutMs: 60_000 }
 * );
 * ```
 */

export { AnthropicClient } from './client';

export type {
  LLMClientConfig,
  CompletionRequest,
  LLMResponse,
  LLMErrorType,
  RequestOptions,
} from './types';

export { LLMError } from './types';

export {
  buildQuizGenerationPrompt,
  buildSyllabusGenerationPrompt,
  parseSyllabusResponse,
  syllabusResponseSchema,
  escapePromptInput,
  truncateForPrompt,
  type QuizPromptParams,
  type SyllabusPromptParams,
} from './prompts';
