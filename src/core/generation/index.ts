/**
 * Generation Module - Barrel Export
 */

export type {
  ContentGenerator,
  SyllabusGenerator,
  QuizGenerationRequest,
  GenerationMode,
} from './types';
export {
  AnthropicQuizGenerator,
  AnthropicSyllabusGenerator,
  type AnthropicGeneratorOptions,
  type CompletionClient,
} from './anthropic-generators';
