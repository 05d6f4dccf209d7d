/**
 * Sanitizer Module - Barrel Export
 */

export { extractOutermostObject, type ExtractionResult } from './json-extraction';
export { quizItemSchema, quizPayloadSchema } from './quiz-schema';
export {
  sanitizeJson,
  sanitizeQuizResponse,
  type ParseFailure,
  type ParseFailureKind,
  type SanitizeResult,
} from './sanitizer';
