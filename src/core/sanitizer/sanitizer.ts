/**
 * Response Sanitizer
 *
 * Turns untrusted generator text into a validated record, or a ParseFailure
 * value. The procedure is always the same:
 *
 * 1. Locate the outermost `{...}` (prose and code fences around it are ignored)
 * 2. JSON.parse that substring
 * 3. Validate the parsed value against a Zod schema
 *
 * There is no partial recovery. One malformed quiz item fails the whole
 * document, because a salvaged item with a bad concept label would
 * be recorded against the wrong concept.
 */

import type { z } from 'zod';
import type { QuizPayload } from '../models';
import { extractOutermostObject } from './json-extraction';
import { quizPayloadSchema } from './quiz-schema';

/**
 * Why a raw response could not be turned into a record.
 *
 * - 'no_json': no opening brace at all (refusal, plain prose)
 * - 'unbalanced': an object started but never closed (truncated output)
 * - 'invalid_json': the object text is not valid JSON
 * - 'schema': valid JSON with the wrong shape
 */
export type ParseFailureKind = 'no_json' | 'unbalanced' | 'invalid_json' | 'schema';

export interface ParseFailure {
  kind: ParseFailureKind;
  message: string;
  /** Schema issues as `path: message` strings; empty for non-schema failures */
  issues: string[];
}

export type SanitizeResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ParseFailure };

/**
 * Sanitizes a raw response against any Zod schema.
 *
 * @param raw - Raw generator output
 * @param schema - Schema the extracted object must satisfy
 */
export function sanitizeJson<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): SanitizeResult<T> {
  const extraction = extractOutermostObject(raw);
  if (!extraction.found) {
    return {
      ok: false,
      failure: {
        kind: extraction.reason,
        message:
          extraction.reason === 'no_json'
            ? 'Response contains no JSON object'
            : 'Response JSON object is not closed (truncated output?)',
        issues: [],
      },
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extraction.text);
  } catch (error) {
    return {
      ok: false,
      failure: {
        kind: 'invalid_json',
        message: `Response JSON could not be parsed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        issues: [],
      },
    };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    return {
      ok: false,
      failure: {
        kind: 'schema',
        message: `Response does not match the expected schema (${issues.length} issue${
          issues.length === 1 ? '' : 's'
        })`,
        issues,
      },
    };
  }

  return { ok: true, value: result.data };
}

/**
 * Sanitizes a quiz generator response.
 *
 * @example
 * ```typescript
 * const result = sanitizeQuizResponse(rawText);
 * if (result.ok) {
 *   console.log(`${result.value.quiz.length} items`);
 * } else {
 *   console.warn(result.failure.kind, result.failure.issues);
 * }
 * ```
 */
export function sanitizeQuizResponse(raw: string): SanitizeResult<QuizPayload> {
  return sanitizeJson(raw, quizPayloadSchema);
}
