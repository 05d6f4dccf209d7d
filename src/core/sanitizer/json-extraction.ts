/**
 * Outermost JSON Object Extraction
 *
 * Generators wrap structured output in prose, markdown code fences, or both.
 * This module finds the first `{` in the text and the `}` that closes it,
 * skipping braces that appear inside JSON string literals.
 */

/**
 * Result of scanning a raw response for a JSON object.
 */
export type ExtractionResult =
  | { found: true; text: string }
  | { found: false; reason: 'no_json' | 'unbalanced' };

/**
 * Extracts the outermost brace-delimited object from a raw response.
 *
 * @param raw - Raw generator output
 * @returns The object substring, or the reason nothing was found
 *
 * @example
 * ```typescript
 * extractOutermostObject('Sure! ```json\n{"a": "}"}\n``` Enjoy.');
 * // { found: true, text: '{"a": "}"}' }
 *
 * extractOutermostObject('{"quiz": [');
 * // { found: false, reason: 'unbalanced' }
 * ```
 */
export function extractOutermostObject(raw: string): ExtractionResult {
  const start = raw.indexOf('{');
  if (start === -1) {
    return { found: false, reason: 'no_json' };
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return { found: true, text: raw.substring(start, i + 1) };
      }
    }
  }

  // Truncated output: the opening brace never closed
  return { found: false, reason: 'unbalanced' };
}
