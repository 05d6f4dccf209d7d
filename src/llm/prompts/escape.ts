/**
 * Neutralizes text interpolated into a prompt: closing tags of the prompt's
 * own sections and code fences are defanged so material cannot end a
 * section early or open a fenced block the response parser would see.
 */
export function escapePromptInput(input: string, tags: readonly string[]): string {
  let escaped = input.trim();
  for (const tag of tags) {
    escaped = escaped.replace(new RegExp(`</${tag}>`, 'gi'), `&lt;/${tag}&gt;`);
  }
  return escaped.replace(/```/g, '` ` `');
}

/**
 * Cuts text to at most `maxChars`, marking the cut.
 */
export function truncateForPrompt(input: string, maxChars: number): string {
  if (input.length <= maxChars) return input;
  return `${input.slice(0, maxChars)}\n[... material truncated ...]`;
}
