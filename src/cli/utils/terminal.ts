/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing and formatting terminal output.
 * In non-TTY environments the codes pass through harmlessly.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatAccuracy } from './terminal';
 *
 * console.log(bold('Mastery Report'));
 * console.log(formatAccuracy(4, 5));
 * ```
 */

// =============================================================================
// Text Style Modifiers
// =============================================================================

/** Bold text, for headings and key values */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Dim text, for hints, dates and IDs */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

/**
 * Removes ANSI escape codes, leaving the visible text.
 */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @example
 * console.log(formatSeparator(10));
 * // Output: "──────────" (dim)
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats an accuracy ratio as "correct/total (pct%)", colored by how close
 * it is to mastery: green at or above the threshold, yellow from half of it,
 * red below that.
 *
 * @example
 * stripAnsi(formatAccuracy(3, 4, 0.8)); // "3/4 (75%)"
 */
export function formatAccuracy(correct: number, total: number, threshold: number = 0.8): string {
  if (total === 0) {
    return dim('untested');
  }
  const ratio = correct / total;
  const text = `${correct}/${total} (${Math.round(ratio * 100)}%)`;
  if (ratio >= threshold) return green(text);
  if (ratio >= threshold / 2) return yellow(text);
  return red(text);
}

/**
 * Shortens text to `maxLength` characters, ending in "..." when cut.
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.substring(0, maxLength - 3)}...` : text;
}
