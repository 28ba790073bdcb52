/**
 * @fileoverview Shared regex patterns for request and template parsing.
 *
 * Pre-compiled patterns avoid re-compilation overhead on each use.
 * Import these patterns instead of defining them locally.
 *
 * @module utils/regex-patterns
 */

/**
 * Word tokens in normalized (lower-cased) text.
 * Trailing `+` and `#` are kept so "c++" and "c#" survive as tokens.
 * Note: Has global flag - use with String.prototype.match, not exec().
 */
export const WORD_TOKEN_PATTERN = /[a-z0-9]+[+#]*/g;

/**
 * Explicit length limit in a request: "500 words", "about 1,200 word".
 *
 * Capture groups:
 * - Group 1: The number of words, possibly with comma digit groups
 */
export const WORD_LIMIT_PATTERN = /(\d{1,3}(?:,\d{3})+|\d+)\s*words?\b/;

/**
 * Simple ANSI CSI pattern for stripping colors from CLI output.
 * Matches: ESC [ params letter
 */
export const ANSI_ESCAPE_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

/**
 * Creates a template placeholder pattern: `{topic}`, `{word_count}`.
 * Returns a new instance each call, so lastIndex state is never shared.
 *
 * Capture groups:
 * - Group 1: The placeholder name
 */
export function createPlaceholderPattern(): RegExp {
  return /\{([a-z][a-z0-9_]*)\}/g;
}

/**
 * Escapes regex metacharacters so the text matches literally.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Inflections a keyword may carry, chosen by its ending so that no new
 * word is formed: "create" takes "d" but "fun" does not ("fund"), "pitch"
 * takes "es" but "plan" does not ("planes").
 */
export function keywordSuffixes(keyword: string): string {
  if (keyword.endsWith('e')) return '(?:s|d|r|rs)?';
  if (/(?:s|x|z|ch|sh)$/.test(keyword)) return '(?:es|ed|ing|er|ers)?';
  return '(?:s|ed|ing|er|ers)?';
}

/**
 * Builds a pattern matching any of the keywords as a whole word or phrase,
 * optionally inflected: "beginner" matches "beginners", "new" does not match
 * "knew", "list" does not match "listen".
 * @param keywords - Lower-case keywords or phrases
 */
export function createKeywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map((keyword) => `${escapeRegExp(keyword)}${keywordSuffixes(keyword)}`);
  return new RegExp(`(?<![a-z0-9])(?:${alternatives.join('|')})(?![a-z0-9])`);
}

/**
 * Strips ANSI escape codes from text.
 * @param text - Text containing ANSI escape codes
 * @returns Text with ANSI codes removed
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}
