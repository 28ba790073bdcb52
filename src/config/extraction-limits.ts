/**
 * @fileoverview Centralized limits for context extraction and prompt assembly.
 *
 * These constants bound the size of extracted keyword lists and the
 * thresholds of the complexity heuristic.
 *
 * @module config/extraction-limits
 */

// ============================================================================
// Keyword Extraction
// ============================================================================

/**
 * Maximum keywords kept on a Context.
 */
export const MAX_KEYWORDS = 10;

/**
 * Minimum token length for keywords picked by the frequency fallback
 * (used only when no curated vocabulary term is present).
 */
export const MIN_FALLBACK_KEYWORD_LENGTH = 4;

// ============================================================================
// Complexity Heuristic
// ============================================================================

/**
 * Requests with at least this many words are treated as advanced
 * when no explicit complexity keyword is present.
 */
export const ADVANCED_WORD_COUNT = 40;

/**
 * A word of at least this many letters counts as "long".
 */
export const LONG_WORD_LENGTH = 10;

/**
 * Share of long words that marks a request as advanced.
 */
export const LONG_WORD_RATIO = 0.3;

/**
 * The long-word ratio is only consulted for requests of at least this many words.
 */
export const LONG_WORD_MIN_WORDS = 8;

// ============================================================================
// Prompt Assembly
// ============================================================================

/**
 * Maximum per-keyword "cover this topic" instructions.
 */
export const MAX_KEYWORD_INSTRUCTIONS = 5;

/**
 * Maximum domains named in the role's specialization clause.
 */
export const MAX_SPECIALIZATIONS = 3;

/**
 * Target model used when none is given or the given one is unknown.
 */
export const DEFAULT_TARGET_MODEL = 'claude-3.5-sonnet';
