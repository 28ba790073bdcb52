/**
 * @fileoverview Utility module exports.
 *
 * This module re-exports all utility functions for easy import.
 *
 * @module utils
 */

export {
  ANSI_ESCAPE_PATTERN,
  WORD_LIMIT_PATTERN,
  WORD_TOKEN_PATTERN,
  createKeywordPattern,
  createPlaceholderPattern,
  escapeRegExp,
  keywordSuffixes,
  stripAnsi,
} from './regex-patterns.js';
