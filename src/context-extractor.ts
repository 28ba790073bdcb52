/**
 * @fileoverview Context Extractor - Detects request attributes by keyword.
 *
 * Every field is detected independently against an ordered list of
 * (label → keywords) rules from the lexicon. The first rule with a match
 * wins; when nothing matches the field falls back to its default. This is a
 * priority tie-break, not a scored classifier.
 *
 * Extraction is total: empty or unrecognized input yields the all-default
 * record rather than an error.
 *
 * @module context-extractor
 */

import {
  ADVANCED_WORD_COUNT,
  LONG_WORD_LENGTH,
  LONG_WORD_MIN_WORDS,
  LONG_WORD_RATIO,
  MAX_KEYWORDS,
  MIN_FALLBACK_KEYWORD_LENGTH,
} from './config/extraction-limits.js';
import { type Lexicon, getLexicon } from './lexicon.js';
import {
  type Complexity,
  type Context,
  DEFAULT_AUDIENCE,
  DEFAULT_CATEGORY,
  DEFAULT_COMPLEXITY,
  DEFAULT_INTENT,
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_TONE,
  type Intent,
  type OutputFormat,
  type PromptCategory,
  type Tone,
} from './types.js';
import { WORD_LIMIT_PATTERN, WORD_TOKEN_PATTERN, createKeywordPattern } from './utils/index.js';

// ========== Compiled Rules ==========

interface CompiledRule<L> {
  label: L;
  pattern: RegExp;
}

interface CompiledLexicon {
  intents: CompiledRule<Intent>[];
  categories: CompiledRule<PromptCategory>[];
  audiences: CompiledRule<string>[];
  tones: CompiledRule<Tone>[];
  outputFormats: CompiledRule<OutputFormat>[];
  complexity: CompiledRule<Complexity>[];
  requirements: CompiledRule<string>[];
  vocabulary: ReadonlySet<string>;
  stopWords: ReadonlySet<string>;
}

function compileRules<L>(rules: readonly { label: L; keywords: readonly string[] }[]): CompiledRule<L>[] {
  return rules.map((rule) => ({ label: rule.label, pattern: createKeywordPattern(rule.keywords) }));
}

/** Compiled patterns per lexicon instance */
const compiledCache = new WeakMap<Lexicon, CompiledLexicon>();

function compile(lexicon: Lexicon): CompiledLexicon {
  const cached = compiledCache.get(lexicon);
  if (cached) return cached;

  const { keywords } = lexicon;
  const compiled: CompiledLexicon = {
    intents: compileRules(keywords.intents),
    categories: compileRules(keywords.categories),
    audiences: compileRules(keywords.audiences),
    tones: compileRules(keywords.tones),
    outputFormats: compileRules(keywords.outputFormats),
    complexity: compileRules(keywords.complexity),
    requirements: compileRules(
      keywords.requirements.map((req) => ({ label: req.constraint, keywords: req.keywords })),
    ),
    vocabulary: new Set(keywords.vocabulary),
    stopWords: new Set(keywords.stopWords),
  };
  compiledCache.set(lexicon, compiled);
  return compiled;
}

// ========== Helpers ==========

/**
 * Lower-cases, trims and collapses whitespace.
 */
export function normalizeInput(rawText: string): string {
  return rawText.toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * Splits normalized text into word tokens.
 */
export function tokenize(normalized: string): string[] {
  return normalized.match(WORD_TOKEN_PATTERN) ?? [];
}

function firstMatch<L>(rules: readonly CompiledRule<L>[], text: string): L | undefined {
  return rules.find((rule) => rule.pattern.test(text))?.label;
}

function detectComplexity(rules: CompiledLexicon, normalized: string, tokens: string[]): Complexity {
  const explicit = firstMatch(rules.complexity, normalized);
  if (explicit) return explicit;

  if (tokens.length >= ADVANCED_WORD_COUNT) return 'advanced';

  if (tokens.length >= LONG_WORD_MIN_WORDS) {
    const longWords = tokens.filter((token) => token.length >= LONG_WORD_LENGTH).length;
    if (longWords / tokens.length >= LONG_WORD_RATIO) return 'advanced';
  }

  return DEFAULT_COMPLEXITY;
}

/**
 * Curated vocabulary terms in first-seen order; when none are present, the
 * most frequent non-stop-word tokens (ties broken by first occurrence),
 * still reported in first-seen order.
 */
function extractKeywords(rules: CompiledLexicon, tokens: string[]): string[] {
  const curated = [...new Set(tokens.filter((token) => rules.vocabulary.has(token)))];
  if (curated.length > 0) {
    return curated.slice(0, MAX_KEYWORDS);
  }

  // Map preserves first-seen order
  const counts = new Map<string, number>();
  for (const token of tokens) {
    if (token.length < MIN_FALLBACK_KEYWORD_LENGTH) continue;
    if (rules.stopWords.has(token) || /^\d+$/.test(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so equal counts keep first-seen order
  const top = new Set(
    [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_KEYWORDS)
      .map(([token]) => token),
  );
  return [...counts.keys()].filter((token) => top.has(token));
}

function extractRequirements(rules: CompiledLexicon, normalized: string): string[] {
  const requirements = rules.requirements
    .filter((rule) => rule.pattern.test(normalized))
    .map((rule) => rule.label);

  const wordLimit = normalized.match(WORD_LIMIT_PATTERN);
  if (wordLimit) {
    requirements.push(`Limit the response to approximately ${wordLimit[1].replace(/,/g, '')} words`);
  }

  return [...new Set(requirements)];
}

// ========== Extraction ==========

/**
 * Extract the structured Context from a raw request.
 *
 * @param rawText - The request as typed by the user
 * @param lexicon - Keyword tables (defaults to the shared lexicon)
 * @returns A frozen, fully populated Context
 *
 * @example
 * ```typescript
 * const context = extractContext('Write a blog post about AI ethics for beginners');
 * context.intent;         // 'create'
 * context.category;       // 'content-creation'
 * context.targetAudience; // 'beginners'
 * ```
 */
export function extractContext(rawText: string, lexicon: Lexicon = getLexicon()): Context {
  const rules = compile(lexicon);
  const normalized = normalizeInput(rawText);
  const tokens = tokenize(normalized);

  return Object.freeze({
    rawInput: rawText.trim(),
    intent: firstMatch(rules.intents, normalized) ?? DEFAULT_INTENT,
    category: firstMatch(rules.categories, normalized) ?? DEFAULT_CATEGORY,
    targetAudience: firstMatch(rules.audiences, normalized) ?? DEFAULT_AUDIENCE,
    tone: firstMatch(rules.tones, normalized) ?? DEFAULT_TONE,
    outputFormat: firstMatch(rules.outputFormats, normalized) ?? DEFAULT_OUTPUT_FORMAT,
    complexity: detectComplexity(rules, normalized, tokens),
    keywords: Object.freeze(extractKeywords(rules, tokens)),
    requirements: Object.freeze(extractRequirements(rules, normalized)),
  });
}
