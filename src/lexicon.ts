/**
 * @fileoverview Keyword and phrasing tables for detection and assembly.
 *
 * The tables live in `data/lexicon.json` (what to detect) and
 * `data/phrasing.json` (what to write for each detected label). Both are
 * validated against zod schemas on first use and frozen afterwards, so every
 * caller shares one read-only copy.
 *
 * @module lexicon
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CATEGORIES, INTENTS, OUTPUT_FORMATS, TONES, getErrorMessage } from './types.js';

/** Directory holding lexicon.json and phrasing.json (sibling of src/ and dist/) */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url));

// ========== Schemas ==========

const keywordList = z.array(z.string().trim().toLowerCase().min(1)).min(1);

const rule = <L extends z.ZodTypeAny>(label: L) => z.object({ label, keywords: keywordList });

export const lexiconSchema = z.object({
  intents: z.array(rule(z.enum(INTENTS))),
  categories: z.array(rule(z.enum(CATEGORIES))),
  audiences: z.array(rule(z.string().min(1))),
  tones: z.array(rule(z.enum(TONES))),
  outputFormats: z.array(rule(z.enum(OUTPUT_FORMATS))),
  complexity: z.array(rule(z.enum(['basic', 'advanced']))),
  requirements: z.array(z.object({ keywords: keywordList, constraint: z.string().min(1) })),
  vocabulary: z.array(z.string().toLowerCase().min(1)),
  stopWords: z.array(z.string().toLowerCase().min(1)),
  specializations: z.array(z.object({ keyword: z.string().toLowerCase().min(1), domain: z.string().min(1) })),
});

const byCategory = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    'content-creation': value,
    'agent-development': value,
    educational: value,
    business: value,
    technical: value,
    creative: value,
    analysis: value,
    conversation: value,
    other: value,
  });

const byTone = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    professional: value,
    casual: value,
    academic: value,
    friendly: value,
    technical: value,
    persuasive: value,
    neutral: value,
  });

const byFormat = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    markdown: value,
    json: value,
    code: value,
    table: value,
    list: value,
    'step-by-step': value,
    'plain-text': value,
    prose: value,
  });

const sentence = z.string().min(1);

export const phrasingSchema = z.object({
  roles: byCategory(sentence),
  toneModifiers: byTone(sentence),
  formatNames: byFormat(sentence),
  intentInstructions: z.object({
    create: sentence,
    analyze: sentence,
    explain: sentence,
    improve: sentence,
    summarize: sentence,
    convert: sentence,
    general: sentence,
  }),
  categoryInstructions: byCategory(z.array(sentence).min(1)),
  audienceInstructions: z.record(z.string(), sentence),
  complexityInstructions: z.object({ basic: sentence, intermediate: sentence, advanced: sentence }),
  formatInstructions: byFormat(sentence),
  globalConstraints: z.array(sentence).min(1),
  toneConstraints: byTone(sentence),
  formatConstraints: byFormat(sentence),
  universalCriteria: z.array(sentence).min(1),
  categoryCriteria: byCategory(z.array(sentence).min(1)),
  toneCriteria: z.record(z.string(), sentence),
});

export type KeywordLexicon = z.infer<typeof lexiconSchema>;
export type Phrasing = z.infer<typeof phrasingSchema>;

export interface Lexicon {
  keywords: KeywordLexicon;
  phrasing: Phrasing;
}

// ========== Errors ==========

/**
 * Raised when a data file is missing, unreadable or fails validation.
 */
export class LexiconError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'LexiconError';
  }
}

// ========== Loading ==========

function readDataFile<T extends z.ZodTypeAny>(dataDir: string, fileName: string, schema: T): z.output<T> {
  const filePath = join(dataDir, fileName);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new LexiconError(`Failed to read ${fileName}: ${getErrorMessage(err)}`, filePath);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new LexiconError(`Invalid ${fileName}: ${issues.join('; ')}`, filePath, issues);
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read and validate both data files from a directory.
 * Throws LexiconError on the first file that is missing or invalid.
 */
export function loadLexicon(dataDir: string = DEFAULT_DATA_DIR): Lexicon {
  return deepFreeze({
    keywords: readDataFile(dataDir, 'lexicon.json', lexiconSchema),
    phrasing: readDataFile(dataDir, 'phrasing.json', phrasingSchema),
  });
}

let lexiconInstance: Lexicon | null = null;

/**
 * Gets or loads the shared lexicon from the default data directory.
 */
export function getLexicon(): Lexicon {
  if (!lexiconInstance) {
    lexiconInstance = loadLexicon();
  }
  return lexiconInstance;
}

/**
 * Looks up a free-form key in a validated record.
 * @returns The entry, or undefined when the record has no such own key
 */
export function lookup(record: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
