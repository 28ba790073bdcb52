/**
 * @fileoverview Type definitions for Prompt Architect
 *
 * This module contains the labels, records and error codes shared across
 * the extraction, assembly and template modules:
 * - Detection labels (intent, category, tone, format, complexity)
 * - The extracted Context record
 * - The AssembledPrompt output
 * - Prompt templates and their error codes
 */

// ========== Detection Labels ==========

/** Intents in detection priority order (first match wins) */
export const INTENTS = ['create', 'analyze', 'explain', 'improve', 'summarize', 'convert'] as const;

/** Categories in detection priority order (first match wins) */
export const CATEGORIES = [
  'analysis',
  'agent-development',
  'technical',
  'educational',
  'creative',
  'business',
  'content-creation',
  'conversation',
] as const;

export const TONES = ['professional', 'casual', 'academic', 'friendly', 'technical', 'persuasive'] as const;

export const OUTPUT_FORMATS = ['markdown', 'json', 'code', 'table', 'list', 'step-by-step', 'plain-text'] as const;

export const COMPLEXITY_LEVELS = ['basic', 'intermediate', 'advanced'] as const;

export type Intent = (typeof INTENTS)[number] | 'general';
export type PromptCategory = (typeof CATEGORIES)[number] | 'other';
export type Tone = (typeof TONES)[number] | 'neutral';
export type OutputFormat = (typeof OUTPUT_FORMATS)[number] | 'prose';
export type Complexity = (typeof COMPLEXITY_LEVELS)[number];

/** Fallback values used when nothing in the input matches */
export const DEFAULT_INTENT: Intent = 'general';
export const DEFAULT_CATEGORY: PromptCategory = 'other';
export const DEFAULT_AUDIENCE = 'general audience';
export const DEFAULT_TONE: Tone = 'neutral';
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'prose';
export const DEFAULT_COMPLEXITY: Complexity = 'intermediate';

// ========== Context ==========

/**
 * Attributes detected in one request.
 * Always fully populated; returned frozen by the extractor.
 */
export interface Context {
  /** The request with surrounding whitespace trimmed */
  readonly rawInput: string;
  readonly intent: Intent;
  readonly category: PromptCategory;
  /** Free-form audience label, e.g. "beginners" */
  readonly targetAudience: string;
  readonly tone: Tone;
  readonly outputFormat: OutputFormat;
  readonly complexity: Complexity;
  /** Topic keywords in first-seen order, deduplicated */
  readonly keywords: readonly string[];
  /** Constraints the user stated explicitly ("brief", "500 words", ...) */
  readonly requirements: readonly string[];
}

// ========== Assembled Prompt ==========

/**
 * Output of the assembler. A terminal value with no further lifecycle.
 */
export interface AssembledPrompt {
  role: string;
  instructions: string[];
  constraints: string[];
  qualityCriteria: string[];
  /** Resolved target model id the constraints were tuned for */
  targetModel: string;
  context: Context;
  /** All sections concatenated with headers */
  fullText: string;
}

/** Export formats offered by the CLI */
export type ExportFormat = 'text' | 'markdown' | 'json';

// ========== Templates ==========

/**
 * A named prompt template with `{placeholder}` markers in its body.
 */
export interface PromptTemplate {
  /** Unique lookup key, e.g. "blog_post" */
  name: string;
  title: string;
  category: PromptCategory;
  description: string;
  body: string;
  /** Every placeholder the body uses; all must be supplied to render */
  variables: readonly string[];
  /** Sample value for each variable */
  exampleValues: Readonly<Record<string, string>>;
}

// ========== Error Handling ==========

/**
 * Error codes raised by the template library
 */
export enum TemplateErrorCode {
  /** No template registered under the requested name */
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  /** A declared placeholder had no value */
  MISSING_PLACEHOLDER = 'MISSING_PLACEHOLDER',
}

/**
 * Default messages for each template error code
 */
export const TemplateErrorMessages: Record<TemplateErrorCode, string> = {
  [TemplateErrorCode.TEMPLATE_NOT_FOUND]: 'The requested template was not found',
  [TemplateErrorCode.MISSING_PLACEHOLDER]: 'A required template placeholder has no value',
};

/**
 * Type guard to check if a value is an Error instance
 * @param value The value to check
 * @returns True if the value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @example
 * ```typescript
 * try {
 *   library.fillTemplate('blog_post', values);
 * } catch (err) {
 *   console.error('Failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
