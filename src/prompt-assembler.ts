/**
 * @fileoverview Prompt Assembler - Turns a Context into a structured prompt.
 *
 * Each section is looked up from the phrasing tables by the detected labels:
 * - Role: category persona, optional specialization clause, tone modifier
 * - Instructions: intent, category, audience, complexity, format, keywords
 * - Constraints: user requirements, global rules, tone/format rules, model hints
 * - Quality criteria: universal, category and tone dimensions
 *
 * Assembly is pure: the same Context and model always yield the same text.
 *
 * @module prompt-assembler
 */

import { DEFAULT_TARGET_MODEL, MAX_KEYWORD_INSTRUCTIONS, MAX_SPECIALIZATIONS } from './config/extraction-limits.js';
import { type Lexicon, getLexicon, lookup } from './lexicon.js';
import { type ModelProfile, getModelProfile } from './model-profiles.js';
import type { AssembledPrompt, Context } from './types.js';

// ========== Helpers ==========

/**
 * Joins items as prose: "a", "a and b", "a, b and c".
 */
export function joinAsProse(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

/** Keeps the first occurrence of each line */
function dedupe(lines: readonly string[]): string[] {
  return [...new Set(lines)];
}

/**
 * Domains for the context keywords that have a specialization entry,
 * in keyword order, without repeats.
 */
function findSpecializations(context: Context, lexicon: Lexicon): string[] {
  const domains: string[] = [];
  for (const keyword of context.keywords) {
    const entry = lexicon.keywords.specializations.find((candidate) => candidate.keyword === keyword);
    if (entry && !domains.includes(entry.domain)) {
      domains.push(entry.domain);
    }
    if (domains.length === MAX_SPECIALIZATIONS) break;
  }
  return domains;
}

// ========== Sections ==========

export function buildRole(context: Context, lexicon: Lexicon = getLexicon()): string {
  const { phrasing } = lexicon;
  const domains = findSpecializations(context, lexicon);
  const specialization = domains.length > 0 ? ` specializing in ${joinAsProse(domains)}` : '';
  return `${phrasing.roles[context.category]}${specialization}, ${phrasing.toneModifiers[context.tone]}.`;
}

export function buildInstructions(context: Context, lexicon: Lexicon = getLexicon()): string[] {
  const { phrasing } = lexicon;
  const formatName = phrasing.formatNames[context.outputFormat];

  const audienceLine =
    lookup(phrasing.audienceInstructions, context.targetAudience) ??
    `Tailor the content to ${context.targetAudience}, matching their background and needs`;

  const keywordLines = context.keywords
    .slice(0, MAX_KEYWORD_INSTRUCTIONS)
    .map((keyword) => `Address the topic "${keyword}" explicitly`);

  return [
    phrasing.intentInstructions[context.intent].split('{format}').join(formatName),
    ...phrasing.categoryInstructions[context.category],
    audienceLine,
    phrasing.complexityInstructions[context.complexity],
    phrasing.formatInstructions[context.outputFormat],
    ...keywordLines,
  ];
}

export function buildConstraints(
  context: Context,
  profile: ModelProfile,
  lexicon: Lexicon = getLexicon(),
): string[] {
  const { phrasing } = lexicon;
  return dedupe([
    ...context.requirements,
    ...phrasing.globalConstraints,
    phrasing.toneConstraints[context.tone],
    phrasing.formatConstraints[context.outputFormat],
    ...profile.hints,
  ]);
}

export function buildQualityCriteria(context: Context, lexicon: Lexicon = getLexicon()): string[] {
  const { phrasing } = lexicon;
  const toneCriterion = lookup(phrasing.toneCriteria, context.tone);
  return dedupe([
    ...phrasing.universalCriteria,
    ...phrasing.categoryCriteria[context.category],
    ...(toneCriterion ? [toneCriterion] : []),
  ]);
}

// ========== Rendering ==========

type PromptSections = Pick<AssembledPrompt, 'role' | 'instructions' | 'constraints' | 'qualityCriteria' | 'context'>;

/**
 * Renders the sections under `#` headers, separated by one blank line.
 * The Context section is omitted for blank input.
 */
export function renderFullText(sections: PromptSections): string {
  const { context } = sections;
  const blocks: string[] = [`# Role\n${sections.role}`];

  if (context.rawInput) {
    blocks.push(`# Context\n${context.rawInput}`);
  }

  blocks.push(
    `# Instructions\n${sections.instructions.map((line, i) => `${i + 1}. ${line}`).join('\n')}`,
    `# Constraints\n${sections.constraints.map((line) => `- ${line}`).join('\n')}`,
    `# Quality Criteria\n${sections.qualityCriteria.map((line) => `- ${line}`).join('\n')}`,
    [
      '# Response Profile',
      `Audience: ${context.targetAudience}`,
      `Tone: ${context.tone}`,
      `Format: ${context.outputFormat}`,
      `Complexity: ${context.complexity}`,
    ].join('\n'),
  );

  return blocks.join('\n\n');
}

// ========== Assembly ==========

/**
 * Assemble a structured prompt from an extracted Context.
 *
 * @param context - Output of extractContext
 * @param targetModel - Model identifier; unknown ids use the default profile
 * @param lexicon - Phrasing tables (defaults to the shared lexicon)
 */
export function assemblePrompt(
  context: Context,
  targetModel: string = DEFAULT_TARGET_MODEL,
  lexicon: Lexicon = getLexicon(),
): AssembledPrompt {
  const profile = getModelProfile(targetModel);

  const sections: PromptSections = {
    role: buildRole(context, lexicon),
    instructions: buildInstructions(context, lexicon),
    constraints: buildConstraints(context, profile, lexicon),
    qualityCriteria: buildQualityCriteria(context, lexicon),
    context,
  };

  return {
    ...sections,
    targetModel: profile.id,
    fullText: renderFullText(sections),
  };
}
