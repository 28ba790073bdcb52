/**
 * @fileoverview Prompt Architect - Programmatic entry point.
 *
 * Binds extraction and assembly to one resolved target model:
 *
 * ```typescript
 * const architect = createArchitect('gpt-4o');
 * const prompt = architect.transform('Write a blog post about AI ethics for beginners');
 * console.log(prompt.fullText);
 * ```
 *
 * @module prompt-architect
 */

import { extractContext } from './context-extractor.js';
import { type Lexicon, getLexicon } from './lexicon.js';
import { type ModelSelection, type TargetModel, resolveTargetModel } from './model-profiles.js';
import { assemblePrompt } from './prompt-assembler.js';
import type { AssembledPrompt, Context } from './types.js';

export class Architect {
  constructor(
    /** How the requested model identifier was resolved */
    public readonly modelSelection: ModelSelection,
    private readonly lexicon: Lexicon = getLexicon(),
  ) {}

  get targetModel(): TargetModel {
    return this.modelSelection.model;
  }

  /**
   * Extract the Context of a request, then assemble the prompt for it.
   */
  transform(rawText: string): AssembledPrompt {
    return assemblePrompt(this.extractContext(rawText), this.targetModel, this.lexicon);
  }

  extractContext(rawText: string): Context {
    return extractContext(rawText, this.lexicon);
  }
}

/**
 * Create an Architect for a target model.
 * Unknown identifiers fall back to the default model; check
 * `modelSelection.usedFallback` to find out.
 */
export function createArchitect(targetModel?: string, lexicon?: Lexicon): Architect {
  return new Architect(resolveTargetModel(targetModel), lexicon);
}
