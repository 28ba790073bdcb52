/**
 * @fileoverview Library exports for programmatic use.
 *
 * @module lib
 */

export { Architect, createArchitect } from './prompt-architect.js';
export { extractContext } from './context-extractor.js';
export { assemblePrompt } from './prompt-assembler.js';
export { EXPORT_FORMATS, type ExportedPrompt, exportPrompt, isExportFormat } from './export.js';
export {
  type ModelProfile,
  type ModelSelection,
  type ModelTier,
  TARGET_MODELS,
  type TargetModel,
  getModelProfile,
  isTargetModel,
  listModelProfiles,
  resolveTargetModel,
} from './model-profiles.js';
export {
  MissingPlaceholderError,
  TemplateError,
  TemplateLibrary,
  TemplateNotFoundError,
  getTemplateLibrary,
} from './template-library.js';
export { type Lexicon, LexiconError, getLexicon, loadLexicon } from './lexicon.js';
export * from './types.js';
