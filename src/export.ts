/**
 * @fileoverview Export - Renders an assembled prompt for output.
 *
 * @module export
 */

import type { AssembledPrompt, ExportFormat } from './types.js';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['text', 'markdown', 'json'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * JSON document shape for `exportPrompt(prompt, 'json')`.
 */
export interface ExportedPrompt {
  targetModel: string;
  context: AssembledPrompt['context'];
  sections: Pick<AssembledPrompt, 'role' | 'instructions' | 'constraints' | 'qualityCriteria'>;
  fullText: string;
}

/**
 * Render a prompt for output.
 * - text: the full text as assembled
 * - markdown: the full text under a title line naming the model
 * - json: sections, context and full text, indented by 2 spaces
 */
export function exportPrompt(prompt: AssembledPrompt, format: ExportFormat = 'text'): string {
  switch (format) {
    case 'text':
      return prompt.fullText;
    case 'markdown':
      return `# Structured Prompt (${prompt.targetModel})\n\n${prompt.fullText}`;
    case 'json': {
      const document: ExportedPrompt = {
        targetModel: prompt.targetModel,
        context: prompt.context,
        sections: {
          role: prompt.role,
          instructions: prompt.instructions,
          constraints: prompt.constraints,
          qualityCriteria: prompt.qualityCriteria,
        },
        fullText: prompt.fullText,
      };
      return JSON.stringify(document, null, 2);
    }
  }
}
