/**
 * @fileoverview Template Library - Named prompt templates with placeholders.
 *
 * Templates are registered once and never change. Filling a template checks
 * that every declared placeholder has a value before anything is rendered,
 * then substitutes all placeholders in a single pass so values that happen
 * to contain `{name}` text are left as they are.
 *
 * @module template-library
 */

import { BUILT_IN_TEMPLATES } from './prompts/index.js';
import { type PromptCategory, type PromptTemplate, TemplateErrorCode, TemplateErrorMessages } from './types.js';
import { createPlaceholderPattern } from './utils/index.js';

// ========== Errors ==========

/**
 * Base class for template failures; `code` identifies the kind.
 */
export class TemplateError extends Error {
  constructor(
    public readonly code: TemplateErrorCode,
    message: string = TemplateErrorMessages[code],
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class TemplateNotFoundError extends TemplateError {
  constructor(public readonly templateName: string) {
    super(TemplateErrorCode.TEMPLATE_NOT_FOUND, `Template "${templateName}" not found`);
    this.name = 'TemplateNotFoundError';
  }
}

export class MissingPlaceholderError extends TemplateError {
  constructor(
    public readonly templateName: string,
    public readonly missing: readonly string[],
  ) {
    super(
      TemplateErrorCode.MISSING_PLACEHOLDER,
      `Template "${templateName}" is missing values for: ${missing.join(', ')}`,
    );
    this.name = 'MissingPlaceholderError';
  }
}

// ========== Library ==========

export class TemplateLibrary {
  private readonly templates: ReadonlyMap<string, PromptTemplate>;

  constructor(templates: readonly PromptTemplate[] = BUILT_IN_TEMPLATES) {
    const byName = new Map<string, PromptTemplate>();
    for (const template of templates) {
      if (byName.has(template.name)) {
        throw new Error(`Duplicate template name: ${template.name}`);
      }
      byName.set(template.name, Object.freeze({ ...template }));
    }
    this.templates = byName;
  }

  /** Template names in registration order */
  listTemplates(): string[] {
    return [...this.templates.keys()];
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * @throws TemplateNotFoundError when no template has this name
   */
  getTemplate(name: string): PromptTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(name);
    }
    return template;
  }

  getTemplatesByCategory(category: PromptCategory): PromptTemplate[] {
    return [...this.templates.values()].filter((template) => template.category === category);
  }

  /** Distinct categories in order of first registration */
  getCategories(): PromptCategory[] {
    return [...new Set([...this.templates.values()].map((template) => template.category))];
  }

  /**
   * Render a template with a value for every declared placeholder.
   * Extra values are ignored.
   *
   * @throws TemplateNotFoundError when no template has this name
   * @throws MissingPlaceholderError listing every declared placeholder without a value
   */
  fillTemplate(name: string, values: Readonly<Record<string, string>>): string {
    const template = this.getTemplate(name);
    const provided = new Map(Object.entries(values));

    const missing = template.variables.filter((variable) => !provided.has(variable));
    if (missing.length > 0) {
      throw new MissingPlaceholderError(name, missing);
    }

    return template.body.replace(createPlaceholderPattern(), (marker, variable: string) =>
      template.variables.includes(variable) ? (provided.get(variable) ?? marker) : marker,
    );
  }
}

let libraryInstance: TemplateLibrary | null = null;

/**
 * Gets or creates the shared library of built-in templates.
 */
export function getTemplateLibrary(): TemplateLibrary {
  if (!libraryInstance) {
    libraryInstance = new TemplateLibrary();
  }
  return libraryInstance;
}
