/**
 * @fileoverview Prompt Architect CLI command definitions
 *
 * Defines the commands for transforming requests into structured prompts,
 * inspecting extracted context, and working with the template library.
 *
 * @module cli
 */

import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_TARGET_MODEL } from './config/extraction-limits.js';
import { EXPORT_FORMATS, exportPrompt, isExportFormat } from './export.js';
import { LexiconError } from './lexicon.js';
import { listModelProfiles } from './model-profiles.js';
import { createArchitect } from './prompt-architect.js';
import { getTemplateLibrary } from './template-library.js';
import { CATEGORIES, type Context, type PromptCategory, getErrorMessage } from './types.js';

/** Environment variable that overrides the default target model */
export const MODEL_ENV_VAR = 'PROMPT_ARCHITECT_MODEL';

interface TransformOptions {
  model: string;
  format: string;
  output?: string;
}

interface ExtractOptions {
  json?: boolean;
}

interface TemplateListOptions {
  category?: string;
}

interface TemplateFillOptions {
  var: string[];
  example?: boolean;
}

// ============ Helpers ============

function reportError(action: string, err: unknown): void {
  if (err instanceof LexiconError) {
    console.error(chalk.red(`[Lexicon] ${err.message}`));
  } else {
    console.error(chalk.red(`✗ ${action}: ${getErrorMessage(err)}`));
  }
  process.exitCode = 1;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parses repeated `key=value` options. The value may itself contain `=`.
 */
export function parseAssignments(pairs: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid value "${pair}", expected key=value`);
    }
    values[pair.slice(0, separator).trim()] = pair.slice(separator + 1);
  }
  return values;
}

function isCategory(value: string): value is PromptCategory {
  return value === 'other' || CATEGORIES.some((category) => category === value);
}

function printContext(context: Context): void {
  const list = (items: readonly string[]) => (items.length > 0 ? items.join(', ') : chalk.gray('(none)'));

  console.log(chalk.bold('\nExtracted Context:'));
  console.log(`  Intent: ${context.intent}`);
  console.log(`  Category: ${context.category}`);
  console.log(`  Audience: ${context.targetAudience}`);
  console.log(`  Tone: ${context.tone}`);
  console.log(`  Format: ${context.outputFormat}`);
  console.log(`  Complexity: ${context.complexity}`);
  console.log(`  Keywords: ${list(context.keywords)}`);
  console.log(`  Requirements: ${list(context.requirements)}`);
  console.log('');
}

// ============ Program ============

/**
 * Builds a fresh command tree. Each call is independent, so tests can parse
 * several command lines without shared option state.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('prompt-architect')
    .description('Turn short requests into structured, model-tuned prompts')
    .version('1.0.0');

  // ============ Prompt Commands ============

  program
    .command('transform <text...>')
    .alias('t')
    .description('Transform a request into a structured prompt')
    .option('-m, --model <id>', 'Target model', process.env[MODEL_ENV_VAR] ?? DEFAULT_TARGET_MODEL)
    .option('-f, --format <format>', `Output format (${EXPORT_FORMATS.join(', ')})`, 'text')
    .option('-o, --output <file>', 'Write the prompt to a file instead of stdout')
    .action((textParts: string[], options: TransformOptions) => {
      try {
        if (!isExportFormat(options.format)) {
          throw new Error(`Unknown format "${options.format}", expected one of: ${EXPORT_FORMATS.join(', ')}`);
        }

        const architect = createArchitect(options.model);
        if (architect.modelSelection.usedFallback) {
          console.error(chalk.yellow(architect.modelSelection.reason));
        }

        const output = exportPrompt(architect.transform(textParts.join(' ')), options.format);
        if (options.output) {
          writeFileSync(options.output, `${output}\n`, 'utf-8');
          console.log(chalk.green(`✓ Prompt written to ${options.output}`));
        } else {
          console.log(output);
        }
      } catch (err) {
        reportError('Failed to transform request', err);
      }
    });

  program
    .command('extract <text...>')
    .alias('x')
    .description('Show the context extracted from a request')
    .option('--json', 'Print the context as JSON')
    .action((textParts: string[], options: ExtractOptions) => {
      try {
        const context = createArchitect().extractContext(textParts.join(' '));
        if (options.json) {
          console.log(JSON.stringify(context, null, 2));
        } else {
          printContext(context);
        }
      } catch (err) {
        reportError('Failed to extract context', err);
      }
    });

  program
    .command('models')
    .description('List supported target models')
    .action(() => {
      console.log(chalk.bold('\nTarget Models:'));
      for (const profile of listModelProfiles()) {
        const marker = profile.id === DEFAULT_TARGET_MODEL ? chalk.green(' (default)') : '';
        const details = `[${profile.tier}, ${profile.contextWindow / 1000}k context]`;
        console.log(`  ${chalk.cyan(profile.id.padEnd(18))} ${profile.displayName}${marker} ${chalk.gray(details)}`);
      }
      console.log('');
    });

  // ============ Template Commands ============

  const templatesCmd = program
    .command('templates')
    .alias('tpl')
    .description('Browse and fill prompt templates');

  templatesCmd
    .command('list')
    .alias('ls')
    .description('List templates')
    .option('-c, --category <category>', 'Only templates in this category')
    .action((options: TemplateListOptions) => {
      const library = getTemplateLibrary();
      const { category } = options;

      if (category !== undefined && !isCategory(category)) {
        reportError('Failed to list templates', `Unknown category "${category}"`);
        return;
      }

      const names = category === undefined
        ? library.listTemplates()
        : library.getTemplatesByCategory(category).map((template) => template.name);

      if (names.length === 0) {
        console.log(chalk.yellow('No templates found'));
        return;
      }

      console.log(chalk.bold('\nTemplates:'));
      for (const name of names) {
        const template = library.getTemplate(name);
        console.log(`  ${chalk.cyan(name.padEnd(18))} ${template.title} ${chalk.gray(`[${template.category}]`)}`);
      }
      console.log('');
    });

  templatesCmd
    .command('show <name>')
    .description('Show a template and its placeholders')
    .action((name: string) => {
      try {
        const template = getTemplateLibrary().getTemplate(name);
        console.log(chalk.bold(`\n${template.title}`));
        console.log(`  Name: ${template.name}`);
        console.log(`  Category: ${template.category}`);
        console.log(`  Description: ${template.description}`);
        console.log(`  Variables: ${template.variables.join(', ')}`);
        console.log(chalk.bold('\nBody:'));
        console.log(template.body);
        console.log('');
      } catch (err) {
        reportError('Failed to show template', err);
      }
    });

  templatesCmd
    .command('fill <name>')
    .description('Fill a template with values')
    .option('-v, --var <key=value>', 'Placeholder value (repeatable)', collect, [])
    .option('--example', 'Start from the template example values')
    .action((name: string, options: TemplateFillOptions) => {
      try {
        const library = getTemplateLibrary();
        const base = options.example ? library.getTemplate(name).exampleValues : {};
        const values = { ...base, ...parseAssignments(options.var) };
        console.log(library.fillTemplate(name, values));
      } catch (err) {
        reportError('Failed to fill template', err);
      }
    });

  return program;
}
