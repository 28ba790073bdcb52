/**
 * @fileoverview Tests for CLI commands
 *
 * Runs fresh command trees against captured console output.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MODEL_ENV_VAR, createProgram, parseAssignments } from '../src/cli.js';
import { exportPrompt } from '../src/export.js';
import { createArchitect } from '../src/prompt-architect.js';
import { getTemplateLibrary } from '../src/template-library.js';
import { stripAnsi } from '../src/utils/index.js';

function run(...args: string[]): void {
  createProgram().parse(args, { from: 'user' });
}

describe('CLI', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const logged = (): string[] => logSpy.mock.calls.map((call) => stripAnsi(String(call[0])));
  const errors = (): string[] => errorSpy.mock.calls.map((call) => stripAnsi(String(call[0])));

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
  });

  describe('transform', () => {
    it('should print the text prompt', () => {
      run('transform', 'Write', 'a', 'blog', 'post', 'about', 'AI', 'ethics', 'for', 'beginners');

      expect(logged()).toEqual([createArchitect().transform('Write a blog post about AI ethics for beginners').fullText]);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should export JSON for the chosen model', () => {
      run('transform', 'Write a poem', '-m', 'gpt-4o', '-f', 'json');

      expect(logged()).toEqual([exportPrompt(createArchitect('gpt-4o').transform('Write a poem'), 'json')]);
    });

    it('should read the default model from the environment', () => {
      vi.stubEnv(MODEL_ENV_VAR, 'gemini-pro');
      run('transform', 'Write a poem', '-f', 'json');

      expect(JSON.parse(logged()[0]).targetModel).toBe('gemini-pro');
    });

    it('should warn when falling back to the default model', () => {
      run('transform', 'Write a poem', '-m', 'mystery');

      expect(errors()).toEqual(['Unknown target model "mystery", using claude-3.5-sonnet']);
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject unknown formats', () => {
      run('transform', 'Write a poem', '-f', 'pdf');

      expect(errors()).toEqual([
        '✗ Failed to transform request: Unknown format "pdf", expected one of: text, markdown, json',
      ]);
      expect(logSpy).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });

    it('should write the prompt to a file', () => {
      const dir = mkdtempSync(join(tmpdir(), 'cli-test-'));
      const file = join(dir, 'prompt.md');
      try {
        run('transform', 'Write a poem', '-f', 'markdown', '-o', file);

        expect(readFileSync(file, 'utf-8')).toBe(
          `${exportPrompt(createArchitect().transform('Write a poem'), 'markdown')}\n`,
        );
        expect(logged()).toEqual([`✓ Prompt written to ${file}`]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('extract', () => {
    it('should print the context as JSON', () => {
      run('extract', 'Explain quantum computing to high school students', '--json');

      expect(JSON.parse(logged()[0])).toEqual({
        rawInput: 'Explain quantum computing to high school students',
        intent: 'explain',
        category: 'educational',
        targetAudience: 'students',
        tone: 'neutral',
        outputFormat: 'prose',
        complexity: 'basic',
        keywords: ['quantum', 'computing'],
        requirements: [],
      });
    });

    it('should print a readable summary', () => {
      run('extract', 'Write a blog post about AI ethics for beginners');

      expect(logged()).toEqual([
        '\nExtracted Context:',
        '  Intent: create',
        '  Category: content-creation',
        '  Audience: beginners',
        '  Tone: neutral',
        '  Format: prose',
        '  Complexity: basic',
        '  Keywords: ai, ethics',
        '  Requirements: (none)',
        '',
      ]);
    });
  });

  describe('models', () => {
    it('should mark the default model', () => {
      run('models');

      expect(logged()).toContain(`  ${'claude-3.5-sonnet'.padEnd(18)} Claude 3.5 Sonnet (default) [extended, 200k context]`);
      expect(logged()).toContain(`  ${'gpt-4o'.padEnd(18)} GPT-4o [balanced, 128k context]`);
    });
  });

  describe('templates', () => {
    it('should list templates in a category', () => {
      run('templates', 'list', '-c', 'creative');

      expect(logged()).toEqual([
        '\nTemplates:',
        `  ${'story_writer'.padEnd(18)} Creative Story Writer [creative]`,
        '',
      ]);
    });

    it('should reject unknown categories', () => {
      run('templates', 'list', '-c', 'poetry');

      expect(errors()).toEqual(['✗ Failed to list templates: Unknown category "poetry"']);
      expect(process.exitCode).toBe(1);
    });

    it('should report categories without templates', () => {
      run('templates', 'list', '-c', 'conversation');
      expect(logged()).toEqual(['No templates found']);
    });

    it('should show a template', () => {
      run('templates', 'show', 'blog_post');

      expect(logged()).toContain('  Variables: topic, audience, num_sections, tone, word_count');
    });

    it('should report unknown templates', () => {
      run('templates', 'show', 'limerick');

      expect(errors()).toEqual(['✗ Failed to show template: Template "limerick" not found']);
      expect(process.exitCode).toBe(1);
    });

    it('should fill a template from example values with overrides', () => {
      run('templates', 'fill', 'blog_post', '--example', '-v', 'topic=urban gardening', '-v', 'word_count=900');

      const library = getTemplateLibrary();
      expect(logged()).toEqual([
        library.fillTemplate('blog_post', {
          ...library.getTemplate('blog_post').exampleValues,
          topic: 'urban gardening',
          word_count: '900',
        }),
      ]);
    });

    it('should list missing placeholders', () => {
      run('templates', 'fill', 'blog_post', '-v', 'topic=AI', '-v', 'audience=developers');

      expect(errors()).toEqual([
        '✗ Failed to fill template: Template "blog_post" is missing values for: num_sections, tone, word_count',
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('should reject values without a key', () => {
      run('templates', 'fill', 'blog_post', '-v', 'topic');

      expect(errors()).toEqual(['✗ Failed to fill template: Invalid value "topic", expected key=value']);
    });
  });
});

describe('parseAssignments', () => {
  it('should split on the first equals sign', () => {
    expect(parseAssignments(['topic=a=b', 'tone= calm'])).toEqual({ topic: 'a=b', tone: ' calm' });
  });

  it('should reject pairs with an empty key', () => {
    expect(() => parseAssignments(['=value'])).toThrow('Invalid value "=value", expected key=value');
  });
});
