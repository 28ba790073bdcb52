/**
 * @fileoverview Tests for shared regex helpers
 */

import { describe, it, expect } from 'vitest';
import {
  WORD_LIMIT_PATTERN,
  createKeywordPattern,
  escapeRegExp,
  keywordSuffixes,
  stripAnsi,
} from '../src/utils/index.js';

describe('createKeywordPattern', () => {
  it('should match whole words and common inflections', () => {
    const pattern = createKeywordPattern(['beginner', 'high school', 'create']);

    expect(pattern.test('for beginners')).toBe(true);
    expect(pattern.test('a beginner')).toBe(true);
    expect(pattern.test('for high schoolers')).toBe(true);
    expect(pattern.test('created yesterday')).toBe(true);
  });

  it('should not match inside other words', () => {
    expect(createKeywordPattern(['new to']).test('i knew to wait')).toBe(false);
    expect(createKeywordPattern(['list']).test('listen closely')).toBe(false);
    expect(createKeywordPattern(['bot']).test('the bottom')).toBe(false);
  });

  it('should not inflect a keyword into a different word', () => {
    expect(createKeywordPattern(['fun']).test('to fund the lab')).toBe(false);
    expect(createKeywordPattern(['plan']).test('planes and trains')).toBe(false);
    expect(createKeywordPattern(['plan']).test('three plans')).toBe(true);
    expect(createKeywordPattern(['pitch']).test('two pitches')).toBe(true);
  });

  it('should treat regex metacharacters literally', () => {
    const pattern = createKeywordPattern(['tl;dr', 'c++']);

    expect(pattern.test('give me the tl;dr')).toBe(true);
    expect(pattern.test('modern c++ tips')).toBe(true);
    expect(pattern.test('c tips')).toBe(false);
  });
});

describe('keywordSuffixes', () => {
  it('should choose suffixes by the keyword ending', () => {
    expect(keywordSuffixes('create')).toBe('(?:s|d|r|rs)?');
    expect(keywordSuffixes('pitch')).toBe('(?:es|ed|ing|er|ers)?');
    expect(keywordSuffixes('plan')).toBe('(?:s|ed|ing|er|ers)?');
  });
});

describe('escapeRegExp', () => {
  it('should escape metacharacters', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
  });
});

describe('WORD_LIMIT_PATTERN', () => {
  it('should capture the number of words', () => {
    expect('about 500 words please'.match(WORD_LIMIT_PATTERN)?.[1]).toBe('500');
    expect('a 3-word slogan'.match(WORD_LIMIT_PATTERN)).toBeNull();
    expect('write 1,000 words'.match(WORD_LIMIT_PATTERN)?.[1]).toBe('1,000');
  });
});

describe('stripAnsi', () => {
  it('should remove color codes', () => {
    expect(stripAnsi('\x1b[31mred\x1b[39m')).toBe('red');
  });
});
