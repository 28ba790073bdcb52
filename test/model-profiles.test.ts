/**
 * @fileoverview Tests for target model resolution
 */

import { describe, it, expect } from 'vitest';
import {
  TARGET_MODELS,
  getModelProfile,
  isTargetModel,
  listModelProfiles,
  resolveTargetModel,
} from '../src/model-profiles.js';

describe('resolveTargetModel', () => {
  it('should accept every recognized model', () => {
    for (const model of TARGET_MODELS) {
      const selection = resolveTargetModel(model);
      expect(selection.model).toBe(model);
      expect(selection.usedFallback).toBe(false);
    }
  });

  it('should ignore case and surrounding whitespace', () => {
    const selection = resolveTargetModel('  GPT-4o ');

    expect(selection.model).toBe('gpt-4o');
    expect(selection.usedFallback).toBe(false);
    expect(selection.requested).toBe('  GPT-4o ');
  });

  it('should fall back for unknown identifiers', () => {
    expect(resolveTargetModel('llama-2')).toEqual({
      model: 'claude-3.5-sonnet',
      reason: 'Unknown target model "llama-2", using claude-3.5-sonnet',
      usedFallback: true,
      requested: 'llama-2',
    });
  });

  it('should fall back for an empty identifier', () => {
    const selection = resolveTargetModel('   ');

    expect(selection.model).toBe('claude-3.5-sonnet');
    expect(selection.reason).toBe('No target model given, using claude-3.5-sonnet');
  });

  it('should use the default when nothing is requested', () => {
    expect(resolveTargetModel().model).toBe('claude-3.5-sonnet');
    expect(resolveTargetModel().usedFallback).toBe(false);
  });
});

describe('isTargetModel', () => {
  it('should only accept exact identifiers', () => {
    expect(isTargetModel('gemini-pro')).toBe(true);
    expect(isTargetModel('Gemini-Pro')).toBe(false);
  });
});

describe('getModelProfile', () => {
  it('should return the profile of a known model', () => {
    const profile = getModelProfile('claude-3.5-haiku');

    expect(profile.id).toBe('claude-3.5-haiku');
    expect(profile.tier).toBe('fast');
  });

  it('should return the default profile for unknown models', () => {
    expect(getModelProfile('mystery').id).toBe('claude-3.5-sonnet');
  });
});

describe('listModelProfiles', () => {
  it('should list profiles in declaration order', () => {
    expect(listModelProfiles().map((profile) => profile.id)).toEqual([...TARGET_MODELS]);
  });

  it('should give every profile at least one hint', () => {
    for (const profile of listModelProfiles()) {
      expect(profile.hints.length).toBeGreaterThan(0);
    }
  });
});
