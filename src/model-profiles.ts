/**
 * @fileoverview Model Profiles - Optimization hints per target model.
 *
 * Handles target model resolution based on:
 * - The fixed list of recognized model identifiers
 * - Case-insensitive matching of user-supplied identifiers
 * - Fallback to the default profile for unknown identifiers
 *
 * @module model-profiles
 */

import { DEFAULT_TARGET_MODEL } from './config/extraction-limits.js';

// ========== Types ==========

/** Recognized target model identifiers */
export const TARGET_MODELS = [
  'claude-3.5-sonnet',
  'claude-3.5-haiku',
  'gpt-4-turbo',
  'gpt-4o',
  'gemini-pro',
] as const;

export type TargetModel = (typeof TARGET_MODELS)[number];

/**
 * Broad optimization class of a model.
 * - extended: long context, rewards extended reasoning
 * - balanced: general purpose
 * - fast: small or latency-optimized, rewards brevity
 */
export type ModelTier = 'extended' | 'balanced' | 'fast';

export interface ModelProfile {
  id: TargetModel;
  displayName: string;
  tier: ModelTier;
  /** Context window in tokens */
  contextWindow: number;
  /** Constraint lines appended to every prompt for this model */
  hints: readonly string[];
}

/**
 * Model resolution result with reasoning.
 */
export interface ModelSelection {
  /** The resolved profile */
  model: TargetModel;
  /** Why this model was selected */
  reason: string;
  /** True when the requested identifier was not recognized */
  usedFallback: boolean;
  /** The identifier as requested, before resolution */
  requested: string;
}

// ========== Profiles ==========

const MODEL_PROFILES: Readonly<Record<TargetModel, ModelProfile>> = {
  'claude-3.5-sonnet': {
    id: 'claude-3.5-sonnet',
    displayName: 'Claude 3.5 Sonnet',
    tier: 'extended',
    contextWindow: 200000,
    hints: [
      'Prioritize long-form reasoning: work through the problem step by step before the final answer',
      'Follow the section structure of this prompt precisely',
      'Ground every claim in the provided context to minimize hallucination',
    ],
  },
  'claude-3.5-haiku': {
    id: 'claude-3.5-haiku',
    displayName: 'Claude 3.5 Haiku',
    tier: 'fast',
    contextWindow: 200000,
    hints: [
      'Favor brevity: answer directly and omit preamble',
      'Keep intermediate reasoning implicit unless it is explicitly requested',
    ],
  },
  'gpt-4-turbo': {
    id: 'gpt-4-turbo',
    displayName: 'GPT-4 Turbo',
    tier: 'balanced',
    contextWindow: 128000,
    hints: [
      'Balance creativity with accuracy',
      'Maintain a coherent narrative flow across sections',
    ],
  },
  'gpt-4o': {
    id: 'gpt-4o',
    displayName: 'GPT-4o',
    tier: 'balanced',
    contextWindow: 128000,
    hints: [
      'Balance creativity with accuracy',
      'Keep the response focused and avoid repeating points',
    ],
  },
  'gemini-pro': {
    id: 'gemini-pro',
    displayName: 'Gemini Pro',
    tier: 'extended',
    contextWindow: 1000000,
    hints: [
      'Use the full context available for a thorough, well-supported answer',
      'State the final answer or recommendation explicitly at the end',
    ],
  },
};

// ========== Resolution ==========

/**
 * Type guard for recognized identifiers.
 */
export function isTargetModel(value: string): value is TargetModel {
  return TARGET_MODELS.some((id) => id === value);
}

/**
 * Resolve a user-supplied identifier to a recognized model.
 * Unknown or empty identifiers fall back to the default model, never an error.
 */
export function resolveTargetModel(requested: string = DEFAULT_TARGET_MODEL): ModelSelection {
  const normalized = requested.trim().toLowerCase();

  if (isTargetModel(normalized)) {
    return { model: normalized, reason: 'Recognized target model', usedFallback: false, requested };
  }

  const fallback: TargetModel = DEFAULT_TARGET_MODEL;
  return {
    model: fallback,
    reason: normalized
      ? `Unknown target model "${requested.trim()}", using ${fallback}`
      : `No target model given, using ${fallback}`,
    usedFallback: true,
    requested,
  };
}

/**
 * Get the optimization profile for a model.
 * Unknown identifiers get the default model's profile.
 */
export function getModelProfile(model: string): ModelProfile {
  return MODEL_PROFILES[resolveTargetModel(model).model];
}

/**
 * All profiles in declaration order.
 */
export function listModelProfiles(): ModelProfile[] {
  return TARGET_MODELS.map((id) => MODEL_PROFILES[id]);
}
