/**
 * Configuration schemas and difficulty presets.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import {
  AIConfig,
  AIDifficulty,
  DEFAULT_AI_CONFIG,
  HEURISTICS,
  SearchConfig,
} from './types.js';

export const SearchConfigSchema = z.object({
  timeBudgetSeconds: z.number().finite().positive(),
  useAlphaBeta: z.boolean(),
  heuristic: z.enum(HEURISTICS),
  maxDepth: z.number().int().positive(),
});

export const AIConfigSchema = SearchConfigSchema.extend({
  name: z.string().min(1),
});

/**
 * Layer overrides on a base configuration. Keys set to undefined keep the
 * base value.
 */
export function mergeConfig(base: object, overrides: object = {}): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a search configuration
 * @throws ConfigurationError when any field is missing or out of range
 */
export function parseSearchConfig(input: unknown): SearchConfig {
  const parsed = SearchConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate an AI configuration
 * @throws ConfigurationError when any field is missing or out of range
 */
export function parseAIConfig(input: unknown): AIConfig {
  const parsed = AIConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// =============================================================================
// Difficulty Presets
// =============================================================================

export const DIFFICULTY_CONFIGS: Record<AIDifficulty, Partial<AIConfig>> = {
  easy: {
    heuristic: 'e0',
    timeBudgetSeconds: 0.5,
    maxDepth: 2,
  },
  medium: {
    heuristic: 'e1',
    timeBudgetSeconds: 2,
    maxDepth: 4,
  },
  hard: {
    heuristic: 'e2',
    timeBudgetSeconds: 5,
    maxDepth: 64,
  },
};

/**
 * Build a validated AI configuration from a difficulty preset plus overrides
 */
export function configForDifficulty(
  difficulty: AIDifficulty,
  overrides: Partial<AIConfig> = {}
): AIConfig {
  return parseAIConfig(
    mergeConfig(mergeConfig(DEFAULT_AI_CONFIG, DIFFICULTY_CONFIGS[difficulty]), overrides)
  );
}
