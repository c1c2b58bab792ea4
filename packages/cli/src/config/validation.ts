/**
 * Zod validation schemas for configuration
 */

import { AGENT_KINDS, EXPECTIMAX_HEURISTICS, RANDOM_TREE_METRICS } from '@tilewise/core';
import { z } from 'zod';

import { SEARCH_PROFILE_NAMES } from './defaults.js';

/**
 * Non-negative integer schema
 */
const countSchema = z.number().int().min(0);

/**
 * Seed schema (any 32-bit unsigned value)
 */
const seedSchema = z.number().int().min(0).max(0xffffffff);

/**
 * Agent kind schema
 */
export const agentKindSchema = z.enum(AGENT_KINDS);

/**
 * Search profile schema
 */
export const searchProfileSchema = z.enum(SEARCH_PROFILE_NAMES);

/**
 * Random-tree metric schema
 */
export const randomTreeMetricSchema = z.enum(RANDOM_TREE_METRICS);

/**
 * Expectimax heuristic schema
 */
export const expectimaxHeuristicSchema = z.enum(EXPECTIMAX_HEURISTICS);

/**
 * Game configuration schema
 */
export const gameConfigSchema = z.object({
  seed: seedSchema.optional(),
  maxMoves: z.number().int().min(1).optional(),
});

/**
 * Search configuration schema
 */
export const searchConfigSchema = z.object({
  profile: searchProfileSchema,
  parallel: z.boolean(),
});

/**
 * Random-tree configuration schema
 */
export const randomTreeConfigSchema = z.object({
  simCount: countSchema,
  metric: randomTreeMetricSchema,
});

/**
 * Expectimax configuration schema
 */
export const expectimaxConfigSchema = z.object({
  depth: countSchema.max(8),
  tiles: countSchema.max(16),
  heuristicSims: countSchema,
  maxEvals: countSchema,
  heuristic: expectimaxHeuristicSchema,
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  verbose: z.boolean(),
  showBoard: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  agent: agentKindSchema,
  game: gameConfigSchema,
  search: searchConfigSchema,
  randomTree: randomTreeConfigSchema,
  expectimax: expectimaxConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z
  .object({
    agent: agentKindSchema.optional(),
    game: gameConfigSchema.partial().optional(),
    search: searchConfigSchema.partial().optional(),
    randomTree: randomTreeConfigSchema.partial().optional(),
    expectimax: expectimaxConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
  })
  .strict();

/**
 * Configuration with every section and field optional
 */
export type PartialTilewiseConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): z.infer<typeof configSchema> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialTilewiseConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export type { z };
