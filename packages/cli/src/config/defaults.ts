/**
 * Default configuration values and profile presets
 */

import { DEFAULT_EXPECTIMAX_PARAMS, DEFAULT_RANDOM_TREE_OPTIONS } from '@tilewise/core';

import type {
  ExpectimaxConfigSchema,
  RandomTreeConfigSchema,
  SearchProfile,
  TilewiseConfig,
} from './schema.js';

/**
 * Profile names, smallest search first
 */
export const SEARCH_PROFILE_NAMES = ['quick', 'standard', 'deep'] as const;

/**
 * Search sizes set by a profile
 */
export interface ProfilePreset {
  randomTree: Partial<RandomTreeConfigSchema>;
  expectimax: Partial<ExpectimaxConfigSchema>;
}

/**
 * Search profile presets
 * Maps profile names to search size overrides
 */
export const SEARCH_PROFILES: Record<SearchProfile, ProfilePreset> = {
  quick: {
    randomTree: { simCount: 25 },
    expectimax: { depth: 1, tiles: 2, heuristicSims: 4, maxEvals: 100 },
  },
  standard: {
    randomTree: { simCount: 100 },
    expectimax: { depth: 2, tiles: 4, heuristicSims: 8, maxEvals: 300 },
  },
  deep: {
    randomTree: { simCount: 400 },
    expectimax: { depth: 3, tiles: 6, heuristicSims: 16, maxEvals: 1500 },
  },
};

/**
 * Default random-tree configuration (standard profile)
 */
export const DEFAULT_RANDOM_TREE_CONFIG: RandomTreeConfigSchema = {
  simCount: DEFAULT_RANDOM_TREE_OPTIONS.simCount,
  metric: DEFAULT_RANDOM_TREE_OPTIONS.metric,
};

/**
 * Default expectimax configuration (standard profile)
 */
export const DEFAULT_EXPECTIMAX_CONFIG: ExpectimaxConfigSchema = {
  depth: DEFAULT_EXPECTIMAX_PARAMS.depth,
  tiles: DEFAULT_EXPECTIMAX_PARAMS.tiles,
  heuristicSims: DEFAULT_EXPECTIMAX_PARAMS.heuristicSims,
  maxEvals: DEFAULT_EXPECTIMAX_PARAMS.maxEvals,
  heuristic: DEFAULT_EXPECTIMAX_PARAMS.heuristic,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG = {
  verbose: false,
  showBoard: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: TilewiseConfig = {
  agent: 'random-tree',
  game: {},
  search: {
    profile: 'standard',
    parallel: false,
  },
  randomTree: DEFAULT_RANDOM_TREE_CONFIG,
  expectimax: DEFAULT_EXPECTIMAX_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};

/**
 * Apply a profile's search sizes to a configuration
 */
export function applyProfile(config: TilewiseConfig, profile: SearchProfile): TilewiseConfig {
  const preset = SEARCH_PROFILES[profile];
  return {
    ...config,
    search: { ...config.search, profile },
    randomTree: { ...config.randomTree, ...preset.randomTree },
    expectimax: { ...config.expectimax, ...preset.expectimax },
  };
}
