/**
 * Configuration schema types for the tilewise CLI
 */

import type { AgentKind, ExpectimaxHeuristic, RandomTreeMetric } from '@tilewise/core';

/**
 * Search size presets
 */
export type SearchProfile = 'quick' | 'standard' | 'deep';

/**
 * Game setup
 */
export interface GameConfigSchema {
  /** Seed for spawns and searches (undefined = seeded from the clock) */
  seed?: number;
  /** Stop after this many moves even if the game is not over */
  maxMoves?: number;
}

/**
 * Settings shared by every search agent
 */
export interface SearchConfigSchema {
  /** Search size preset */
  profile: SearchProfile;
  /** Play search rollouts on the worker pool */
  parallel: boolean;
}

/**
 * Random-tree agent settings
 */
export interface RandomTreeConfigSchema {
  /** Rollouts per move */
  simCount: number;
  /** What a rollout is judged by */
  metric: RandomTreeMetric;
}

/**
 * Expectimax agent settings
 */
export interface ExpectimaxConfigSchema {
  /** CHANCE/MAX layer pairs below the root moves */
  depth: number;
  /** Empty cells sampled per CHANCE layer */
  tiles: number;
  /** Rollouts per leaf */
  heuristicSims: number;
  /** Node budget per decision */
  maxEvals: number;
  /** Leaf scoring */
  heuristic: ExpectimaxHeuristic;
}

/**
 * Output settings
 */
export interface OutputConfigSchema {
  /** Print the agent's messages after every move */
  verbose: boolean;
  /** Print the final board */
  showBoard: boolean;
}

/**
 * Complete configuration
 */
export interface TilewiseConfig {
  /** Agent that plays the game */
  agent: AgentKind;
  game: GameConfigSchema;
  search: SearchConfigSchema;
  randomTree: RandomTreeConfigSchema;
  expectimax: ExpectimaxConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Agent that plays the game */
  agent?: AgentKind;
  /** Random seed */
  seed?: number;
  /** Move limit */
  maxMoves?: number;
  /** Search size preset */
  profile?: SearchProfile;
  /** Random-tree rollouts per move */
  sims?: number;
  /** Random-tree metric */
  metric?: RandomTreeMetric;
  /** Expectimax depth */
  depth?: number;
  /** Expectimax cells per CHANCE layer */
  tiles?: number;
  /** Expectimax rollouts per leaf */
  heuristicSims?: number;
  /** Expectimax node budget */
  maxEvals?: number;
  /** Expectimax leaf scoring */
  heuristic?: ExpectimaxHeuristic;
  /** Forked random streams for search tasks */
  parallel?: boolean;
  /** Print agent messages after every move */
  verbose?: boolean;
  /** Skip printing the final board */
  noBoard?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Board to evaluate: 16 comma-separated exponents */
  cells?: string;
  /** Score of the board to evaluate */
  score?: number;
}
