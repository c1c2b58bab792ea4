/**
 * Move search
 */

export { type MoveScores, createMoveScores, maxMove, rankMoves } from './move-scores.js';

export { type SearchTask, runTasks, repetitions } from './task-runner.js';

export { simulateRandomGame } from './rollout.js';

export {
  type RandomTreeMetric,
  RANDOM_TREE_METRICS,
  type RandomTreeOptions,
  type SearchProgressCallback,
  DEFAULT_RANDOM_TREE_OPTIONS,
  resolveRandomTreeOptions,
  terminalMetric,
  sumSeededRollouts,
  sumRollouts,
  scoreMoves,
} from './random-tree.js';

export { EvalCounter } from './eval-counter.js';

export {
  type RolloutPoolOptions,
  DEFAULT_STARTUP_TIMEOUT_MS,
  RolloutPool,
  splitSeeds,
  sharedRolloutPool,
  closeSharedRolloutPool,
} from './worker-pool.js';

export {
  type ExpectimaxHeuristic,
  EXPECTIMAX_HEURISTICS,
  type ExpectimaxParams,
  type ExpectimaxResult,
  type ChanceOutcome,
  type SearchContext,
  DEFAULT_EXPECTIMAX_PARAMS,
  TWO_WEIGHT,
  FOUR_WEIGHT,
  resolveExpectimaxParams,
  leafHeuristic,
  chanceOutcomes,
  expectimaxRecurse,
  ExpectimaxSearch,
  expectimax,
} from './expectimax.js';
