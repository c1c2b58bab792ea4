/**
 * Random-tree evaluation
 *
 * Scores each move by the outcome of many random playthroughs from the board
 * that move produces. Scores are sums over the rollouts, not averages; every
 * move runs the same number of rollouts, so sums compare the same way.
 */

import type { Board } from '../board/board.js';
import { MOVES } from '../board/moves.js';
import { SearchConfigError } from '../errors.js';
import { sharedRandom } from '../random/shared.js';
import { createRandom, forkSeed, type RandomSource } from '../random/xorshift.js';

import { createMoveScores, type MoveScores } from './move-scores.js';
import { simulateRandomGame } from './rollout.js';
import { repetitions } from './task-runner.js';
import { sharedRolloutPool } from './worker-pool.js';

/**
 * What a rollout can be judged by: final score or moves survived
 */
export const RANDOM_TREE_METRICS = ['score', 'moves'] as const;

export type RandomTreeMetric = (typeof RANDOM_TREE_METRICS)[number];

/**
 * Progress callback, called after each move has been scored
 */
export type SearchProgressCallback = (completed: number, total: number) => void;

/**
 * Random-tree evaluation options
 */
export interface RandomTreeOptions {
  /** Rollouts per move */
  simCount: number;
  /** Terminal-state metric summed across rollouts */
  metric: RandomTreeMetric;
  /** Play the rollouts on the worker pool, each on its own random stream */
  parallel: boolean;
  /** Called after each move has been scored */
  onProgress?: SearchProgressCallback;
}

/**
 * Default random-tree options
 */
export const DEFAULT_RANDOM_TREE_OPTIONS: Readonly<RandomTreeOptions> = {
  simCount: 100,
  metric: 'score',
  parallel: false,
};

/**
 * Merge options with defaults and check them
 * @throws SearchConfigError for a negative or fractional sim count
 */
export function resolveRandomTreeOptions(options: Partial<RandomTreeOptions> = {}): RandomTreeOptions {
  const resolved = { ...DEFAULT_RANDOM_TREE_OPTIONS, ...options };
  if (!Number.isInteger(resolved.simCount) || resolved.simCount < 0) {
    throw new SearchConfigError(
      'simCount',
      `must be a non-negative integer, got ${resolved.simCount}`,
    );
  }
  return resolved;
}

/**
 * Read the chosen metric from a terminal board
 */
export function terminalMetric(board: Board, metric: RandomTreeMetric): number {
  return metric === 'moves' ? board.numMoves : board.score;
}

/**
 * Sum a terminal metric over one rollout per seed, each on `createRandom(seed)`
 */
export function sumSeededRollouts(
  board: Board,
  seeds: readonly number[],
  metric: RandomTreeMetric,
): number {
  return seeds.reduce(
    (total, seed) => total + terminalMetric(simulateRandomGame(board, createRandom(seed)), metric),
    0,
  );
}

/**
 * Sum a terminal metric over independent rollouts from one board
 *
 * Sequential rollouts all draw from `random`. Parallel rollouts run on the
 * shared worker pool, each on a stream forked from `random` in rollout order,
 * so a seeded parallel sum is reproducible.
 */
export function sumRollouts(
  board: Board,
  simCount: number,
  metric: RandomTreeMetric,
  parallel: boolean,
  random: RandomSource,
): number {
  if (parallel) {
    const seeds = repetitions(simCount).map(() => forkSeed(random));
    return sharedRolloutPool().sum(board, seeds, metric);
  }

  let total = 0;
  for (let i = 0; i < simCount; i++) {
    total += terminalMetric(simulateRandomGame(board, random), metric);
  }
  return total;
}

/**
 * Score every move by summed rollout outcomes.
 *
 * A move that does not change the board keeps score 0 and runs no rollouts.
 */
export function scoreMoves(
  board: Board,
  options: Partial<RandomTreeOptions> = {},
  random: RandomSource = sharedRandom(),
): MoveScores {
  const { simCount, metric, parallel, onProgress } = resolveRandomTreeOptions(options);
  const scores = createMoveScores();

  MOVES.forEach((move, index) => {
    const next = board.clone();
    if (next.makeMove(move, random)) {
      scores[move] = sumRollouts(next, simCount, metric, parallel, random);
    }
    if (onProgress) {
      onProgress(index + 1, MOVES.length);
    }
  });

  return scores;
}
