/**
 * Expectimax search
 *
 * Alternates a MAX layer (the player picks the best move) with a CHANCE
 * layer (a 2 or a 4 appears on an empty cell). The CHANCE layer samples at
 * most `tiles` empty cells, shuffled first so the truncation has no
 * positional bias. Once the depth limit or the node budget is reached, the
 * board is scored by random rollouts instead of further expansion.
 *
 * Scores are floats inside the search and are truncated to integers only
 * when stored in the returned MoveScores.
 */

import { SPAWN_FOUR_PROBABILITY, type Board } from '../board/board.js';
import { BOARD_SIZE } from '../board/lines.js';
import { MOVES } from '../board/moves.js';
import { SearchConfigError } from '../errors.js';
import { sharedRandom } from '../random/shared.js';
import { shuffleInPlace } from '../random/shuffle.js';
import type { RandomSource } from '../random/xorshift.js';

import { EvalCounter } from './eval-counter.js';
import { createMoveScores, type MoveScores } from './move-scores.js';
import { sumRollouts, type SearchProgressCallback } from './random-tree.js';
import { runTasks } from './task-runner.js';

/**
 * How leaf boards can be scored
 * - rollout: average final score of random rollouts
 * - empty-weighted: that average multiplied by the number of empty cells
 */
export const EXPECTIMAX_HEURISTICS = ['rollout', 'empty-weighted'] as const;

export type ExpectimaxHeuristic = (typeof EXPECTIMAX_HEURISTICS)[number];

/**
 * Expectimax parameters
 */
export interface ExpectimaxParams {
  /** Number of CHANCE/MAX layer pairs below the root moves */
  depth: number;
  /** Empty cells sampled per CHANCE layer */
  tiles: number;
  /** Rollouts per leaf evaluation */
  heuristicSims: number;
  /** Node budget per decision, shared by all branches */
  maxEvals: number;
  /** Leaf scoring */
  heuristic: ExpectimaxHeuristic;
  /**
   * Evaluate CHANCE outcomes on forked random streams and play leaf rollouts
   * on the worker pool
   */
  parallel: boolean;
}

/**
 * Default expectimax parameters
 */
export const DEFAULT_EXPECTIMAX_PARAMS: Readonly<ExpectimaxParams> = {
  depth: 2,
  tiles: 4,
  heuristicSims: 8,
  maxEvals: 300,
  heuristic: 'rollout',
  parallel: false,
};

/**
 * CHANCE layer weight of a spawned 2
 */
export const TWO_WEIGHT = 1 - SPAWN_FOUR_PROBABILITY;

/**
 * CHANCE layer weight of a spawned 4
 */
export const FOUR_WEIGHT = SPAWN_FOUR_PROBABILITY;

/**
 * Result of one expectimax decision
 */
export interface ExpectimaxResult {
  /** Truncated expectation per move; moves that change nothing hold 0 */
  scores: MoveScores;
  /** Nodes counted against the budget */
  evaluations: number;
}

/**
 * A hypothetical board in a CHANCE layer and its weight
 */
export interface ChanceOutcome {
  board: Board;
  weight: number;
}

/**
 * State threaded through one decision's recursion
 */
export interface SearchContext {
  params: ExpectimaxParams;
  counter: EvalCounter;
  random: RandomSource;
}

const INTEGER_PARAMS = ['depth', 'tiles', 'heuristicSims', 'maxEvals'] as const;

/**
 * Merge parameters with defaults and check them
 * @throws SearchConfigError for negative or fractional sizes
 */
export function resolveExpectimaxParams(params: Partial<ExpectimaxParams> = {}): ExpectimaxParams {
  const resolved = { ...DEFAULT_EXPECTIMAX_PARAMS, ...params };
  for (const name of INTEGER_PARAMS) {
    const value = resolved[name];
    if (!Number.isInteger(value) || value < 0) {
      throw new SearchConfigError(name, `must be a non-negative integer, got ${value}`);
    }
  }
  return resolved;
}

/**
 * Score a leaf board by random rollouts
 *
 * With no rollouts configured the board's current score is used.
 */
export function leafHeuristic(board: Board, params: ExpectimaxParams, random: RandomSource): number {
  const average =
    params.heuristicSims > 0
      ? sumRollouts(board, params.heuristicSims, 'score', params.parallel, random) /
        params.heuristicSims
      : board.score;

  return params.heuristic === 'empty-weighted' ? average * board.emptyCount() : average;
}

function withSpawn(board: Board, index: number, exponent: number): Board {
  const next = board.clone();
  next.setTile(index % BOARD_SIZE, Math.floor(index / BOARD_SIZE), exponent);
  return next;
}

/**
 * Hypothetical boards for the CHANCE layer.
 *
 * Each sampled cell gives a 2 (weight 0.9) and a 4 (weight 0.1). When no
 * cell is sampled the board itself is the only outcome, with weight 1.
 */
export function chanceOutcomes(board: Board, tiles: number, random: RandomSource): ChanceOutcome[] {
  const cells = shuffleInPlace(board.emptyCells(), random).slice(0, tiles);
  if (cells.length === 0) {
    return [{ board, weight: 1 }];
  }

  return cells.flatMap((index) => [
    { board: withSpawn(board, index, 1), weight: TWO_WEIGHT },
    { board: withSpawn(board, index, 2), weight: FOUR_WEIGHT },
  ]);
}

/**
 * Best score over the moves available on a hypothetical board.
 *
 * Each expanded move takes one node from the budget; once it is spent the
 * remaining moves are scored by the heuristic without expansion.
 */
function maxLayer(board: Board, depth: number, context: SearchContext): number {
  let best: number | undefined;

  for (const move of MOVES) {
    const child = board.clone();
    if (!child.shift(move)) continue;

    const score = context.counter.tryAcquire()
      ? expectimaxRecurse(child, depth + 1, context)
      : leafHeuristic(child, context.params, context.random);

    if (best === undefined || score > best) {
      best = score;
    }
  }

  return best ?? leafHeuristic(board, context.params, context.random);
}

/**
 * Expected score of a board reached by a player move (before its spawn)
 *
 * @returns the average of weighted MAX-layer scores over the CHANCE outcomes,
 *   or the heuristic at a leaf
 */
export function expectimaxRecurse(board: Board, depth: number, context: SearchContext): number {
  const { params, counter } = context;
  if (counter.exhausted || depth >= params.depth || board.gameOver()) {
    return leafHeuristic(board, params, context.random);
  }

  const outcomes = chanceOutcomes(board, params.tiles, context.random);
  const weighted = runTasks(
    outcomes,
    (outcome, stream) =>
      maxLayer(outcome.board, depth, { ...context, random: stream }) * outcome.weight,
    context.random,
    params.parallel,
  );

  return weighted.reduce((total, value) => total + value, 0) / outcomes.length;
}

/**
 * Expectimax search with a node budget that is reset for every decision
 */
export class ExpectimaxSearch {
  readonly params: ExpectimaxParams;
  private readonly counter: EvalCounter;
  private onProgress?: SearchProgressCallback;

  constructor(params: Partial<ExpectimaxParams> = {}, onProgress?: SearchProgressCallback) {
    this.params = resolveExpectimaxParams(params);
    this.counter = new EvalCounter(this.params.maxEvals);
    if (onProgress !== undefined) {
      this.onProgress = onProgress;
    }
  }

  /**
   * Nodes counted by the last decision
   */
  get evaluations(): number {
    return this.counter.value;
  }

  /**
   * Score every move of the board
   */
  search(board: Board, random: RandomSource = sharedRandom()): ExpectimaxResult {
    this.counter.reset();
    const context: SearchContext = { params: this.params, counter: this.counter, random };
    const scores = createMoveScores();

    MOVES.forEach((move, index) => {
      const child = board.clone();
      if (child.shift(move)) {
        scores[move] = Math.trunc(expectimaxRecurse(child, 0, context));
      }
      if (this.onProgress) {
        this.onProgress(index + 1, MOVES.length);
      }
    });

    return { scores, evaluations: this.counter.value };
  }
}

/**
 * Run one expectimax decision with a fresh budget
 */
export function expectimax(
  board: Board,
  params: Partial<ExpectimaxParams> = {},
  random: RandomSource = sharedRandom(),
): ExpectimaxResult {
  return new ExpectimaxSearch(params).search(board, random);
}
