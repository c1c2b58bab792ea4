import { afterAll, describe, it, expect, vi } from 'vitest';

import { Board } from '../board/board.js';
import { MOVES } from '../board/moves.js';
import { SearchConfigError } from '../errors.js';
import { createRandom } from '../random/xorshift.js';
import { createMoveScores, type MoveScores } from '../search/move-scores.js';
import {
  DEFAULT_RANDOM_TREE_OPTIONS,
  resolveRandomTreeOptions,
  scoreMoves,
  sumRollouts,
  terminalMetric,
} from '../search/random-tree.js';
import { simulateRandomGame } from '../search/rollout.js';
import { repetitions } from '../search/task-runner.js';
import { closeSharedRolloutPool } from '../search/worker-pool.js';

const WORKER_TIMEOUT_MS = 60_000;

/** A single 2 in the top-left corner: only Down and Right move it */
function cornerBoard(): Board {
  const board = Board.empty();
  board.setTile(0, 0, 1);
  return board;
}

/**
 * Score moves in this thread, giving every rollout its own fork of the
 * move's random source in rollout order
 */
function forkedScoresInThread(board: Board, simCount: number, seed: number): MoveScores {
  const random = createRandom(seed);
  const scores = createMoveScores();
  for (const move of MOVES) {
    const next = board.clone();
    if (next.makeMove(move, random)) {
      const streams = repetitions(simCount).map(() => random.fork());
      scores[move] = streams.reduce(
        (total, stream) => total + simulateRandomGame(next, stream).score,
        0,
      );
    }
  }
  return scores;
}

describe('random-tree evaluation', () => {
  afterAll(async () => {
    await closeSharedRolloutPool();
  });

  describe('resolveRandomTreeOptions', () => {
    it('should fill in defaults', () => {
      expect(resolveRandomTreeOptions()).toEqual(DEFAULT_RANDOM_TREE_OPTIONS);
      expect(resolveRandomTreeOptions({ simCount: 3 }).metric).toBe('score');
    });

    it('should reject negative or fractional sim counts', () => {
      expect(() => resolveRandomTreeOptions({ simCount: -1 })).toThrow(SearchConfigError);
      expect(() => resolveRandomTreeOptions({ simCount: 1.5 })).toThrow(SearchConfigError);
    });
  });

  describe('terminalMetric', () => {
    it('should read score or move count', () => {
      const board = Board.fromCells(new Array<number>(16).fill(0), { score: 48, numMoves: 6 });
      expect(terminalMetric(board, 'score')).toBe(48);
      expect(terminalMetric(board, 'moves')).toBe(6);
    });
  });

  describe('sumRollouts', () => {
    it('should sum nothing for zero rollouts', () => {
      expect(sumRollouts(cornerBoard(), 0, 'score', false, createRandom(1))).toBe(0);
    });

    it('should count at least one move per rollout from a started game', () => {
      const board = Board.create(createRandom(2));
      expect(sumRollouts(board, 4, 'moves', false, createRandom(3))).toBeGreaterThanOrEqual(4);
    });

    it('should play parallel rollouts on streams forked in rollout order', () => {
      const board = Board.create(createRandom(12));
      const parent = createRandom(34);
      const expected = repetitions(6).reduce(
        (total) => total + simulateRandomGame(board, parent.fork()).score,
        0,
      );

      expect(sumRollouts(board, 6, 'score', true, createRandom(34))).toBe(expected);
    }, WORKER_TIMEOUT_MS);

    it('should sum nothing for zero parallel rollouts', () => {
      expect(sumRollouts(cornerBoard(), 0, 'score', true, createRandom(1))).toBe(0);
    });
  });

  describe('scoreMoves', () => {
    it('should leave moves that change nothing at 0', () => {
      const scores = scoreMoves(cornerBoard(), { simCount: 3, metric: 'moves' }, createRandom(5));
      expect(scores.up).toBe(0);
      expect(scores.left).toBe(0);
      // Every rollout starts after the scored move, so each adds at least one
      expect(scores.down).toBeGreaterThanOrEqual(3);
      expect(scores.right).toBeGreaterThanOrEqual(3);
    });

    it('should give all zeros with no simulations', () => {
      expect(scoreMoves(cornerBoard(), { simCount: 0 }, createRandom(1))).toEqual({
        up: 0,
        down: 0,
        left: 0,
        right: 0,
      });
    });

    it('should be reproducible for a fixed seed', () => {
      const board = Board.create(createRandom(12));
      const a = scoreMoves(board, { simCount: 6 }, createRandom(34));
      const b = scoreMoves(board, { simCount: 6 }, createRandom(34));
      expect(a).toEqual(b);
    });

    it('should be reproducible for a fixed seed in parallel mode', () => {
      const board = Board.create(createRandom(12));
      const a = scoreMoves(board, { simCount: 6, parallel: true }, createRandom(34));
      const b = scoreMoves(board, { simCount: 6, parallel: true }, createRandom(34));
      expect(a).toEqual(b);
    }, WORKER_TIMEOUT_MS);

    it('should give the worker pool the same scores as forked rollouts in this thread', () => {
      const board = Board.create(createRandom(12));
      const scores = scoreMoves(board, { simCount: 5, parallel: true }, createRandom(40));
      expect(scores).toEqual(forkedScoresInThread(board, 5, 40));
    }, WORKER_TIMEOUT_MS);

    it('should not modify the board', () => {
      const board = Board.create(createRandom(8));
      const before = board.clone();
      scoreMoves(board, { simCount: 2 }, createRandom(9));
      expect(board.equals(before)).toBe(true);
    });

    it('should report progress after each move', () => {
      const onProgress = vi.fn();
      scoreMoves(cornerBoard(), { simCount: 1, onProgress }, createRandom(1));
      expect(onProgress.mock.calls).toEqual([
        [1, 4],
        [2, 4],
        [3, 4],
        [4, 4],
      ]);
    });
  });
});
