/**
 * Per-move score mappings
 */

import { MOVES, type Move } from '../board/moves.js';

/**
 * A score for every move. Unscored moves hold 0.
 */
export type MoveScores = Record<Move, number>;

/**
 * A mapping with every move at the same starting score
 */
export function createMoveScores(initial: number = 0): MoveScores {
  return { up: initial, down: initial, left: initial, right: initial };
}

/**
 * The move with the highest score.
 *
 * Ties go to the move declared first in MOVES. When candidates are given,
 * only those moves compete, so an unscored move cannot win on its default 0;
 * an empty candidate list falls back to all moves.
 */
export function maxMove(scores: MoveScores, candidates: readonly Move[] = MOVES): Move {
  const pool = candidates.length > 0 ? candidates : MOVES;
  let best: Move | undefined;

  for (const move of MOVES) {
    if (!pool.includes(move)) continue;
    if (best === undefined || scores[move] > scores[best]) {
      best = move;
    }
  }

  return best ?? MOVES[0];
}

/**
 * Moves ordered by descending score, ties in declaration order
 */
export function rankMoves(scores: MoveScores): Move[] {
  return [...MOVES].sort((a, b) => scores[b] - scores[a]);
}
