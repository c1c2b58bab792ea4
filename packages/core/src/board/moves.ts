/**
 * Move directions
 */

import { InvalidMoveError } from '../errors.js';
import type { RandomSource } from '../random/xorshift.js';

/**
 * All moves in declaration order. This order is the tie-break order
 * wherever moves are compared by score.
 */
export const MOVES = ['up', 'down', 'left', 'right'] as const;

/**
 * A sliding direction
 */
export type Move = (typeof MOVES)[number];

/**
 * Display names for moves
 */
export const MOVE_LABELS: Record<Move, string> = {
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
};

/**
 * Accepted spellings for each move (full name or WASD key)
 */
const MOVE_ALIASES: Record<string, Move> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right',
};

/**
 * Parse a move from its name or WASD key (case-insensitive)
 * @throws InvalidMoveError if the token is not a move
 */
export function parseMove(token: string): Move {
  const move = MOVE_ALIASES[token.trim().toLowerCase()];
  if (move === undefined) {
    throw new InvalidMoveError(token);
  }
  return move;
}

/**
 * Draw a move uniformly at random
 */
export function randomMove(random: RandomSource): Move {
  return MOVES[random.nextInt(MOVES.length)] ?? MOVES[0];
}

/**
 * Whether a move slides tiles toward the start of the line (x = 0 or y = 0)
 */
export function slidesTowardStart(move: Move): boolean {
  return move === 'up' || move === 'left';
}

/**
 * Whether a move works on columns rather than rows
 */
export function isVertical(move: Move): boolean {
  return move === 'up' || move === 'down';
}
