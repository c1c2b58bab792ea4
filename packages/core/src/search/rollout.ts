/**
 * Random rollouts
 */

import { Board } from '../board/board.js';
import { CELL_COUNT } from '../board/lines.js';
import { randomMove } from '../board/moves.js';
import { sharedRandom } from '../random/shared.js';
import type { RandomSource } from '../random/xorshift.js';

/**
 * Play uniformly random moves on a copy of the board until the game is over
 *
 * Moves that change nothing are simply drawn again. A board without any tile
 * can never move and is returned as is.
 *
 * @returns the terminal board; the input is not modified
 */
export function simulateRandomGame(board: Board, random: RandomSource = sharedRandom()): Board {
  const game = board.clone();
  if (game.emptyCount() === CELL_COUNT) {
    return game;
  }

  while (!game.gameOver()) {
    game.makeMove(randomMove(random), random);
  }

  return game;
}
