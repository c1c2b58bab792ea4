import type { Board } from '../board/board.js';
import type { Move } from '../board/moves.js';
import { sharedRandom } from '../random/shared.js';
import type { RandomSource } from '../random/xorshift.js';

import type { InputAction, InteractiveAgent, KeyInput, MessageLine } from './types.js';

/**
 * Shared state of the computer agents: the game, the random source used for
 * spawns and searches, and the default move loop
 */
export abstract class BaseAgent implements InteractiveAgent {
  protected readonly game: Board;
  protected readonly random: RandomSource;

  constructor(game: Board, random: RandomSource = sharedRandom()) {
    this.game = game;
    this.random = random;
  }

  getGame(): Board {
    return this.game;
  }

  abstract nextMove(): Move;

  abstract messages(): MessageLine[];

  /**
   * Apply the chosen move; does nothing once the game is over
   */
  makeMove(): void {
    if (this.game.gameOver()) {
      return;
    }
    this.game.makeMove(this.nextMove(), this.random);
  }

  getInput(_input: KeyInput): InputAction {
    return 'continue';
  }
}
