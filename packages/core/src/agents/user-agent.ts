import type { Board } from '../board/board.js';
import type { Move } from '../board/moves.js';
import { AgentError } from '../errors.js';
import { sharedRandom } from '../random/shared.js';
import type { RandomSource } from '../random/xorshift.js';

import type { InputAction, InteractiveAgent, KeyInput, MessageLine } from './types.js';

const KEY_MOVES: Record<string, Move> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right',
};

const EXIT_KEYS = new Set(['q', 'escape']);

/**
 * A human player. Moves come from key presses and are applied as they arrive.
 */
export class UserAgent implements InteractiveAgent {
  private readonly game: Board;
  private readonly random: RandomSource;

  constructor(game: Board, random: RandomSource = sharedRandom()) {
    this.game = game;
    this.random = random;
  }

  getGame(): Board {
    return this.game;
  }

  /**
   * @throws AgentError always; a human chooses their own moves
   */
  nextMove(): Move {
    throw new AgentError('UserAgent has no move of its own; moves come from key input');
  }

  /** Moves are applied in getInput */
  makeMove(): void {}

  messages(): MessageLine[] {
    return [{ text: 'Use WASD or arrow keys to move.' }];
  }

  getInput(input: KeyInput): InputAction {
    const name = input.name.toLowerCase();
    if (EXIT_KEYS.has(name) || (input.ctrl === true && name === 'c')) {
      return 'exit';
    }

    const move = KEY_MOVES[name];
    if (move !== undefined) {
      this.game.makeMove(move, this.random);
    }
    return 'continue';
  }
}
