import { randomMove, type Move } from '../board/moves.js';

import { BaseAgent } from './base-agent.js';
import type { MessageLine } from './types.js';

/**
 * Plays a uniformly random direction every turn
 */
export class RandomAgent extends BaseAgent {
  nextMove(): Move {
    return randomMove(this.random);
  }

  messages(): MessageLine[] {
    return [{ text: 'Performing random actions.' }];
  }
}
