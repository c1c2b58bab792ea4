/**
 * Random-tree agent
 *
 * Scores each move by summed rollout outcomes and plays the best available one.
 */

import type { Board } from '../board/board.js';
import { MOVES, MOVE_LABELS, type Move } from '../board/moves.js';
import type { RandomSource } from '../random/xorshift.js';
import { maxMove, createMoveScores, type MoveScores } from '../search/move-scores.js';
import {
  resolveRandomTreeOptions,
  scoreMoves,
  type RandomTreeOptions,
} from '../search/random-tree.js';

import { BaseAgent } from './base-agent.js';
import type { MessageLine } from './types.js';

export class RandomTreeAgent extends BaseAgent {
  readonly options: RandomTreeOptions;
  private lastScores: MoveScores = createMoveScores();
  private lastBest: Move | undefined;

  constructor(game: Board, options: Partial<RandomTreeOptions> = {}, random?: RandomSource) {
    super(game, random);
    this.options = resolveRandomTreeOptions(options);
  }

  /**
   * Scores from the most recent decision
   */
  get scores(): Readonly<MoveScores> {
    return this.lastScores;
  }

  nextMove(): Move {
    this.lastScores = scoreMoves(this.game, this.options, this.random);
    this.lastBest = maxMove(this.lastScores, this.game.availableMoves());
    return this.lastBest;
  }

  messages(): MessageLine[] {
    const { simCount, metric } = this.options;
    const comparison = metric === 'moves' ? 'number of moves' : 'highest score';

    return [
      { text: 'Random Tree Search', emphasis: true },
      {
        text:
          `Taking the average of ${simCount} simulations, per move, to determine the next ` +
          `best move. Comparing by ${comparison}.`,
      },
      { text: '' },
      ...MOVES.map((move) => ({
        text: `${MOVE_LABELS[move]}: ${simCount > 0 ? Math.trunc(this.lastScores[move] / simCount) : 0}`,
        emphasis: move === this.lastBest,
      })),
    ];
  }
}
