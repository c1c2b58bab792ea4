/**
 * Expectimax agent
 *
 * Runs one budgeted expectimax decision per move and plays the best
 * available direction.
 */

import type { Board } from '../board/board.js';
import { MOVES, MOVE_LABELS, type Move } from '../board/moves.js';
import type { RandomSource } from '../random/xorshift.js';
import { ExpectimaxSearch, type ExpectimaxParams } from '../search/expectimax.js';
import { createMoveScores, maxMove, type MoveScores } from '../search/move-scores.js';
import type { SearchProgressCallback } from '../search/random-tree.js';

import { BaseAgent } from './base-agent.js';
import type { MessageLine } from './types.js';

export class ExpectimaxAgent extends BaseAgent {
  private readonly search: ExpectimaxSearch;
  private lastScores: MoveScores = createMoveScores();
  private lastBest: Move | undefined;

  constructor(
    game: Board,
    params: Partial<ExpectimaxParams> = {},
    random?: RandomSource,
    onProgress?: SearchProgressCallback,
  ) {
    super(game, random);
    this.search = new ExpectimaxSearch(params, onProgress);
  }

  get params(): ExpectimaxParams {
    return this.search.params;
  }

  /**
   * Scores from the most recent decision
   */
  get scores(): Readonly<MoveScores> {
    return this.lastScores;
  }

  nextMove(): Move {
    this.lastScores = this.search.search(this.game, this.random).scores;
    this.lastBest = maxMove(this.lastScores, this.game.availableMoves());
    return this.lastBest;
  }

  messages(): MessageLine[] {
    const { depth, tiles, heuristicSims, maxEvals, heuristic } = this.search.params;

    return [
      { text: 'Expectimax Search', emphasis: true },
      {
        text:
          `Depth ${depth}, ${tiles} spawn cells per chance layer, ` +
          `${heuristicSims} rollouts per leaf (${heuristic} heuristic).`,
      },
      { text: `Evaluated ${this.search.evaluations} of ${maxEvals} nodes.` },
      { text: '' },
      ...MOVES.map((move) => ({
        text: `${MOVE_LABELS[move]}: ${this.lastScores[move]}`,
        emphasis: move === this.lastBest,
      })),
    ];
  }
}
