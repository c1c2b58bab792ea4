/**
 * One-off evaluation of a board
 */

import { createRandom, type Board, type MessageLine, type Move } from '@tilewise/core';

import type { TilewiseConfig } from '../config/schema.js';
import { InputError } from '../errors/index.js';

import { clockSeed, createConfiguredAgent } from './agent-setup.js';

/**
 * Result of evaluating a board
 */
export interface PositionEvaluation {
  /** Best move, or null when no move changes the board */
  best: Move | null;
  /** Moves that change the board, in declaration order */
  available: Move[];
  /** The agent's description of its decision */
  messages: MessageLine[];
  /** Seed the evaluation drew from */
  seed: number;
}

/**
 * Score the moves of a board with the configured search agent
 *
 * The board itself is not modified.
 *
 * @throws InputError if the configured agent does not search
 */
export function evaluatePosition(board: Board, config: TilewiseConfig): PositionEvaluation {
  if (config.agent === 'random') {
    throw new InputError(
      'The random agent does not score moves',
      'Use --agent random-tree or --agent expectimax',
    );
  }

  const seed = config.game.seed ?? clockSeed();
  const game = board.clone();
  const available = game.availableMoves();
  if (available.length === 0) {
    return { best: null, available, messages: [], seed };
  }

  const agent = createConfiguredAgent(config, game, createRandom(seed));
  const best = agent.nextMove();

  return {
    best,
    available,
    messages: agent.messages(),
    seed,
  };
}
