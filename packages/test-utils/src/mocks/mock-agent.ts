/**
 * Agent mocks
 */

import type { Agent, Board, Move, RandomSource } from '@tilewise/core';
import { vi, type Mock } from 'vitest';

/**
 * Agent that plays a fixed list of moves, then repeats the last one
 */
export interface ScriptedAgent extends Agent {
  nextMove: Mock<[], Move>;
  makeMove: Mock<[], void>;
}

/**
 * Create an agent that plays the given moves in order
 */
export function createScriptedAgent(
  game: Board,
  moves: readonly Move[],
  random: RandomSource,
): ScriptedAgent {
  let index = 0;
  const nextMove = vi.fn((): Move => moves[Math.min(index, moves.length - 1)] ?? 'up');

  return {
    getGame: () => game,
    nextMove,
    makeMove: vi.fn(() => {
      const move = nextMove();
      index += 1;
      game.makeMove(move, random);
    }),
  };
}
