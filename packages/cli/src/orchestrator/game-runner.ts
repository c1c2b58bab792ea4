/**
 * Headless game loop
 *
 * Drives an agent until its game is over or a move limit is reached and
 * reports progress to a listener. The loop yields to the event loop between
 * moves so spinners and signals stay responsive.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { isInteractiveAgent, type Agent } from '@tilewise/core';

import { GameError } from '../errors/index.js';
import type { GameProgressListener, GameSummary, StopReason } from '../progress/types.js';

/**
 * Turns in a row without a board change before the game is abandoned
 */
export const MAX_IDLE_TURNS = 1000;

/**
 * Game runner options
 */
export interface GameRunnerOptions {
  /** Stop after this many moves */
  maxMoves?: number;
  /** Receives progress */
  listener?: GameProgressListener;
  /** Pass agent messages to the listener after every move */
  verbose?: boolean;
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * Play a game to the end (or to the move limit)
 *
 * @throws GameError if the agent stops changing the board before the game is over
 */
export async function runGame(agent: Agent, options: GameRunnerOptions = {}): Promise<GameSummary> {
  const { maxMoves, listener, verbose = false, now = Date.now } = options;
  const game = agent.getGame();
  const startTime = now();
  let idleTurns = 0;

  const limitReached = (): boolean => maxMoves !== undefined && game.numMoves >= maxMoves;

  try {
    while (!game.gameOver() && !limitReached()) {
      const before = game.numMoves;
      agent.makeMove();

      if (game.numMoves === before) {
        idleTurns += 1;
        if (idleTurns >= MAX_IDLE_TURNS) {
          throw new GameError(
            `Agent made no progress in ${MAX_IDLE_TURNS} turns`,
            game.numMoves + 1,
          );
        }
        continue;
      }

      idleTurns = 0;
      listener?.reportMove({
        moveNumber: game.numMoves,
        score: game.score,
        maxTile: game.maxTile(),
      });
      if (verbose && isInteractiveAgent(agent)) {
        listener?.reportMessages(agent.messages());
      }

      await yieldToEventLoop();
    }
  } catch (error) {
    listener?.failGame(error instanceof Error ? error.message : String(error));
    throw error;
  }

  const stopReason: StopReason = game.gameOver() ? 'game-over' : 'move-limit';
  const summary: GameSummary = {
    score: game.score,
    numMoves: game.numMoves,
    maxTile: game.maxTile(),
    durationMs: now() - startTime,
    stopReason,
  };

  listener?.completeGame(summary);
  return summary;
}
