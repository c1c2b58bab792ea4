/**
 * Headless game loop tests
 */

import { ExpectimaxAgent, createRandom } from '@tilewise/core';
import {
  boardFromRows,
  createNullReporter,
  createScriptedAgent,
  createTrackingReporter,
  scriptSpawns,
  terminalBoard,
} from '@tilewise/test-utils';
import { describe, it, expect } from 'vitest';

import { GameError } from '../errors/index.js';
import { MAX_IDLE_TURNS, runGame } from '../orchestrator/game-runner.js';

/** Two 2s side by side in the top row */
function pairBoard() {
  return boardFromRows([
    [1, 1, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ]);
}

/**
 * Clock that returns the given times in order
 */
function clock(...times: number[]): () => number {
  let index = 0;
  return () => times[Math.min(index++, times.length - 1)] ?? 0;
}

describe('runGame', () => {
  it('should finish at once on a finished board', async () => {
    const board = terminalBoard();
    const listener = createTrackingReporter();
    const agent = createScriptedAgent(board, ['left'], createRandom(1));

    const summary = await runGame(agent, { listener, now: clock(1000, 1000) });

    expect(summary).toEqual({
      score: 0,
      numMoves: 0,
      maxTile: 2,
      durationMs: 0,
      stopReason: 'game-over',
    });
    expect(agent.makeMove).not.toHaveBeenCalled();
    expect(listener.getCalls().map((call) => call.method)).toEqual(['completeGame']);
  });

  it('should stop at the move limit and report every move', async () => {
    const board = pairBoard();
    const listener = createTrackingReporter();
    const random = scriptSpawns([{ emptyIndex: 0 }, { emptyIndex: 0 }]);
    const agent = createScriptedAgent(board, ['left', 'right', 'left'], random);

    const summary = await runGame(agent, { maxMoves: 2, listener, now: clock(1000, 1250) });

    // left: [2,0,0,0] +4, spawn at index 1; right: [0,0,2,1], spawn at index 0
    expect(board.toRows()[0]).toEqual([1, 0, 2, 1]);
    expect(random.finished).toBe(true);
    expect(summary).toEqual({
      score: 4,
      numMoves: 2,
      maxTile: 2,
      durationMs: 250,
      stopReason: 'move-limit',
    });
    expect(listener.getCalls()).toEqual([
      { method: 'reportMove', args: [{ moveNumber: 1, score: 4, maxTile: 2 }] },
      { method: 'reportMove', args: [{ moveNumber: 2, score: 4, maxTile: 2 }] },
      { method: 'completeGame', args: [summary] },
    ]);
  });

  it('should not report moves that change nothing', async () => {
    const board = pairBoard();
    const listener = createNullReporter();
    const agent = createScriptedAgent(board, ['up', 'left'], scriptSpawns([{ emptyIndex: 0 }]));

    await runGame(agent, { maxMoves: 1, listener });

    expect(agent.makeMove).toHaveBeenCalledTimes(2);
    expect(listener.reportMove).toHaveBeenCalledTimes(1);
    expect(listener.reportMove).toHaveBeenCalledWith({ moveNumber: 1, score: 4, maxTile: 2 });
  });

  it('should pass agent messages on in verbose mode', async () => {
    const board = pairBoard();
    const listener = createNullReporter();
    const agent = new ExpectimaxAgent(
      board,
      { depth: 1, tiles: 0, heuristicSims: 0, maxEvals: 300 },
      createRandom(1),
    );

    await runGame(agent, { maxMoves: 1, listener, verbose: true });

    expect(listener.reportMessages).toHaveBeenCalledTimes(1);
    const lines = listener.reportMessages.mock.calls[0]?.[0] ?? [];
    expect(lines[0]).toEqual({ text: 'Expectimax Search', emphasis: true });
    expect(lines[5]).toEqual({ text: 'Down: 4', emphasis: true });
  });

  it('should keep agent messages to itself when not verbose', async () => {
    const listener = createNullReporter();
    const agent = new ExpectimaxAgent(pairBoard(), { depth: 0, heuristicSims: 0 }, createRandom(1));

    await runGame(agent, { maxMoves: 1, listener });

    expect(listener.reportMessages).not.toHaveBeenCalled();
  });

  it('should give up on an agent that never changes the board', async () => {
    const board = pairBoard();
    const listener = createTrackingReporter();
    const agent = createScriptedAgent(board, ['up'], createRandom(1));

    const run = runGame(agent, { listener });

    await expect(run).rejects.toBeInstanceOf(GameError);
    await expect(run).rejects.toThrow(`Agent made no progress in ${MAX_IDLE_TURNS} turns`);
    expect(agent.makeMove).toHaveBeenCalledTimes(MAX_IDLE_TURNS);
    expect(listener.failGame).toHaveBeenCalledWith(
      `Agent made no progress in ${MAX_IDLE_TURNS} turns`,
    );
    expect(listener.completeGame).not.toHaveBeenCalled();
  });

  it('should play a whole game with a real agent', async () => {
    const random = createRandom(5);
    const board = pairBoard();
    const agent = new ExpectimaxAgent(
      board,
      { depth: 1, tiles: 1, heuristicSims: 0, maxEvals: 20 },
      random,
    );

    const summary = await runGame(agent);

    expect(summary.stopReason).toBe('game-over');
    expect(board.gameOver()).toBe(true);
    expect(summary.numMoves).toBe(board.numMoves);
    expect(summary.score).toBe(board.score);
  });
});
