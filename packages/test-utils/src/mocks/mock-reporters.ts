/**
 * Progress listener mocks
 *
 * Note: Types are inlined to avoid circular dependency with @tilewise/cli
 */

import type { MessageLine } from '@tilewise/core';
import { vi, type Mock } from 'vitest';

export interface GameStartInfo {
  agent: string;
  seed?: number;
  maxMoves?: number;
}

export interface MoveUpdate {
  moveNumber: number;
  score: number;
  maxTile: number;
}

export interface GameSummary {
  score: number;
  numMoves: number;
  maxTile: number;
  durationMs: number;
  stopReason: 'game-over' | 'move-limit';
}

/**
 * A progress listener whose methods are vitest mocks
 */
export interface MockReporter {
  startGame: Mock<[GameStartInfo], void>;
  reportMove: Mock<[MoveUpdate], void>;
  reportMessages: Mock<[MessageLine[]], void>;
  completeGame: Mock<[GameSummary], void>;
  failGame: Mock<[string], void>;
}

/**
 * Recorded listener call
 */
export interface ReporterCall {
  method: keyof MockReporter;
  args: unknown[];
}

/**
 * Progress listener that ignores everything
 */
export function createNullReporter(): MockReporter {
  return {
    startGame: vi.fn(),
    reportMove: vi.fn(),
    reportMessages: vi.fn(),
    completeGame: vi.fn(),
    failGame: vi.fn(),
  };
}

/**
 * Progress listener that records every call in order
 */
export function createTrackingReporter(): MockReporter & {
  getCalls(): ReporterCall[];
  reset(): void;
} {
  const calls: ReporterCall[] = [];

  return {
    startGame: vi.fn((...args: [GameStartInfo]) => {
      calls.push({ method: 'startGame', args });
    }),
    reportMove: vi.fn((...args: [MoveUpdate]) => {
      calls.push({ method: 'reportMove', args });
    }),
    reportMessages: vi.fn((...args: [MessageLine[]]) => {
      calls.push({ method: 'reportMessages', args });
    }),
    completeGame: vi.fn((...args: [GameSummary]) => {
      calls.push({ method: 'completeGame', args });
    }),
    failGame: vi.fn((...args: [string]) => {
      calls.push({ method: 'failGame', args });
    }),
    getCalls: () => calls,
    reset: () => {
      calls.length = 0;
    },
  };
}
