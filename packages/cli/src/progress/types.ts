/**
 * Shared types for progress output
 */

import type { MessageLine } from '@tilewise/core';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Why a game stopped
 */
export type StopReason = 'game-over' | 'move-limit';

/**
 * Reported once before the first move
 */
export interface GameStartInfo {
  /** Agent name as configured */
  agent: string;
  /** Seed the game was started with */
  seed?: number;
  /** Move limit, if any */
  maxMoves?: number;
}

/**
 * Reported after every move that changed the board
 */
export interface MoveUpdate {
  /** Moves played so far */
  moveNumber: number;
  score: number;
  /** Highest exponent on the board */
  maxTile: number;
}

/**
 * Result of a finished game
 */
export interface GameSummary {
  score: number;
  numMoves: number;
  /** Highest exponent on the board */
  maxTile: number;
  durationMs: number;
  stopReason: StopReason;
}

/**
 * Receives game progress from the game runner
 */
export interface GameProgressListener {
  startGame(info: GameStartInfo): void;
  reportMove(update: MoveUpdate): void;
  /** Agent messages after a move (verbose mode) */
  reportMessages(lines: MessageLine[]): void;
  completeGame(summary: GameSummary): void;
  failGame(error: string): void;
}

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print agent messages after every move (default: false) */
  verbose?: boolean;
}
