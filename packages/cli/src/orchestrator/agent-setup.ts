/**
 * Building boards and agents from resolved configuration
 */

import {
  Board,
  CELL_COUNT,
  createAgent,
  type AgentOptions,
  type InteractiveAgent,
  type RandomSource,
  type SearchProgressCallback,
} from '@tilewise/core';

import type { TilewiseConfig } from '../config/schema.js';
import { InputError } from '../errors/index.js';

/**
 * Seed used when the configuration names none
 */
export function clockSeed(): number {
  return Date.now() >>> 0;
}

/**
 * Agent options for the configured agent
 */
export function agentOptionsFromConfig(
  config: TilewiseConfig,
  random: RandomSource,
  onProgress?: SearchProgressCallback,
): AgentOptions {
  const options: AgentOptions = {
    random,
    randomTree: { ...config.randomTree, parallel: config.search.parallel },
    expectimax: { ...config.expectimax, parallel: config.search.parallel },
  };
  if (onProgress !== undefined) {
    options.onProgress = onProgress;
  }
  return options;
}

/**
 * Create the configured agent for a board
 */
export function createConfiguredAgent(
  config: TilewiseConfig,
  board: Board,
  random: RandomSource,
): InteractiveAgent {
  return createAgent(config.agent, board, agentOptionsFromConfig(config, random));
}

/**
 * Parse a --cells value: 16 exponents separated by commas or whitespace
 * @throws InputError if the value does not hold 16 integers
 */
export function parseCells(text: string): number[] {
  const tokens = text
    .split(/[\s,]+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  if (tokens.length !== CELL_COUNT) {
    throw new InputError(
      `Expected ${CELL_COUNT} cells, got ${tokens.length}`,
      'Pass the board row by row, e.g. --cells "1,1,0,0,0,0,0,0,0,0,0,0,0,0,0,2"',
    );
  }

  return tokens.map((token, index) => {
    const value = Number(token);
    if (!Number.isInteger(value)) {
      throw new InputError(
        `Cell ${index} is not an integer: "${token}"`,
        'Cells hold exponents: 0 for empty, 1 for a 2 tile, 2 for a 4 tile, ...',
      );
    }
    return value;
  });
}

/**
 * Build a board from a --cells value
 * @throws InputError for malformed text; InvalidBoardError for out-of-range exponents
 */
export function boardFromCells(text: string, score: number = 0): Board {
  return Board.fromCells(parseCells(text), { score });
}
