/**
 * @tilewise/core - 2048 board engine and search agents
 *
 * This package contains:
 * - The 4x4 board and its transition rules
 * - Seedable random sources
 * - Random rollouts, random-tree evaluation and expectimax search
 * - Agents that play a game with those searches
 */

export const VERSION = '0.1.0';

export * from './errors.js';
export * from './random/index.js';
export * from './board/index.js';
export * from './search/index.js';
export * from './agents/index.js';
