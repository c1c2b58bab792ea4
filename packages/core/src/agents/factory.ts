import type { Board } from '../board/board.js';
import type { RandomSource } from '../random/xorshift.js';
import type { ExpectimaxParams } from '../search/expectimax.js';
import type { RandomTreeOptions, SearchProgressCallback } from '../search/random-tree.js';

import { ExpectimaxAgent } from './expectimax-agent.js';
import { RandomAgent } from './random-agent.js';
import { RandomTreeAgent } from './random-tree-agent.js';
import type { InteractiveAgent } from './types.js';

/**
 * Computer agents that can be built by name
 */
export const AGENT_KINDS = ['random', 'random-tree', 'expectimax'] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

/**
 * Options for createAgent; each agent reads only its own section
 */
export interface AgentOptions {
  random?: RandomSource;
  randomTree?: Partial<RandomTreeOptions>;
  expectimax?: Partial<ExpectimaxParams>;
  onProgress?: SearchProgressCallback;
}

export function isAgentKind(value: string): value is AgentKind {
  return (AGENT_KINDS as readonly string[]).includes(value);
}

/**
 * Create a computer agent playing the given game
 */
export function createAgent(
  kind: AgentKind,
  game: Board,
  options: AgentOptions = {},
): InteractiveAgent {
  switch (kind) {
    case 'random':
      return new RandomAgent(game, options.random);
    case 'random-tree': {
      const treeOptions: Partial<RandomTreeOptions> = { ...options.randomTree };
      if (options.onProgress !== undefined) {
        treeOptions.onProgress = options.onProgress;
      }
      return new RandomTreeAgent(game, treeOptions, options.random);
    }
    case 'expectimax':
      return new ExpectimaxAgent(game, options.expectimax, options.random, options.onProgress);
  }
}
