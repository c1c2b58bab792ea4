/**
 * Agent contracts
 *
 * An agent owns one game and chooses its moves. Interactive agents also
 * describe their last decision and react to key presses.
 */

import type { Board } from '../board/board.js';
import type { Move } from '../board/moves.js';

/**
 * What the caller should do after an input event
 */
export type InputAction = 'continue' | 'exit';

/**
 * A key press, named the way terminal key events name them
 * ('up', 'left', 'w', 'q', 'escape', ...)
 */
export interface KeyInput {
  name: string;
  ctrl?: boolean;
}

/**
 * One line of agent output; emphasised lines are highlighted when shown
 */
export interface MessageLine {
  text: string;
  emphasis?: boolean;
}

/**
 * Anything that owns a game and can choose moves for it
 */
export interface Agent {
  /** The game the agent plays */
  getGame(): Board;
  /** Choose a move without changing the game */
  nextMove(): Move;
  /** Choose a move and apply it */
  makeMove(): void;
}

/**
 * An agent that can be driven from a front end
 */
export interface InteractiveAgent extends Agent {
  /** Lines describing the agent and its last decision */
  messages(): MessageLine[];
  /** React to a key press */
  getInput(input: KeyInput): InputAction;
}

/**
 * Type guard for interactive agents
 */
export function isInteractiveAgent(agent: Agent): agent is InteractiveAgent {
  return 'messages' in agent && 'getInput' in agent;
}
