/**
 * Agents
 */

export {
  type Agent,
  type InteractiveAgent,
  type InputAction,
  type KeyInput,
  type MessageLine,
  isInteractiveAgent,
} from './types.js';

export { BaseAgent } from './base-agent.js';
export { RandomAgent } from './random-agent.js';
export { RandomTreeAgent } from './random-tree-agent.js';
export { ExpectimaxAgent } from './expectimax-agent.js';
export { UserAgent } from './user-agent.js';

export {
  AGENT_KINDS,
  type AgentKind,
  type AgentOptions,
  isAgentKind,
  createAgent,
} from './factory.js';
