/**
 * Orchestrator module exports
 */

export {
  clockSeed,
  agentOptionsFromConfig,
  createConfiguredAgent,
  parseCells,
  boardFromCells,
} from './agent-setup.js';

export { MAX_IDLE_TURNS, runGame, type GameRunnerOptions } from './game-runner.js';

export { evaluatePosition, type PositionEvaluation } from './evaluate-position.js';
