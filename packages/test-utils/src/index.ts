/**
 * @tilewise/test-utils
 *
 * Shared test utilities for tilewise
 */

// Fixture loading
export { loadJsonSync, getFixturePath, listJsonFixtures } from './fixtures/loader.js';

export {
  moveSchema,
  mergeCaseSchema,
  mergeCasesSchema,
  scenarioSchema,
  type MergeCase,
  type Scenario,
} from './fixtures/schemas.js';

// Builders
export { BoardBuilder, boardFromRows, terminalBoard } from './builders/board-builder.js';

// Random sources
export {
  ScriptedRandom,
  scriptSpawns,
  type RandomScript,
  type ScriptedSpawn,
} from './random/scripted-random.js';

// Mocks
export {
  createNullReporter,
  createTrackingReporter,
  type MockReporter,
  type ReporterCall,
} from './mocks/mock-reporters.js';

export { createScriptedAgent, type ScriptedAgent } from './mocks/mock-agent.js';
