/**
 * CLI definition using Commander.js
 */

import { AGENT_KINDS, EXPECTIMAX_HEURISTICS, RANDOM_TREE_METRICS } from '@tilewise/core';
import { Command, InvalidArgumentError } from 'commander';

import { SEARCH_PROFILE_NAMES } from './config/defaults.js';
import type { CliOptions } from './config/schema.js';
import { InputError } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Agent descriptions for help text
 */
const AGENT_HELP = `Agent that plays:
    random      - Uniformly random moves
    random-tree - Random rollouts per move [default]
    expectimax  - Budgeted expectimax search with rollout leaves`;

/**
 * Profile descriptions for help text
 */
const PROFILE_HELP = `Search size:
    quick    - 25 rollouts per move; expectimax depth 1, 100 nodes
    standard - 100 rollouts per move; expectimax depth 2, 300 nodes [default]
    deep     - 400 rollouts per move; expectimax depth 3, 1500 nodes`;

/**
 * Metric descriptions for help text
 */
const METRIC_HELP = `Random-tree rollout metric:
    score - Final score [default]
    moves - Number of moves survived`;

/**
 * Heuristic descriptions for help text
 */
const HEURISTIC_HELP = `Expectimax leaf scoring:
    rollout        - Average rollout score [default]
    empty-weighted - Average rollout score times empty cells`;

/**
 * Commander argument parser for non-negative integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Options shared by every command that runs a search agent
 */
function addSearchOptions(command: Command): Command {
  return command
    .option('-a, --agent <kind>', AGENT_HELP)
    .option('--seed <seed>', 'Random seed (default: from the clock)', parseInteger)
    .option('-p, --profile <profile>', PROFILE_HELP)
    .option('--sims <count>', 'Random-tree rollouts per move', parseInteger)
    .option('--metric <metric>', METRIC_HELP)
    .option('--depth <depth>', 'Expectimax depth', parseInteger)
    .option('--tiles <count>', 'Expectimax spawn cells per chance layer', parseInteger)
    .option('--heuristic-sims <count>', 'Expectimax rollouts per leaf', parseInteger)
    .option('--max-evals <count>', 'Expectimax node budget per move', parseInteger)
    .option('--heuristic <kind>', HEURISTIC_HELP)
    .option('--parallel', 'Play search rollouts on a pool of worker threads')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tilewise')
    .description('2048 engine with random-tree and expectimax search agents')
    .version(VERSION);

  // Play command
  addSearchOptions(
    program.command('play').description('Play a game with a computer agent until it is over'),
  )
    .option('--max-moves <count>', 'Stop after this many moves', parseInteger)
    .option('--verbose', "Print the agent's reasoning after every move")
    .option('--no-board', 'Do not print the final board')
    .action(async (options: Record<string, unknown>) => {
      const { playCommand } = await import('./commands/play.js');
      await playCommand(options);
    });

  // Evaluate command
  addSearchOptions(
    program.command('evaluate').description('Score the four moves of a given board'),
  )
    .requiredOption('--cells <cells>', '16 exponents, row by row (0 = empty, 1 = 2, 2 = 4, ...)')
    .option('--score <score>', 'Score of the board', parseInteger)
    .action(async (options: Record<string, unknown>) => {
      const { evaluateCommand } = await import('./commands/evaluate.js');
      await evaluateCommand(options);
    });

  return program;
}

function readString(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function readBoolean(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Read an option restricted to a fixed set of values
 * @throws InputError for a value outside the set
 */
function readChoice<T extends string>(
  options: Record<string, unknown>,
  key: string,
  flag: string,
  choices: readonly T[],
): T | undefined {
  const value = readString(options, key);
  if (value === undefined) {
    return undefined;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new InputError(`Invalid value for --${flag}: ${value}`, `Use one of: ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Parse CLI options from command options object
 * @throws InputError for an unknown agent, profile, metric or heuristic
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = readString(options, 'config');
  if (config !== undefined) result.config = config;

  const agent = readChoice(options, 'agent', 'agent', AGENT_KINDS);
  if (agent !== undefined) result.agent = agent;
  const profile = readChoice(options, 'profile', 'profile', SEARCH_PROFILE_NAMES);
  if (profile !== undefined) result.profile = profile;
  const metric = readChoice(options, 'metric', 'metric', RANDOM_TREE_METRICS);
  if (metric !== undefined) result.metric = metric;
  const heuristic = readChoice(options, 'heuristic', 'heuristic', EXPECTIMAX_HEURISTICS);
  if (heuristic !== undefined) result.heuristic = heuristic;

  const seed = readNumber(options, 'seed');
  if (seed !== undefined) result.seed = seed;
  const maxMoves = readNumber(options, 'maxMoves');
  if (maxMoves !== undefined) result.maxMoves = maxMoves;
  const sims = readNumber(options, 'sims');
  if (sims !== undefined) result.sims = sims;
  const depth = readNumber(options, 'depth');
  if (depth !== undefined) result.depth = depth;
  const tiles = readNumber(options, 'tiles');
  if (tiles !== undefined) result.tiles = tiles;
  const heuristicSims = readNumber(options, 'heuristicSims');
  if (heuristicSims !== undefined) result.heuristicSims = heuristicSims;
  const maxEvals = readNumber(options, 'maxEvals');
  if (maxEvals !== undefined) result.maxEvals = maxEvals;
  const score = readNumber(options, 'score');
  if (score !== undefined) result.score = score;

  const parallel = readBoolean(options, 'parallel');
  if (parallel !== undefined) result.parallel = parallel;
  const verbose = readBoolean(options, 'verbose');
  if (verbose !== undefined) result.verbose = verbose;
  const showConfig = readBoolean(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js sets the negated name to false for --no-* flags
  if (options['color'] === false) result.noColor = true;
  if (options['board'] === false) result.noBoard = true;

  const cells = readString(options, 'cells');
  if (cells !== undefined) result.cells = cells;

  return result;
}
