/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG, SEARCH_PROFILES, applyProfile } from './defaults.js';
import type { CliOptions, TilewiseConfig } from './schema.js';
import {
  validateConfig,
  validatePartialConfig,
  type PartialTilewiseConfig,
} from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
export const ENV_VAR_MAP: Record<string, string> = {
  TILEWISE_AGENT: 'agent',

  // Game
  TILEWISE_SEED: 'game.seed',
  TILEWISE_MAX_MOVES: 'game.maxMoves',

  // Search
  TILEWISE_PROFILE: 'search.profile',
  TILEWISE_PARALLEL: 'search.parallel',

  // Random tree
  TILEWISE_SIMS: 'randomTree.simCount',
  TILEWISE_METRIC: 'randomTree.metric',

  // Expectimax
  TILEWISE_DEPTH: 'expectimax.depth',
  TILEWISE_TILES: 'expectimax.tiles',
  TILEWISE_HEURISTIC_SIMS: 'expectimax.heuristicSims',
  TILEWISE_MAX_EVALS: 'expectimax.maxEvals',
  TILEWISE_HEURISTIC: 'expectimax.heuristic',

  // Output
  TILEWISE_VERBOSE: 'output.verbose',
  TILEWISE_SHOW_BOARD: 'output.showBoard',
};

const BOOLEAN_PATHS = new Set(['search.parallel', 'output.verbose', 'output.showBoard']);

const NUMERIC_PATHS = new Set([
  'game.seed',
  'game.maxMoves',
  'randomTree.simCount',
  'expectimax.depth',
  'expectimax.tiles',
  'expectimax.heuristicSims',
  'expectimax.maxEvals',
]);

/**
 * Deep merge a partial configuration over a complete one
 * Source values override target values
 */
function deepMerge(target: TilewiseConfig, source: PartialTilewiseConfig): TilewiseConfig {
  const result = structuredClone(target);

  if (source.agent !== undefined) {
    result.agent = source.agent;
  }
  if (source.game) {
    result.game = { ...result.game, ...source.game };
  }
  if (source.search) {
    result.search = { ...result.search, ...source.search };
  }
  if (source.randomTree) {
    result.randomTree = { ...result.randomTree, ...source.randomTree };
  }
  if (source.expectimax) {
    result.expectimax = { ...result.expectimax, ...source.expectimax };
  }
  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]!] = value;
}

/**
 * Parse environment variable value based on expected type
 * Values that do not parse are passed through for validation to report.
 */
export function parseEnvValue(value: string, path: string): unknown {
  if (BOOLEAN_PATHS.has(path)) {
    const normalized = value.toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
    return value;
  }

  if (NUMERIC_PATHS.has(path)) {
    const num = Number(value);
    return value.trim() === '' || Number.isNaN(num) ? value : num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 * @throws ConfigValidationError if a variable holds an invalid value
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialTilewiseConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, configPath, parseEnvValue(value, configPath));
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from a config file using cosmiconfig
 *
 * Without an explicit path the usual places are searched and a missing file
 * is not an error.
 *
 * @throws ConfigError if the file cannot be read or parsed
 * @throws ConfigValidationError if the file holds invalid settings
 */
export async function loadConfigFile(configPath?: string): Promise<PartialTilewiseConfig | null> {
  const explorer = cosmiconfig('tilewise', {
    searchPlaces: [
      'package.json',
      '.tilewiserc',
      '.tilewiserc.json',
      '.tilewiserc.yaml',
      '.tilewiserc.yml',
      '.tilewiserc.js',
      '.tilewiserc.cjs',
      'tilewise.config.js',
      'tilewise.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to read config file${configPath ? `: ${resolveAbsolutePath(configPath)}` : ''} (${reason})`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (result === null || result.isEmpty === true) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to a partial config object
 */
export function mapCliToConfig(options: CliOptions): PartialTilewiseConfig {
  const config: PartialTilewiseConfig = {};

  if (options.agent !== undefined) {
    config.agent = options.agent;
  }

  if (options.seed !== undefined) {
    config.game = { ...config.game, seed: options.seed };
  }
  if (options.maxMoves !== undefined) {
    config.game = { ...config.game, maxMoves: options.maxMoves };
  }

  if (options.profile !== undefined) {
    config.search = { ...config.search, profile: options.profile };
  }
  if (options.parallel !== undefined) {
    config.search = { ...config.search, parallel: options.parallel };
  }

  if (options.sims !== undefined) {
    config.randomTree = { ...config.randomTree, simCount: options.sims };
  }
  if (options.metric !== undefined) {
    config.randomTree = { ...config.randomTree, metric: options.metric };
  }

  if (options.depth !== undefined) {
    config.expectimax = { ...config.expectimax, depth: options.depth };
  }
  if (options.tiles !== undefined) {
    config.expectimax = { ...config.expectimax, tiles: options.tiles };
  }
  if (options.heuristicSims !== undefined) {
    config.expectimax = { ...config.expectimax, heuristicSims: options.heuristicSims };
  }
  if (options.maxEvals !== undefined) {
    config.expectimax = { ...config.expectimax, maxEvals: options.maxEvals };
  }
  if (options.heuristic !== undefined) {
    config.expectimax = { ...config.expectimax, heuristic: options.heuristic };
  }

  if (options.verbose !== undefined) {
    config.output = { ...config.output, verbose: options.verbose };
  }
  if (options.noBoard === true) {
    config.output = { ...config.output, showBoard: false };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Profile presets
 * 5. Default values
 *
 * The profile is taken from the highest source that names one; its search
 * sizes sit below every explicitly set value.
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TilewiseConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config);
  const envConfig = loadEnvConfig(env);
  const cliConfig = mapCliToConfig(cliOptions);

  const effectiveProfile =
    cliConfig.search?.profile ??
    envConfig.search?.profile ??
    fileConfig?.search?.profile ??
    DEFAULT_CONFIG.search.profile;

  let config = applyProfile(structuredClone(DEFAULT_CONFIG), effectiveProfile);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }
  config = deepMerge(config, envConfig);
  config = deepMerge(config, cliConfig);

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: TilewiseConfig): string {
  return JSON.stringify(config, null, 2);
}

export { SEARCH_PROFILES };
