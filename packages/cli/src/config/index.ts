/**
 * Configuration module exports
 */

// Schema types
export type {
  SearchProfile,
  GameConfigSchema,
  SearchConfigSchema,
  RandomTreeConfigSchema,
  ExpectimaxConfigSchema,
  OutputConfigSchema,
  TilewiseConfig,
  CliOptions,
} from './schema.js';

// Defaults and profiles
export {
  SEARCH_PROFILE_NAMES,
  SEARCH_PROFILES,
  DEFAULT_RANDOM_TREE_CONFIG,
  DEFAULT_EXPECTIMAX_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
  applyProfile,
  type ProfilePreset,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  agentKindSchema,
  searchProfileSchema,
  randomTreeMetricSchema,
  expectimaxHeuristicSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialTilewiseConfig,
} from './validation.js';

// Loader
export {
  ENV_VAR_MAP,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mapCliToConfig,
  parseEnvValue,
  formatConfig,
} from './loader.js';
