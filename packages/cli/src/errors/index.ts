/**
 * Error module exports
 */

export { CliError, ConfigError, InputError, GameError, resolveAbsolutePath } from './cli-errors.js';

export { toCliError, formatError, exitCodeFor, handleError } from './handler.js';
