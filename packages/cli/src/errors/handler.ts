/**
 * Error handling utilities
 */

import {
  AgentError,
  InvalidBoardError,
  InvalidMoveError,
  SearchConfigError,
  SearchWorkerError,
  TileCoordinateError,
} from '@tilewise/core';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, InputError } from './cli-errors.js';

/**
 * Convert errors raised by the engine into CLI errors with suggestions
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof InvalidBoardError || error instanceof TileCoordinateError) {
    return new InputError(error.message, 'Pass 16 comma-separated exponents from 0 to 31');
  }
  if (error instanceof InvalidMoveError) {
    return new InputError(error.message, 'Use up, down, left, right or one of w, a, s, d');
  }
  if (error instanceof SearchConfigError) {
    return new InputError(error.message, 'Use --show-config to see the search settings');
  }
  if (error instanceof SearchWorkerError) {
    return new CliError(error.message, 'Run again without --parallel');
  }
  if (error instanceof AgentError) {
    return new CliError(error.message);
  }
  return error;
}

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  const converted = toCliError(error);

  if (converted instanceof ConfigValidationError) {
    return chalk.red(converted.format());
  }

  if (converted instanceof CliError) {
    return chalk.red(converted.format());
  }

  if (converted instanceof Error) {
    return chalk.red(`Error: ${converted.message}`);
  }

  return chalk.red(`Error: ${String(converted)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  const converted = toCliError(error);
  return converted instanceof CliError ? converted.exitCode : 1;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));
  process.exit(exitCodeFor(error));
}
