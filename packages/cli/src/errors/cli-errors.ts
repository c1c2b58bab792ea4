/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command input (a malformed board, an unknown option value)
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, 2);
    this.name = 'InputError';
  }
}

/**
 * Failure while a game is being played
 */
export class GameError extends CliError {
  constructor(
    message: string,
    public readonly moveNumber?: number,
  ) {
    super(message);
    this.name = 'GameError';
  }

  override format(): string {
    const location = this.moveNumber !== undefined ? ` (at move ${this.moveNumber})` : '';
    return `Game Error${location}: ${this.message}`;
  }
}
