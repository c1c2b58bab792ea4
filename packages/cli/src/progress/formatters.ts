/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { TilewiseConfig } from '../config/schema.js';

import type { GameSummary } from './types.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: TilewiseConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(`Agent: ${config.agent}`);
  lines.push('');

  // Game
  lines.push(chalk.dim('Game:'));
  lines.push(`  Seed: ${config.game.seed ?? chalk.yellow('from clock')}`);
  lines.push(`  Move limit: ${config.game.maxMoves ?? 'none'}`);
  lines.push('');

  // Search
  lines.push(chalk.dim('Search:'));
  lines.push(`  Profile: ${config.search.profile}`);
  if (config.search.parallel) {
    lines.push(`  Parallel: ${chalk.yellow('yes')}`);
  }
  lines.push('');

  // Random tree
  lines.push(chalk.dim('Random tree:'));
  lines.push(`  Simulations per move: ${config.randomTree.simCount}`);
  lines.push(`  Metric: ${config.randomTree.metric}`);
  lines.push('');

  // Expectimax
  lines.push(chalk.dim('Expectimax:'));
  lines.push(`  Depth: ${config.expectimax.depth}`);
  lines.push(`  Spawn cells per layer: ${config.expectimax.tiles}`);
  lines.push(`  Rollouts per leaf: ${config.expectimax.heuristicSims}`);
  lines.push(`  Node budget: ${config.expectimax.maxEvals}`);
  lines.push(`  Heuristic: ${config.expectimax.heuristic}`);
  lines.push('');

  // Output
  lines.push(chalk.dim('Output:'));
  lines.push(`  Verbose: ${config.output.verbose}`);
  lines.push(`  Show board: ${config.output.showBoard}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format estimated time remaining in human-readable format
 * @param ms Milliseconds remaining, or null if unknown
 * @returns Formatted string like "~2m 30s" or empty string if null
 */
export function formatEta(ms: number | null): string {
  if (ms === null) {
    return '';
  }

  if (ms <= 0) {
    return 'almost done';
  }

  if (ms < 1000) {
    return 'less than a second';
  }

  if (ms < 60000) {
    return `~${Math.ceil(ms / 1000)}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.ceil((ms % 60000) / 1000);

  if (seconds === 0) {
    return `~${minutes}m`;
  }

  return `~${minutes}m ${seconds}s`;
}

/**
 * Tile value shown for an exponent; empty cells show nothing
 */
export function formatTileValue(exponent: number): string {
  return exponent === 0 ? '' : String(2 ** exponent);
}

/**
 * Format a score with thousands separators
 */
export function formatScore(score: number): string {
  return score.toLocaleString('en-US');
}

/**
 * Format a move rate like "12.5 moves/s"
 */
export function formatMoveRate(movesPerSecond: number): string {
  const rounded = movesPerSecond >= 100 ? Math.round(movesPerSecond) : movesPerSecond.toFixed(1);
  return `${rounded} moves/s`;
}

/**
 * One-line summary of a finished game
 */
export function formatSummaryLine(summary: GameSummary): string {
  const ending = summary.stopReason === 'move-limit' ? 'Stopped at move limit' : 'Game over';
  return (
    `${ending}: score ${formatScore(summary.score)}, ${summary.numMoves} moves, ` +
    `best tile ${formatTileValue(summary.maxTile) || '-'}`
  );
}
