/**
 * Progress reporter with ora spinners
 */

import type { MessageLine } from '@tilewise/core';
import ora, { type Ora, type Color } from 'ora';

import { formatMessages } from './board-view.js';
import { createColorFns } from './colors.js';
import {
  formatDuration,
  formatEta,
  formatMoveRate,
  formatScore,
  formatSummaryLine,
  formatTileValue,
} from './formatters.js';
import { RateMeter } from './rate-meter.js';
import type {
  ColorFunctions,
  GameProgressListener,
  GameStartInfo,
  GameSummary,
  MoveUpdate,
  ProgressReporterOptions,
} from './types.js';

export type { ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter implements GameProgressListener {
  private spinner: Ora | null = null;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly rateMeter = new RateMeter();
  private maxMoves: number | undefined;

  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`tilewise v${version}`));
    console.log('');
  }

  /**
   * Start playing a game
   */
  startGame(info: GameStartInfo): void {
    this.maxMoves = info.maxMoves;
    this.rateMeter.reset();
    if (this.silent) return;

    const seed = info.seed !== undefined ? this.c.dim(` (seed ${info.seed})`) : '';
    console.log(this.c.bold(`Playing with the ${info.agent} agent`) + seed);

    if (this.spinner) {
      this.spinner.stop();
    }

    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: 'Starting',
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update the spinner after a move
   */
  reportMove(update: MoveUpdate): void {
    this.rateMeter.record(update.moveNumber);
    if (this.silent || !this.spinner) return;

    const moveLabel =
      this.maxMoves !== undefined
        ? `Move ${update.moveNumber}/${this.maxMoves}`
        : `Move ${update.moveNumber}`;
    const rate = this.rateMeter.ratePerSecond();
    const rateStr = rate !== null ? this.c.dim(` · ${formatMoveRate(rate)}`) : '';

    let etaStr = '';
    if (this.maxMoves !== undefined) {
      const eta = formatEta(this.rateMeter.estimateRemaining(update.moveNumber, this.maxMoves));
      etaStr = eta ? this.c.dim(` (${eta} remaining)`) : '';
    }

    this.spinner.text =
      `${moveLabel} · score ${formatScore(update.score)} · ` +
      `best tile ${formatTileValue(update.maxTile) || '-'}${rateStr}${etaStr}`;
  }

  /**
   * Print agent messages (verbose mode only)
   */
  reportMessages(lines: MessageLine[]): void {
    if (this.silent || !this.verbose) return;

    this.spinner?.stop();
    console.log(formatMessages(lines, this.useColor));
    console.log('');
    this.spinner?.start();
  }

  /**
   * Finish the spinner with the game result
   */
  completeGame(summary: GameSummary): void {
    if (this.silent) return;

    const duration = this.c.dim(` (${formatDuration(summary.durationMs)})`);
    const line = `${formatSummaryLine(summary)}${duration}`;
    if (this.spinner) {
      this.spinner.succeed(line);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${line}`);
    }
  }

  /**
   * Finish the spinner with a failure
   */
  failGame(error: string): void {
    if (this.silent) return;

    if (this.spinner) {
      this.spinner.fail(`Game failed: ${error}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.red('✗')} Game failed: ${error}`);
    }
  }

  /**
   * Print final statistics
   */
  printSummary(summary: GameSummary): void {
    if (this.silent) return;

    console.log('');
    console.log(this.c.bold('Summary:'));
    console.log(`  Score: ${formatScore(summary.score)}`);
    console.log(`  Moves: ${summary.numMoves}`);
    console.log(`  Best tile: ${formatTileValue(summary.maxTile) || '-'}`);
    console.log(`  Time: ${formatDuration(summary.durationMs)}`);
    if (summary.durationMs > 0 && summary.numMoves > 0) {
      console.log(`  Rate: ${formatMoveRate((summary.numMoves / summary.durationMs) * 1000)}`);
    }
  }

  /**
   * Print a block of text (a board, agent messages)
   */
  printBlock(text: string): void {
    if (this.silent) return;
    console.log(text);
  }

  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  hasColors(): boolean {
    return this.useColor;
  }
}
