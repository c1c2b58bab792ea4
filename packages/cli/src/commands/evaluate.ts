/**
 * Evaluate command implementation
 */

import { MOVE_LABELS } from '@tilewise/core';

import { parseCliOptions } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { InputError, handleError } from '../errors/index.js';
import { boardFromCells } from '../orchestrator/agent-setup.js';
import { evaluatePosition } from '../orchestrator/evaluate-position.js';
import { formatBoard, formatMessages } from '../progress/board-view.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Main evaluate command handler
 */
export async function evaluateCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);

    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    if (options.cells === undefined) {
      throw new InputError('No board given', 'Pass the board with --cells');
    }
    const board = boardFromCells(options.cells, options.score);
    reporter.printBlock(formatBoard(board, reporter.hasColors()));
    reporter.printBlock('');

    const evaluation = evaluatePosition(board, config);
    if (evaluation.best === null) {
      reporter.printWarning('No move changes this board; the game is over.');
      return;
    }

    reporter.printBlock(formatMessages(evaluation.messages, reporter.hasColors()));
    reporter.printBlock('');
    reporter.printSuccess(`Best move: ${MOVE_LABELS[evaluation.best]} (seed ${evaluation.seed})`);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
