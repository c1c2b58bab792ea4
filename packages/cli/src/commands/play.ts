/**
 * Play command implementation
 */

import { Board, createRandom } from '@tilewise/core';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { clockSeed, createConfiguredAgent } from '../orchestrator/agent-setup.js';
import { runGame } from '../orchestrator/game-runner.js';
import { formatBoard } from '../progress/board-view.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * Main play command handler
 */
export async function playCommand(rawOptions: Record<string, unknown>): Promise<void> {
  let reporter = new ProgressReporter({ color: rawOptions['color'] !== false });

  try {
    const options = parseCliOptions(rawOptions);
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      console.log(formatConfigDisplay(config));
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    reporter = new ProgressReporter({
      color: !options.noColor,
      verbose: config.output.verbose,
    });
    reporter.printHeader(VERSION);

    const seed = config.game.seed ?? clockSeed();
    const random = createRandom(seed);
    const board = Board.create(random);
    const agent = createConfiguredAgent(config, board, random);

    const { maxMoves } = config.game;
    reporter.startGame({ agent: config.agent, seed, maxMoves });
    const summary = await runGame(agent, {
      maxMoves,
      listener: reporter,
      verbose: config.output.verbose,
    });

    if (config.output.showBoard) {
      reporter.printBlock('');
      reporter.printBlock(formatBoard(board, reporter.hasColors()));
    }
    reporter.printSummary(summary);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
