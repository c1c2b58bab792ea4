/**
 * Plain-text board rendering
 */

import { BOARD_SIZE, type Board, type MessageLine } from '@tilewise/core';

import { createColorFns } from './colors.js';
import { formatTileValue } from './formatters.js';
import type { ColorFn, ColorFunctions } from './types.js';

/**
 * Minimum width of a cell's value column
 */
const MIN_CELL_WIDTH = 4;

function tileColor(exponent: number, c: ColorFunctions): ColorFn {
  if (exponent >= 11) return (text) => c.bold(c.green(text));
  if (exponent >= 8) return c.cyan;
  if (exponent >= 4) return c.yellow;
  return (text) => text;
}

/**
 * Render the board as a grid of tile values
 *
 * Every cell is padded to the width of the widest value on the board (at
 * least four characters), right-aligned, with one space of margin.
 */
export function formatBoard(board: Board, useColor: boolean = false): string {
  const c = createColorFns(useColor);
  const rows = board.toRows();
  const width = Math.max(
    MIN_CELL_WIDTH,
    ...rows.flat().map((exponent) => formatTileValue(exponent).length),
  );
  const border = `+${Array.from({ length: BOARD_SIZE }, () => '-'.repeat(width + 2)).join('+')}+`;

  const lines = [border];
  for (const row of rows) {
    const cells = row.map((exponent) => {
      const text = formatTileValue(exponent).padStart(width);
      return ` ${tileColor(exponent, c)(text)} `;
    });
    lines.push(`|${cells.join('|')}|`);
    lines.push(border);
  }

  return lines.join('\n');
}

/**
 * Render agent messages, highlighting emphasised lines
 */
export function formatMessages(lines: MessageLine[], useColor: boolean = false): string {
  const c = createColorFns(useColor);
  return lines
    .map((line) => (line.emphasis === true ? c.bold(c.cyan(line.text)) : line.text))
    .join('\n');
}
