/**
 * Single-line merge cases from the fixture table
 */

import { Board } from '@tilewise/core';
import { loadJsonSync, mergeCasesSchema, type MergeCase } from '@tilewise/test-utils';
import { describe, it, expect } from 'vitest';

const cases = loadJsonSync('boards/merge-cases.json', mergeCasesSchema);

function place(mergeCase: MergeCase): Board {
  const board = Board.empty();
  mergeCase.line.forEach((exponent, k) => {
    if (mergeCase.axis === 'row') {
      board.setTile(k, 0, exponent);
    } else {
      board.setTile(0, k, exponent);
    }
  });
  return board;
}

function read(board: Board, axis: MergeCase['axis']): number[] {
  return [0, 1, 2, 3].map((k) => (axis === 'row' ? board.getTile(k, 0) : board.getTile(0, k)));
}

describe('merge cases', () => {
  it.each(cases)('$name', (mergeCase) => {
    const board = place(mergeCase);
    const changed = board.shift(mergeCase.move);

    expect(read(board, mergeCase.axis)).toEqual(mergeCase.expected);
    expect(board.score).toBe(mergeCase.gained);
    expect(changed).toBe(mergeCase.expected.some((e, k) => e !== mergeCase.line[k]));
  });
});
