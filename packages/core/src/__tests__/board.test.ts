/**
 * Board and transition engine tests
 */

import { describe, it, expect, vi } from 'vitest';

import { Board } from '../board/board.js';
import { MOVES, parseMove } from '../board/moves.js';
import { InvalidBoardError, InvalidMoveError, TileCoordinateError } from '../errors.js';
import { createRandom, type RandomSource } from '../random/xorshift.js';

/**
 * Random source whose draws always pick the same empty cell and value
 */
function fixedRandom(int = 0, float = 0.5) {
  const nextInt = vi.fn((_bound: number) => int);
  const nextFloat = vi.fn(() => float);
  const source: RandomSource = {
    nextUint32: () => 0,
    nextFloat,
    nextInt,
    fork: () => source,
  };
  return { source, nextInt, nextFloat };
}

function rowsOf(rows: number[][], init: { score?: number; numMoves?: number } = {}): Board {
  return Board.fromCells(rows.flat(), init);
}

const CHECKERBOARD = [
  [1, 2, 1, 2],
  [2, 1, 2, 1],
  [1, 2, 1, 2],
  [2, 1, 2, 1],
];

describe('Board', () => {
  describe('construction', () => {
    it('should create an empty board with zero counters', () => {
      const board = Board.empty();
      expect(board.getCells()).toEqual(new Array(16).fill(0));
      expect(board.score).toBe(0);
      expect(board.numMoves).toBe(0);
      expect(board.gameOver()).toBe(false);
    });

    it('should start a new game with two tiles of value 2 or 4', () => {
      const board = Board.create(createRandom(7));
      const tiles = board.getCells().filter((v) => v !== 0);
      expect(tiles).toHaveLength(2);
      for (const tile of tiles) {
        expect([1, 2]).toContain(tile);
      }
      expect(board.score).toBe(0);
      expect(board.numMoves).toBe(0);
    });

    it('should give identical games for identical seeds', () => {
      const first = Board.createSeeded(42);
      const second = Board.createSeeded(42);
      expect(first.equals(second)).toBe(true);
    });

    it('should build a board from cells and counters', () => {
      const board = rowsOf(
        [
          [1, 0, 0, 0],
          [0, 2, 0, 0],
          [0, 0, 3, 0],
          [0, 0, 0, 11],
        ],
        { score: 120, numMoves: 9 },
      );
      expect(board.getTile(0, 0)).toBe(1);
      expect(board.getTile(1, 1)).toBe(2);
      expect(board.getTile(3, 3)).toBe(11);
      expect(board.score).toBe(120);
      expect(board.numMoves).toBe(9);
      expect(board.maxTile()).toBe(11);
    });

    it('should reject the wrong number of cells', () => {
      expect(() => Board.fromCells([1, 2, 3])).toThrow(InvalidBoardError);
    });

    it('should reject exponents outside 0..31', () => {
      const cells = new Array<number>(16).fill(0);
      cells[5] = 32;
      expect(() => Board.fromCells(cells)).toThrow(InvalidBoardError);
      cells[5] = -1;
      expect(() => Board.fromCells(cells)).toThrow(InvalidBoardError);
      cells[5] = 1.5;
      expect(() => Board.fromCells(cells)).toThrow(InvalidBoardError);
    });

    it('should reject negative counters', () => {
      expect(() => Board.fromCells(new Array<number>(16).fill(0), { score: -4 })).toThrow(
        InvalidBoardError,
      );
    });
  });

  describe('tiles', () => {
    it('should read and write tiles by column and row', () => {
      const board = Board.empty();
      board.setTile(2, 1, 5);
      expect(board.getTile(2, 1)).toBe(5);
      expect(board.getCells()[6]).toBe(5);
      expect(board.emptyCells()).not.toContain(6);
      expect(board.emptyCount()).toBe(15);
    });

    it('should reject coordinates off the board', () => {
      const board = Board.empty();
      expect(() => board.getTile(4, 0)).toThrow(TileCoordinateError);
      expect(() => board.getTile(0, -1)).toThrow(TileCoordinateError);
      expect(() => board.setTile(1.5, 0, 1)).toThrow(TileCoordinateError);
    });

    it('should reject exponents that do not fit', () => {
      expect(() => Board.empty().setTile(0, 0, 32)).toThrow(InvalidBoardError);
    });

    it('should list rows top to bottom', () => {
      const board = rowsOf(CHECKERBOARD);
      expect(board.toRows()).toEqual(CHECKERBOARD);
    });
  });

  describe('shift', () => {
    it('should slide and merge two pairs to the left', () => {
      const board = rowsOf([
        [1, 1, 2, 2],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      expect(board.shift('left')).toBe(true);
      expect(board.toRows()[0]).toEqual([2, 3, 0, 0]);
      expect(board.score).toBe(12);
    });

    it('should pad on the left when sliding right', () => {
      const board = rowsOf([
        [1, 1, 2, 2],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      board.shift('right');
      expect(board.toRows()[0]).toEqual([0, 0, 2, 3]);
      expect(board.score).toBe(12);
    });

    it('should not merge a tile twice in one move', () => {
      const board = rowsOf([
        [1, 2, 2, 2],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      board.shift('left');
      expect(board.toRows()[0]).toEqual([1, 3, 2, 0]);
      expect(board.score).toBe(8);
    });

    it('should work on columns for up and down', () => {
      const up = rowsOf([
        [1, 0, 0, 0],
        [1, 0, 0, 0],
        [2, 0, 0, 0],
        [2, 0, 0, 0],
      ]);
      up.shift('up');
      expect(up.toRows().map((row) => row[0])).toEqual([2, 3, 0, 0]);

      const down = rowsOf([
        [0, 4, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      down.shift('down');
      expect(down.getTile(1, 3)).toBe(4);
      expect(down.getTile(1, 0)).toBe(0);
    });

    it('should report no change and keep the score when nothing moves', () => {
      const board = rowsOf(
        [
          [1, 2, 3, 4],
          [0, 0, 0, 0],
          [0, 0, 0, 0],
          [0, 0, 0, 0],
        ],
        { score: 40 },
      );
      expect(board.shift('left')).toBe(false);
      expect(board.shift('up')).toBe(false);
      expect(board.score).toBe(40);
    });

    it('should never spawn a tile or count a move', () => {
      const board = rowsOf([
        [1, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      board.shift('right');
      expect(board.emptyCount()).toBe(15);
      expect(board.numMoves).toBe(0);
    });
  });

  describe('makeMove', () => {
    it('should shift, spawn one tile and count the move', () => {
      const { source } = fixedRandom();
      const board = rowsOf([
        [1, 1, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);

      expect(board.makeMove('left', source)).toBe(true);
      // After the merge the first empty cell is (1, 0)
      expect(board.toRows()[0]).toEqual([2, 1, 0, 0]);
      expect(board.score).toBe(4);
      expect(board.numMoves).toBe(1);
    });

    it('should spawn a 4 when the value draw is 0.9 or more', () => {
      const board = rowsOf([
        [1, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      board.makeMove('right', fixedRandom(0, 0.9).source);
      expect(board.getTile(0, 0)).toBe(2);
      expect(board.getTile(3, 0)).toBe(1);
    });

    it('should draw the cell before the value', () => {
      const { source, nextInt, nextFloat } = fixedRandom();
      const board = rowsOf([
        [1, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      board.makeMove('down', source);
      expect(nextInt).toHaveBeenCalledWith(15);
      expect(nextInt.mock.invocationCallOrder[0]).toBeLessThan(
        nextFloat.mock.invocationCallOrder[0] ?? 0,
      );
    });

    it('should do nothing for a move that changes no cell', () => {
      const { source, nextInt } = fixedRandom();
      const board = rowsOf([
        [1, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      expect(board.makeMove('up', source)).toBe(false);
      expect(board.makeMove('left', source)).toBe(false);
      expect(board.numMoves).toBe(0);
      expect(board.emptyCount()).toBe(15);
      expect(nextInt).not.toHaveBeenCalled();
    });
  });

  describe('availableMoves and gameOver', () => {
    it('should list only moves that change the board', () => {
      const board = rowsOf([
        [1, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      expect(board.availableMoves()).toEqual(['down', 'right']);
    });

    it('should end the game on a full board without equal neighbours', () => {
      const board = rowsOf(CHECKERBOARD);
      expect(board.gameOver()).toBe(true);
      expect(board.availableMoves()).toEqual([]);
      for (const move of MOVES) {
        expect(board.makeMove(move, fixedRandom().source)).toBe(false);
      }
      expect(board.numMoves).toBe(0);
    });

    it('should keep a full board playable while a vertical pair exists', () => {
      const board = rowsOf([
        [1, 2, 1, 2],
        [2, 1, 2, 1],
        [1, 2, 1, 2],
        [1, 3, 4, 5],
      ]);
      expect(board.gameOver()).toBe(false);
      expect(board.availableMoves()).toEqual(['up', 'down']);
    });

    it('should return null when spawning on a full board', () => {
      expect(rowsOf(CHECKERBOARD).spawnTile(fixedRandom().source)).toBeNull();
    });
  });

  describe('copies and identity', () => {
    it('should clone independently', () => {
      const board = rowsOf([
        [1, 1, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ]);
      const copy = board.clone();
      copy.shift('left');
      expect(board.toRows()[0]).toEqual([1, 1, 0, 0]);
      expect(board.score).toBe(0);
      expect(copy.equals(board)).toBe(false);
    });

    it('should compare cells and counters', () => {
      const a = rowsOf(CHECKERBOARD, { score: 8 });
      const b = rowsOf(CHECKERBOARD, { score: 8 });
      const c = rowsOf(CHECKERBOARD, { score: 12 });
      expect(a.equals(b)).toBe(true);
      expect(a.key()).toBe(b.key());
      expect(a.equals(c)).toBe(false);
      expect(a.sameCells(c)).toBe(true);
      expect(a.key()).not.toBe(c.key());
    });
  });
});

describe('parseMove', () => {
  it('should read names and WASD keys', () => {
    expect(parseMove('up')).toBe('up');
    expect(parseMove(' Left ')).toBe('left');
    expect(parseMove('s')).toBe('down');
    expect(parseMove('D')).toBe('right');
  });

  it('should reject anything else', () => {
    expect(() => parseMove('north')).toThrow(InvalidMoveError);
  });
});
