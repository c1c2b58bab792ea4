import { InvalidBoardError, TileCoordinateError } from '../errors.js';
import { seedSharedRandom, sharedRandom } from '../random/shared.js';
import type { RandomSource } from '../random/xorshift.js';

import {
  BOARD_SIZE,
  CELL_COUNT,
  COLUMN_LINES,
  ROW_LINES,
  condenseLine,
  hasAdjacentPair,
  mergeLine,
  padLine,
} from './lines.js';
import { MOVES, isVertical, slidesTowardStart, type Move } from './moves.js';

/**
 * Largest exponent a cell can hold (tile value 2^31)
 */
export const MAX_EXPONENT = 31;

/**
 * Probability that a spawned tile is a 4 (exponent 2) rather than a 2
 */
export const SPAWN_FOUR_PROBABILITY = 0.1;

/**
 * Optional counters when building a board from cells
 */
export interface BoardInit {
  score?: number;
  numMoves?: number;
}

/**
 * A tile placed by a spawn
 */
export interface SpawnedTile {
  /** Cell index (x + y * 4) */
  index: number;
  /** Exponent placed (1 or 2) */
  exponent: number;
}

function isValidExponent(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_EXPONENT;
}

function isValidCounter(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * A 4x4 board of tile exponents with its score and move count
 *
 * Cells hold log2 of the tile value (0 = empty, 1 = 2, 2 = 4, ...), row-major
 * with index = x + y * 4. The cell array is fixed at 16 entries when the board
 * is built and is never exposed for resizing.
 */
export class Board {
  private readonly cells: Uint8Array;
  private _score: number;
  private _numMoves: number;

  private constructor(cells: Uint8Array, score: number, numMoves: number) {
    this.cells = cells;
    this._score = score;
    this._numMoves = numMoves;
  }

  /**
   * A board with no tiles, score 0 and no moves
   */
  static empty(): Board {
    return new Board(new Uint8Array(CELL_COUNT), 0, 0);
  }

  /**
   * A new game: an empty board with two spawned tiles
   */
  static create(random: RandomSource = sharedRandom()): Board {
    const board = Board.empty();
    board.spawnTile(random);
    board.spawnTile(random);
    return board;
  }

  /**
   * A new game after reseeding the shared random source.
   * Every later draw that falls back to the shared source follows from the seed.
   */
  static createSeeded(seed: number): Board {
    seedSharedRandom(seed);
    return Board.create();
  }

  /**
   * Build a board from 16 row-major exponents
   * @throws InvalidBoardError if the cells or counters are malformed
   */
  static fromCells(cells: ArrayLike<number>, init: BoardInit = {}): Board {
    if (cells.length !== CELL_COUNT) {
      throw new InvalidBoardError(`Expected ${CELL_COUNT} cells, got ${cells.length}`);
    }

    const values = new Uint8Array(CELL_COUNT);
    for (let i = 0; i < CELL_COUNT; i++) {
      const value = cells[i] ?? 0;
      if (!isValidExponent(value)) {
        throw new InvalidBoardError(
          `Cell ${i} holds ${value}; exponents must be integers from 0 to ${MAX_EXPONENT}`,
        );
      }
      values[i] = value;
    }

    const score = init.score ?? 0;
    const numMoves = init.numMoves ?? 0;
    if (!isValidCounter(score)) {
      throw new InvalidBoardError(`Score must be a non-negative integer, got ${score}`);
    }
    if (!isValidCounter(numMoves)) {
      throw new InvalidBoardError(`Move count must be a non-negative integer, got ${numMoves}`);
    }

    return new Board(values, score, numMoves);
  }

  /**
   * Accumulated merge score
   */
  get score(): number {
    return this._score;
  }

  /**
   * Number of moves that changed the board
   */
  get numMoves(): number {
    return this._numMoves;
  }

  /**
   * Exponent at a coordinate (x = column, y = row)
   * @throws TileCoordinateError for coordinates outside 0..3
   */
  getTile(x: number, y: number): number {
    return this.cellAt(Board.indexOf(x, y));
  }

  /**
   * Set the exponent at a coordinate
   * @throws TileCoordinateError for coordinates outside 0..3
   * @throws InvalidBoardError for an exponent outside 0..31
   */
  setTile(x: number, y: number, exponent: number): void {
    const index = Board.indexOf(x, y);
    if (!isValidExponent(exponent)) {
      throw new InvalidBoardError(
        `Exponent must be an integer from 0 to ${MAX_EXPONENT}, got ${exponent}`,
      );
    }
    this.cells[index] = exponent;
  }

  /**
   * Copy of the 16 exponents, row-major
   */
  getCells(): number[] {
    return Array.from(this.cells);
  }

  /**
   * Exponents as four rows of four
   */
  toRows(): number[][] {
    return ROW_LINES.map((line) => line.map((i) => this.cellAt(i)));
  }

  /**
   * Indices of empty cells, ascending
   */
  emptyCells(): number[] {
    const empty: number[] = [];
    for (let i = 0; i < CELL_COUNT; i++) {
      if (this.cellAt(i) === 0) {
        empty.push(i);
      }
    }
    return empty;
  }

  emptyCount(): number {
    return this.emptyCells().length;
  }

  /**
   * Highest exponent on the board (0 for an empty board)
   */
  maxTile(): number {
    return Math.max(...this.cells);
  }

  /**
   * Independent copy with the same cells and counters
   */
  clone(): Board {
    return new Board(this.cells.slice(), this._score, this._numMoves);
  }

  /**
   * Whether two boards have the same cells
   */
  sameCells(other: Board): boolean {
    for (let i = 0; i < CELL_COUNT; i++) {
      if (this.cellAt(i) !== other.cellAt(i)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Whether two boards have the same cells, score and move count
   */
  equals(other: Board): boolean {
    return (
      this._score === other._score && this._numMoves === other._numMoves && this.sameCells(other)
    );
  }

  /**
   * Stable string identifying the full board state, for use as a map key
   */
  key(): string {
    return `${this.cells.join(',')}|${this._score}|${this._numMoves}`;
  }

  /**
   * Slide and merge every line in the given direction.
   *
   * Never spawns a tile and never counts a move; merges add to the score.
   *
   * @returns whether any cell changed
   */
  shift(move: Move): boolean {
    const lines = isVertical(move) ? COLUMN_LINES : ROW_LINES;
    const towardStart = slidesTowardStart(move);
    let changed = false;

    for (const line of lines) {
      const merged = mergeLine(condenseLine(line.map((i) => this.cellAt(i))));
      const next = padLine(merged.values, towardStart);
      this._score += merged.gained;

      line.forEach((index, k) => {
        const value = next[k] ?? 0;
        if (this.cellAt(index) !== value) {
          changed = true;
          this.cells[index] = value;
        }
      });
    }

    return changed;
  }

  /**
   * Apply a move to the game.
   *
   * A move that changes nothing is a no-op: no spawn, no move counted.
   * Otherwise one tile is spawned and the move counter advances.
   *
   * @returns whether the move changed the board
   */
  makeMove(move: Move, random: RandomSource = sharedRandom()): boolean {
    if (!this.shift(move)) {
      return false;
    }
    this.spawnTile(random);
    this._numMoves += 1;
    return true;
  }

  /**
   * Moves that would change the board right now, in declaration order
   */
  availableMoves(): Move[] {
    return MOVES.filter((move) => this.clone().shift(move));
  }

  /**
   * Place a 2 (90%) or a 4 (10%) on a uniformly chosen empty cell
   *
   * @returns the placed tile, or null when the board is full
   */
  spawnTile(random: RandomSource): SpawnedTile | null {
    const empty = this.emptyCells();
    if (empty.length === 0) {
      return null;
    }
    const index = empty[random.nextInt(empty.length)]!;
    const exponent = random.nextFloat() < 1 - SPAWN_FOUR_PROBABILITY ? 1 : 2;
    this.cells[index] = exponent;
    return { index, exponent };
  }

  /**
   * Whether no move can change the board: every cell is filled and no
   * row or column has two equal neighbours
   */
  gameOver(): boolean {
    if (this.cells.includes(0)) {
      return false;
    }
    for (const line of [...ROW_LINES, ...COLUMN_LINES]) {
      if (hasAdjacentPair(line.map((i) => this.cellAt(i)))) {
        return false;
      }
    }
    return true;
  }

  private cellAt(index: number): number {
    return this.cells[index] ?? 0;
  }

  private static indexOf(x: number, y: number): number {
    const inRange = (v: number): boolean => Number.isInteger(v) && v >= 0 && v < BOARD_SIZE;
    if (!inRange(x) || !inRange(y)) {
      throw new TileCoordinateError(x, y);
    }
    return x + y * BOARD_SIZE;
  }
}
