/**
 * Fluent builder for Board test data
 */

import { BOARD_SIZE, Board } from '@tilewise/core';

/**
 * Builder for boards with chosen tiles and counters
 */
export class BoardBuilder {
  private readonly cells: number[] = new Array<number>(BOARD_SIZE * BOARD_SIZE).fill(0);
  private _score = 0;
  private _numMoves = 0;

  /**
   * Set one tile (x = column, y = row)
   */
  tile(x: number, y: number, exponent: number): this {
    this.cells[x + y * BOARD_SIZE] = exponent;
    return this;
  }

  /**
   * Set a whole row, left to right
   */
  row(y: number, exponents: readonly number[]): this {
    exponents.forEach((exponent, x) => this.tile(x, y, exponent));
    return this;
  }

  /**
   * Set a whole column, top to bottom
   */
  column(x: number, exponents: readonly number[]): this {
    exponents.forEach((exponent, y) => this.tile(x, y, exponent));
    return this;
  }

  /**
   * Set every row at once
   */
  rows(rows: readonly (readonly number[])[]): this {
    rows.forEach((exponents, y) => this.row(y, exponents));
    return this;
  }

  score(score: number): this {
    this._score = score;
    return this;
  }

  numMoves(numMoves: number): this {
    this._numMoves = numMoves;
    return this;
  }

  build(): Board {
    return Board.fromCells(this.cells, { score: this._score, numMoves: this._numMoves });
  }
}

/**
 * Build a board from four rows of exponents
 */
export function boardFromRows(rows: readonly (readonly number[])[]): Board {
  return new BoardBuilder().rows(rows).build();
}

/**
 * A full board on which no move changes anything
 */
export function terminalBoard(): Board {
  return boardFromRows([
    [1, 2, 1, 2],
    [2, 1, 2, 1],
    [1, 2, 1, 2],
    [2, 1, 2, 1],
  ]);
}
