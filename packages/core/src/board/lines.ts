/**
 * Line operations shared by every move
 *
 * A move works line by line: the four rows for Left/Right and the four
 * columns for Up/Down. Each line is condensed (empties removed), merged in a
 * single left-to-right pass, and padded back to four cells on the side the
 * tiles moved away from.
 */

export const BOARD_SIZE = 4;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

/**
 * Cell indices of each row, left to right
 */
export const ROW_LINES: readonly (readonly number[])[] = [0, 1, 2, 3].map((y) =>
  [0, 1, 2, 3].map((x) => x + y * BOARD_SIZE),
);

/**
 * Cell indices of each column, top to bottom (the transpose of ROW_LINES)
 */
export const COLUMN_LINES: readonly (readonly number[])[] = [0, 1, 2, 3].map((x) =>
  [0, 1, 2, 3].map((y) => x + y * BOARD_SIZE),
);

/**
 * Result of merging one condensed line
 */
export interface MergedLine {
  /** Merged exponents, no longer than the input */
  values: number[];
  /** Score gained by the merges */
  gained: number;
}

/**
 * Remove empty cells, keeping order
 */
export function condenseLine(values: readonly number[]): number[] {
  return values.filter((v) => v !== 0);
}

/**
 * Merge equal neighbours in one pass.
 *
 * A merged tile is not merged again in the same pass, so [1, 1, 1, 1]
 * becomes [2, 2] and [1, 2, 2, 2] becomes [1, 3, 2].
 */
export function mergeLine(condensed: readonly number[]): MergedLine {
  const values: number[] = [];
  let gained = 0;

  for (let i = 0; i < condensed.length; i++) {
    const current = condensed[i]!;
    if (i < condensed.length - 1 && current === condensed[i + 1]) {
      const merged = current + 1;
      values.push(merged);
      gained += 2 ** merged;
      i++;
    } else {
      values.push(current);
    }
  }

  return { values, gained };
}

/**
 * Pad a merged line back to BOARD_SIZE cells.
 * Content goes first when sliding toward the start, last otherwise.
 */
export function padLine(values: readonly number[], towardStart: boolean): number[] {
  const padding = new Array<number>(BOARD_SIZE - values.length).fill(0);
  return towardStart ? [...values, ...padding] : [...padding, ...values];
}

/**
 * Whether a full line has two equal neighbours
 */
export function hasAdjacentPair(values: readonly number[]): boolean {
  for (let i = 0; i < values.length - 1; i++) {
    if (values[i] === values[i + 1]) {
      return true;
    }
  }
  return false;
}
