/**
 * Sheetgrid Engine - Grid Geometry
 *
 * Pure helpers over row-major arrays of arrays. `uniform` is the single
 * normalizer the matrix runs after every structural edit.
 */

import {
  BLANK,
  CellInput,
  CellValue,
  Grid,
  GridInput,
  Row,
} from '../types/index.js';

export interface UniformResult {
  /** Length of the longest row, which every row now has */
  width: number;
  /** The array passed in, padded in place */
  array: Grid;
}

/**
 * Length of the longest row, or 0 for an empty array.
 */
export function longestRowNumber(array: ReadonlyArray<ReadonlyArray<unknown>>): number {
  let longest = 0;
  for (const row of array) {
    if (row.length > longest) longest = row.length;
  }
  return longest;
}

/**
 * Replace blank inputs and right-pad every row to `width`, in place. Once it
 * returns, no cell is `null` or `undefined`.
 */
function fillInPlace(array: GridInput, width: number): asserts array is Grid {
  for (const row of array) {
    for (let index = 0; index < row.length; index++) {
      if (row[index] === null || row[index] === undefined) {
        row[index] = BLANK;
      }
    }
    for (let index = row.length; index < width; index++) {
      row.push(BLANK);
    }
  }
}

/**
 * Make the array M x N: blank cells become {@link BLANK} and short rows are
 * right-padded with it up to the longest row.
 *
 * Works in place: the returned `array` is the array passed in.
 *
 * @example
 * uniform([[1, 2, 3], [4]]);
 * // => { width: 3, array: [[1, 2, 3], [4, '', '']] }
 */
export function uniform(array: GridInput): UniformResult {
  const width = longestRowNumber(array);
  fillInPlace(array, width);
  return { width, array };
}

/**
 * First column becomes first row. Ragged input is padded with
 * {@link BLANK} rather than rejected:
 *
 * ```
 * 1 2 3       1  4
 * 4 5 6 7 ->  2  5
 *             3  6
 *             '' 7
 * ```
 */
export function transpose(array: ReadonlyArray<ReadonlyArray<CellInput>>): Grid {
  const maxLength = longestRowNumber(array);
  const result: Grid = [];

  for (let index = 0; index < maxLength; index++) {
    const line: Row = [];
    for (const row of array) {
      const cell = index < row.length ? row[index] : BLANK;
      line.push(cell === null || cell === undefined ? BLANK : cell);
    }
    result.push(line);
  }

  return result;
}

/**
 * A row of `count` blank cells.
 */
export function blankLine(count: number): Row {
  return new Array<string>(Math.max(0, count)).fill(BLANK);
}

/**
 * Fresh row with blank inputs replaced by {@link BLANK}.
 */
export function fillBlanks(line: ReadonlyArray<CellInput>): Row {
  return line.map((cell) => cell ?? BLANK);
}

/**
 * Independent copy of a stored line. Dates are cloned so the copy shares
 * nothing mutable with the store.
 */
export function copyLine(line: ReadonlyArray<CellValue>): Row {
  return line.map((cell) => (cell instanceof Date ? new Date(cell.getTime()) : cell));
}

/**
 * De-duplicate while keeping first-seen order.
 */
export function unique<T>(values: readonly T[]): T[] {
  const seen = new Set<T>();
  const result: T[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}
