/**
 * Sheetgrid Engine - Row Accessor
 *
 * `matrix.row` view. Holds no data: every call is translated into a row
 * operation on the owning matrix.
 */

import type { CellInput, Grid, LineSlice, Row } from '../types/index.js';
import type { LinesArgument, Matrix } from './Matrix.js';
import { complementIndices, isIndexList, resolveIndex, sliceIndices } from './LineSlice.js';

export class RowAccessor {
  private matrix: Matrix;

  constructor(matrix: Matrix) {
    this.matrix = matrix;
  }

  get size(): number {
    return this.matrix.numberOfRows();
  }

  /** Copy of one row; negative indices count from the bottom */
  get(index: number): Row {
    return this.matrix.rowAt(resolveIndex(index, this.size));
  }

  /** Copies of the rows a slice addresses */
  getSlice(slice: LineSlice): Grid {
    return sliceIndices(slice, this.size).map((index) => this.matrix.rowAt(index));
  }

  set(index: number, row: ReadonlyArray<CellInput>): void {
    this.matrix.setRowAt(resolveIndex(index, this.size), row);
  }

  /** Write the same row to every index the slice addresses */
  setSlice(slice: LineSlice, row: ReadonlyArray<CellInput>): void {
    for (const index of sliceIndices(slice, this.size)) {
      this.matrix.setRowAt(index, row);
    }
  }

  delete(selector: number | readonly number[] | LineSlice): void {
    this.matrix.deleteRows(this.toIndices(selector));
  }

  /** Keep only the given rows */
  select(indices: readonly number[]): void {
    this.matrix.deleteRows(complementIndices(indices, this.size));
  }

  append(rows: LinesArgument): void {
    this.matrix.extendRows(rows);
  }

  private toIndices(selector: number | readonly number[] | LineSlice): number[] {
    if (typeof selector === 'number') {
      return [resolveIndex(selector, this.size)];
    }
    if (isIndexList(selector)) {
      return selector.map((index) => resolveIndex(index, this.size));
    }
    return sliceIndices(selector, this.size);
  }
}
