/**
 * Sheetgrid Engine - Column Accessor
 *
 * `matrix.column` view. Holds no data: every call is translated into a column
 * operation on the owning matrix.
 */

import type { CellInput, Grid, LineSlice, Row } from '../types/index.js';
import type { LinesArgument, Matrix } from './Matrix.js';
import { complementIndices, isIndexList, resolveIndex, sliceIndices } from './LineSlice.js';

export class ColumnAccessor {
  private matrix: Matrix;

  constructor(matrix: Matrix) {
    this.matrix = matrix;
  }

  get size(): number {
    return this.matrix.numberOfColumns();
  }

  /** Copy of one column; negative indices count from the right */
  get(index: number): Row {
    return this.matrix.columnAt(resolveIndex(index, this.size));
  }

  /** Copies of the columns a slice addresses */
  getSlice(slice: LineSlice): Grid {
    return sliceIndices(slice, this.size).map((index) => this.matrix.columnAt(index));
  }

  set(index: number, column: ReadonlyArray<CellInput>): void {
    this.matrix.setColumnAt(resolveIndex(index, this.size), column);
  }

  /** Write the same column to every index the slice addresses */
  setSlice(slice: LineSlice, column: ReadonlyArray<CellInput>): void {
    for (const index of sliceIndices(slice, this.size)) {
      this.matrix.setColumnAt(index, column);
    }
  }

  delete(selector: number | readonly number[] | LineSlice): void {
    this.matrix.deleteColumns(this.toIndices(selector));
  }

  /** Keep only the given columns */
  select(indices: readonly number[]): void {
    this.matrix.deleteColumns(complementIndices(indices, this.size));
  }

  append(columns: LinesArgument): void {
    this.matrix.extendColumns(columns);
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
