/**
 * Sheetgrid Engine - Matrix
 *
 * Dense, row-major, rectangular table of cell values. Input may be jagged;
 * it is padded to the longest row on construction and re-padded after every
 * structural edit, so every row always has `numberOfColumns()` cells.
 *
 * Copy discipline:
 * - The constructor does not copy its input. The array handed in becomes
 *   the store and is padded in place.
 * - `rowAt`, `columnAt`, `region` and `cut` return independent copies.
 * - `toArray` / `getInternalArray` and the `rows()` iterators expose the
 *   live store for serializers. Every edit except `transpose()` mutates it
 *   in place.
 *
 * Addressing is asymmetric: reading outside the grid throws, while writing a
 * single cell outside the grid grows it (see {@link Matrix.cellValue}).
 */

import {
  BLANK,
  CellInput,
  CellMapper,
  CellRef,
  CellValue,
  DEFAULT_SHEET_NAME,
  Grid,
  GridInput,
  Row,
  RowPredicate,
} from '../types/index.js';
import {
  IndexOutOfRangeError,
  EmptyContentError,
  FeatureRemovedError,
  MESSAGE_DEPRECATED_ROW_COLUMN,
} from '../errors/index.js';
import {
  blankLine,
  copyLine,
  fillBlanks,
  longestRowNumber,
  transpose,
  uniform,
  unique,
} from '../geometry/index.js';
import {
  parseCorner,
  parseGrid,
  parseIndices,
  parseLine,
  parseLines,
} from '../validation/index.js';
import { parseCellLabel } from '../reference/index.js';
import { CellFormatter, createFormatMapper } from '../formatting/CellFormatters.js';
import { RowAccessor } from './RowAccessor.js';
import { ColumnAccessor } from './ColumnAccessor.js';

export interface MatrixLogger {
  warn(message: string): void;
}

export interface MatrixConfig {
  /** Sheet name, used when matrices are combined into a book */
  name?: string;
  /** Receives deprecation notices */
  logger?: MatrixLogger;
}

/**
 * Content for {@link Matrix.paste}: a block given either row by row or
 * column by column.
 */
export type PasteContent =
  | { rows: GridInput; columns?: undefined }
  | { columns: GridInput; rows?: undefined };

export interface FilterOptions {
  rowIndices?: number[];
  columnIndices?: number[];
}

/** One line, or a list of lines */
export type LinesArgument = ReadonlyArray<CellInput> | ReadonlyArray<ReadonlyArray<CellInput>>;

/**
 * Entry points of the lazy filter/formatter pipeline, which no longer exists.
 */
export const REMOVED_FEATURES = [
  'addFilter',
  'removeFilter',
  'clearFilters',
  'validateFilters',
  'freezeFilters',
  'applyFormatter',
  'addFormatter',
  'removeFormatter',
  'clearFormatters',
  'freezeFormatters',
] as const;

export type RemovedFeature = (typeof REMOVED_FEATURES)[number];

function isIndexIn(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

function isCoordinate(index: number): boolean {
  return Number.isInteger(index) && index >= 0;
}

function appendCells(target: Row, cells: ReadonlyArray<CellInput>): void {
  for (const cell of cells) {
    target.push(cell ?? BLANK);
  }
}

export class Matrix implements Iterable<Row> {
  /** Bracket-style access to whole rows */
  readonly row: RowAccessor;

  /** Bracket-style access to whole columns */
  readonly column: ColumnAccessor;

  private width: number;
  private array: Grid;
  private config: Required<MatrixConfig>;

  /**
   * @param array - jagged rows; `null` / `undefined` cells become blank.
   *   The array is adopted, not copied.
   */
  constructor(array: GridInput = [], config: MatrixConfig = {}) {
    this.config = {
      name: config.name ?? DEFAULT_SHEET_NAME,
      logger: config.logger ?? console,
    };

    const normalized = uniform(array);
    this.width = normalized.width;
    this.array = normalized.array;

    this.row = new RowAccessor(this);
    this.column = new ColumnAccessor(this);
  }

  get name(): string {
    return this.config.name;
  }

  set name(name: string) {
    this.config.name = name;
  }

  // ===========================================================================
  // Dimensions
  // ===========================================================================

  numberOfRows(): number {
    return this.array.length;
  }

  numberOfColumns(): number {
    return this.numberOfRows() > 0 ? this.width : 0;
  }

  /** Row indices `[0, numberOfRows())` */
  rowRange(): number[] {
    return Array.from({ length: this.numberOfRows() }, (_, index) => index);
  }

  /** Column indices `[0, numberOfColumns())` */
  columnRange(): number[] {
    return Array.from({ length: this.numberOfColumns() }, (_, index) => index);
  }

  // ===========================================================================
  // Cell Access
  // ===========================================================================

  /**
   * Read a cell.
   * @throws IndexOutOfRangeError when either index is outside the grid
   */
  cellValue(row: number, column: number): CellValue;
  /**
   * Write a cell. Writing outside the grid grows it: missing rows are added
   * and rows are widened with blanks so the value lands at `(row, column)`.
   */
  cellValue(row: number, column: number, newValue: CellValue): void;
  cellValue(row: number, column: number, newValue?: CellValue | null): CellValue | undefined {
    const inRange = isIndexIn(row, this.numberOfRows()) && isIndexIn(column, this.numberOfColumns());

    if (newValue === undefined || newValue === null) {
      if (!inRange) {
        throw new IndexOutOfRangeError(`Cell (${row}, ${column}) is out of range`);
      }
      return this.array[row][column];
    }

    if (inRange) {
      this.array[row][column] = newValue;
    } else {
      if (!isCoordinate(row) || !isCoordinate(column)) {
        throw new IndexOutOfRangeError(`Cell (${row}, ${column}) is out of range`);
      }
      this.paste({ row, col: column }, { rows: [[newValue]] });
    }
    return undefined;
  }

  /**
   * Read a cell by `(row, column)` or by an A1 label such as `"B3"`.
   */
  get(row: number, column: number): CellValue;
  get(label: string): CellValue;
  /**
   * @deprecated Use `rowAt(index)` or `row.get(index)`
   */
  get(index: number): Row;
  get(address: number | string, column?: number): CellValue | Row {
    if (typeof address === 'string') {
      const ref = parseCellLabel(address);
      return this.cellValue(ref.row, ref.col);
    }
    if (column === undefined) {
      this.config.logger.warn(MESSAGE_DEPRECATED_ROW_COLUMN);
      return this.rowAt(address);
    }
    return this.cellValue(address, column);
  }

  /**
   * Write a cell by `(row, column)` or by an A1 label. Grows the grid like
   * {@link Matrix.cellValue}.
   */
  set(row: number, column: number, value: CellValue): void;
  set(label: string, value: CellValue): void;
  set(address: number | string, columnOrValue: CellValue, value?: CellValue): void {
    if (typeof address === 'string') {
      const ref = parseCellLabel(address);
      this.cellValue(ref.row, ref.col, columnOrValue);
      return;
    }
    if (typeof columnOrValue !== 'number' || value === undefined) {
      throw new IndexOutOfRangeError('set() takes a row, a column and a value, or a label and a value');
    }
    this.cellValue(address, columnOrValue, value);
  }

  // ===========================================================================
  // Row / Column Access
  // ===========================================================================

  /**
   * Copy of the row at `index`.
   */
  rowAt(index: number): Row {
    if (!isIndexIn(index, this.numberOfRows())) {
      throw new IndexOutOfRangeError(`Row ${index} is out of range`);
    }
    return copyLine(this.array[index]);
  }

  /**
   * Copy of the column at `index`, top to bottom.
   */
  columnAt(index: number): Row {
    if (!isIndexIn(index, this.numberOfColumns())) {
      throw new IndexOutOfRangeError(`Column ${index} is out of range`);
    }
    return copyLine(this.array.map((row) => row[index]));
  }

  /**
   * Replace the row at `index`. A row of a different length re-pads the
   * whole grid. Never grows the row count.
   */
  setRowAt(index: number, data: ReadonlyArray<CellInput>): void {
    const line = parseLine(data);
    if (!isIndexIn(index, this.numberOfRows())) {
      throw new IndexOutOfRangeError(`Row ${index} is out of range`);
    }

    this.array[index] = fillBlanks(line);
    if (line.length !== this.numberOfColumns()) {
      this.normalize();
    }
  }

  /**
   * Update column `index` from row `starting` downward. Values past the last
   * row append new rows, blank up to the column.
   *
   * ```
   * setColumnAt(2, ['N', 'N', 'N'], 1)
   *
   *     A B C
   *     1 3 N  <- starting = 1
   *     2 4 N
   *         N  <- appended
   * ```
   */
  setColumnAt(index: number, data: ReadonlyArray<CellInput>, starting: number = 0): void {
    const line = parseLine(data);
    if (!isIndexIn(index, this.numberOfColumns()) || !isIndexIn(starting, this.numberOfRows())) {
      throw new IndexOutOfRangeError(`Column ${index} from row ${starting} is out of range`);
    }
    this.writeColumn(index, line, starting);
  }

  // ===========================================================================
  // Structural Edits
  // ===========================================================================

  /**
   * Append one row, or many rows, below the last row. Rows are copied.
   */
  extendRows(rows: LinesArgument): void {
    const incoming = parseLines(rows);
    const lines = incoming.kind === 'line' ? [incoming.line] : incoming.lines;

    for (const line of lines) {
      this.array.push(fillBlanks(line));
    }
    this.normalize();
  }

  /**
   * Delete rows by index. Duplicates are dropped and indices outside the
   * grid are ignored.
   */
  deleteRows(indices: readonly number[]): void {
    this.removeRows(parseIndices(indices, 'index'));
  }

  /**
   * Append one column, or many columns, right of the last column.
   */
  extendColumns(columns: LinesArgument): void {
    const incoming = parseLines(columns);
    const lines = incoming.kind === 'line' ? [incoming.line] : incoming.lines;
    this.mergeRowsOnRight(transpose(lines));
  }

  /**
   * Append already row-major data on the right edge:
   *
   * ```
   * 1          1 11 11
   * 2    +  -> 2 22 22
   * 3          3
   *   11 11
   *   22 22
   * ```
   *
   * Surplus incoming rows become new rows, blank up to the old width.
   */
  extendColumnsWithRows(rows: GridInput): void {
    this.mergeRowsOnRight(parseGrid(rows));
  }

  /**
   * Delete columns by index. Duplicates are dropped and indices outside the
   * grid are ignored.
   */
  deleteColumns(indices: readonly number[]): void {
    this.removeColumns(parseIndices(indices, 'type'));
  }

  /**
   * Copy of the half-open block `[topLeft, bottomRight)`.
   * @throws IndexOutOfRangeError if the block reaches outside the grid
   */
  region(topLeft: CellRef, bottomRight: CellRef): Grid {
    const result: Grid = [];
    for (let row = topLeft.row; row < bottomRight.row; row++) {
      const line: Row = [];
      for (let column = topLeft.col; column < bottomRight.col; column++) {
        line.push(this.cellValue(row, column));
      }
      result.push(copyLine(line));
    }
    return result;
  }

  /**
   * Like {@link Matrix.region}, then blanks the block in place.
   */
  cut(topLeft: CellRef, bottomRight: CellRef): Grid {
    const result = this.region(topLeft, bottomRight);
    for (let row = topLeft.row; row < bottomRight.row; row++) {
      for (let column = topLeft.col; column < bottomRight.col; column++) {
        this.array[row][column] = BLANK;
      }
    }
    return result;
  }

  /**
   * Paste a block with its top-left corner at `topLeft`, growing the grid
   * as needed.
   *
   * Rows: when `topLeft.row` is past the last row, fully blank rows are
   * added first. Each incoming row then either merges into the existing row
   * from `topLeft.col` (widening it if it runs past the right edge) or is
   * appended as a new row, blank up to `topLeft.col`.
   *
   * Columns: the same policy along the other axis.
   *
   * `null` / `undefined` cells in the block leave the target cell as it is.
   *
   * @example
   * ```typescript
   * // 5 x 7 grid
   * const block = matrix.cut({ row: 1, col: 1 }, { row: 4, col: 5 });
   * matrix.paste({ row: 4, col: 6 }, { rows: block });
   * // now 7 rows x 10 columns
   * ```
   *
   * @throws EmptyContentError unless exactly one of rows / columns is given
   *   and non-empty
   */
  paste(topLeft: CellRef, content: PasteContent): void {
    const corner = parseCorner(topLeft);
    const hasRows = Array.isArray(content.rows) && content.rows.length > 0;
    const hasColumns = Array.isArray(content.columns) && content.columns.length > 0;

    if (hasRows && hasColumns) {
      throw new EmptyContentError('Supply either rows or columns, not both');
    }

    if (hasRows) {
      this.pasteRows(corner, parseGrid(content.rows));
    } else if (hasColumns) {
      this.pasteColumns(corner, parseGrid(content.columns));
    } else {
      throw new EmptyContentError();
    }
  }

  /**
   * Swap rows and columns. Ragged data is padded rather than rejected.
   * Replaces the store, so arrays taken from `toArray()` before the call
   * no longer track the matrix.
   */
  transpose(): void {
    this.array = transpose(this.array);
    this.normalize();
  }

  /**
   * Delete rows and columns immediately. Both index lists are checked
   * before anything is removed.
   */
  filter(options: FilterOptions): void {
    const rowIndices =
      options.rowIndices !== undefined ? parseIndices(options.rowIndices, 'index') : null;
    const columnIndices =
      options.columnIndices !== undefined ? parseIndices(options.columnIndices, 'type') : null;

    if (rowIndices) {
      this.removeRows(rowIndices);
    }
    if (columnIndices) {
      this.removeColumns(columnIndices);
    }
  }

  // ===========================================================================
  // Bulk Transform
  // ===========================================================================

  /**
   * Replace every cell, row by row, with `mapper(value)`.
   */
  map(mapper: CellMapper): void {
    for (const row of this.array) {
      for (let column = 0; column < row.length; column++) {
        row[column] = mapper(row[column]);
      }
    }
  }

  /**
   * Apply `formatter` to every non-blank cell.
   *
   * @example
   * ```typescript
   * matrix.format(asText);     // [1, 1.25, ''] -> ['1', '1.25', '']
   * matrix.format(asInteger);  // ['1', '1.25', ''] -> [1, 1, '']
   * ```
   */
  format(formatter: CellFormatter): void {
    this.map(createFormatMapper(formatter));
  }

  /**
   * Whether any row satisfies `predicate`.
   */
  contains(predicate: RowPredicate): boolean {
    for (const row of this.rows()) {
      if (predicate(row)) {
        return true;
      }
    }
    return false;
  }

  // ===========================================================================
  // Iteration
  // ===========================================================================

  [Symbol.iterator](): Iterator<Row> {
    return this.rows();
  }

  /** Top to bottom, yielding the stored rows */
  *rows(): Generator<Row> {
    for (const row of this.array) {
      yield row;
    }
  }

  /** Bottom to top, yielding the stored rows */
  *rrows(): Generator<Row> {
    for (let row = this.array.length - 1; row >= 0; row--) {
      yield this.array[row];
    }
  }

  /** Left to right, each column as a new array */
  *columns(): Generator<Row> {
    const width = this.numberOfColumns();
    for (let column = 0; column < width; column++) {
      yield this.array.map((row) => row[column]);
    }
  }

  /** Right to left, each column top to bottom */
  *rcolumns(): Generator<Row> {
    for (let column = this.numberOfColumns() - 1; column >= 0; column--) {
      yield this.array.map((row) => row[column]);
    }
  }

  /** Cell by cell, top to bottom and left to right */
  *enumerate(): Generator<CellValue> {
    for (const row of this.array) {
      yield* row;
    }
  }

  /** Cell by cell, bottom to top and right to left */
  *reverse(): Generator<CellValue> {
    for (let row = this.array.length - 1; row >= 0; row--) {
      const line = this.array[row];
      for (let column = line.length - 1; column >= 0; column--) {
        yield line[column];
      }
    }
  }

  /** Cell by cell, left to right and top to bottom */
  *vertical(): Generator<CellValue> {
    const width = this.numberOfColumns();
    for (let column = 0; column < width; column++) {
      for (const row of this.array) {
        yield row[column];
      }
    }
  }

  /** Cell by cell, right to left and bottom to top */
  *rvertical(): Generator<CellValue> {
    for (let column = this.numberOfColumns() - 1; column >= 0; column--) {
      for (let row = this.array.length - 1; row >= 0; row--) {
        yield this.array[row][column];
      }
    }
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  /**
   * The live store (not a copy), for writers that serialize the grid.
   */
  toArray(): Grid {
    return this.array;
  }

  /** Same as {@link Matrix.toArray} */
  getInternalArray(): Grid {
    return this.array;
  }

  // ===========================================================================
  // Removed lazy filter / formatter pipeline
  // ===========================================================================

  /** @deprecated Removed. Use `filter()` */
  addFilter(_filter?: unknown): never {
    return this.removed('addFilter', 'Please use filter().');
  }

  /** @deprecated Removed */
  removeFilter(_filter?: unknown): never {
    return this.removed('removeFilter');
  }

  /** @deprecated Removed */
  clearFilters(): never {
    return this.removed('clearFilters');
  }

  /** @deprecated Removed */
  validateFilters(): never {
    return this.removed('validateFilters');
  }

  /** @deprecated Removed */
  freezeFilters(): never {
    return this.removed('freezeFilters');
  }

  /** @deprecated Removed. Use `format()` */
  applyFormatter(_formatter?: unknown): never {
    return this.removed('applyFormatter', 'Please use format().');
  }

  /** @deprecated Removed. Use `format()` */
  addFormatter(_formatter?: unknown): never {
    return this.removed('addFormatter', 'Please use format().');
  }

  /** @deprecated Removed */
  removeFormatter(_formatter?: unknown): never {
    return this.removed('removeFormatter');
  }

  /** @deprecated Removed */
  clearFormatters(): never {
    return this.removed('clearFormatters');
  }

  /** @deprecated Removed */
  freezeFormatters(): never {
    return this.removed('freezeFormatters');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private removed(feature: RemovedFeature, hint?: string): never {
    throw new FeatureRemovedError(feature, hint);
  }

  private normalize(): void {
    this.width = uniform(this.array).width;
  }

  private removeRows(indices: number[]): void {
    if (indices.length === 0) return;

    const descending = unique(indices).sort((a, b) => b - a);
    for (const index of descending) {
      if (isIndexIn(index, this.numberOfRows())) {
        this.array.splice(index, 1);
      }
    }
  }

  private removeColumns(indices: number[]): void {
    if (indices.length === 0) return;

    const descending = unique(indices).sort((a, b) => b - a);
    const width = this.numberOfColumns();
    for (const row of this.array) {
      for (const index of descending) {
        if (isIndexIn(index, width)) {
          row.splice(index, 1);
        }
      }
    }
    this.width = longestRowNumber(this.array);
  }

  /**
   * Write `data` into row `rowIndex` from column `starting`. Cells past the
   * right edge widen the row, and with it the grid.
   *
   * ```
   * setRowSpan(2, ['N', 'N', 'N'], 1)
   *
   *     A B C
   *     1 3 5
   *     2 N N N  <- rowIndex = 2
   *       ^ starting = 1
   * ```
   */
  private setRowSpan(rowIndex: number, data: ReadonlyArray<CellInput>, starting: number): void {
    const rows = this.numberOfRows();
    const columns = this.numberOfColumns();
    if (!isIndexIn(rowIndex, rows) || !isIndexIn(starting, columns)) {
      throw new IndexOutOfRangeError(`Row ${rowIndex} from column ${starting} is out of range`);
    }

    const target = this.array[rowIndex];
    const realLength = data.length + starting;
    const to = Math.min(realLength, columns);
    for (let column = starting; column < to; column++) {
      const value = data[column - starting];
      if (value !== null && value !== undefined) {
        target[column] = value;
      }
    }
    if (realLength > columns) {
      appendCells(target, data.slice(columns - starting));
    }
    this.normalize();
  }

  private writeColumn(columnIndex: number, data: ReadonlyArray<CellInput>, starting: number): void {
    const rows = this.numberOfRows();
    const realLength = data.length + starting;
    const to = Math.min(realLength, rows);

    for (let row = starting; row < to; row++) {
      const value = data[row - starting];
      if (value !== null && value !== undefined) {
        this.array[row][columnIndex] = value;
      }
    }
    for (let row = Math.max(rows, starting); row < realLength; row++) {
      const line = blankLine(columnIndex);
      line.push(data[row - starting] ?? BLANK);
      this.array.push(line);
    }
    this.normalize();
  }

  private mergeRowsOnRight(rows: ReadonlyArray<ReadonlyArray<CellInput>>): void {
    const currentRows = this.numberOfRows();
    const currentColumns = this.numberOfColumns();
    const overlap = Math.min(currentRows, rows.length);

    for (let index = 0; index < overlap; index++) {
      appendCells(this.array[index], rows[index]);
    }
    for (let index = currentRows; index < rows.length; index++) {
      const line = blankLine(currentColumns);
      appendCells(line, rows[index]);
      this.array.push(line);
    }
    this.normalize();
  }

  private appendBlankRows(count: number): void {
    const width = this.numberOfColumns();
    for (let index = 0; index < count; index++) {
      this.array.push(blankLine(width));
    }
  }

  private pasteRows(corner: CellRef, rows: CellInput[][]): void {
    if (corner.row > this.numberOfRows()) {
      this.appendBlankRows(corner.row - this.numberOfRows());
    }

    const numberOfRows = this.numberOfRows();
    rows.forEach((row, index) => {
      const setIndex = corner.row + index;
      if (setIndex >= numberOfRows) {
        const line = blankLine(corner.col);
        appendCells(line, row);
        this.array.push(line);
      } else if (corner.col < this.numberOfColumns()) {
        this.setRowSpan(setIndex, row, corner.col);
      } else {
        // corner lies right of the grid: widen the row up to it first
        const target = this.array[setIndex];
        appendCells(target, blankLine(corner.col - target.length));
        appendCells(target, row);
        this.normalize();
      }
    });
    this.normalize();
  }

  private pasteColumns(corner: CellRef, columns: CellInput[][]): void {
    if (corner.row > this.numberOfRows()) {
      this.appendBlankRows(corner.row - this.numberOfRows());
    }

    columns.forEach((column, index) => {
      const setIndex = corner.col + index;
      const width = this.numberOfColumns();
      if (setIndex < width) {
        this.writeColumn(setIndex, column, corner.row);
      } else {
        const gap: CellInput[][] = Array.from({ length: setIndex - width }, () => []);
        const realColumn: CellInput[] = blankLine(corner.row);
        realColumn.push(...column);
        this.mergeRowsOnRight(transpose([...gap, realColumn]));
      }
    });
    this.normalize();
  }
}
