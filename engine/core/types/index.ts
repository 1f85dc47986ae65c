/**
 * Sheetgrid Engine - Core Type Definitions
 */

// ============================================================================
// Cell Types
// ============================================================================

/**
 * A stored cell value. No schema is enforced beyond being a scalar.
 */
export type CellValue = string | number | boolean | Date;

/**
 * A cell as callers may hand it in. `null` and `undefined` are blank cells
 * and are replaced by {@link BLANK} when the grid is normalized.
 */
export type CellInput = CellValue | null | undefined;

/** One line of normalized cells */
export type Row = CellValue[];

/** Row-major normalized grid: every row has the same length */
export type Grid = Row[];

/** Row-major grid as supplied by callers, possibly jagged and with holes */
export type GridInput = CellInput[][];

/**
 * The blank cell. Used for padding short rows and for clearing cut regions.
 */
export const BLANK = '';

export function isBlank(value: CellInput): boolean {
  return value === BLANK || value === null || value === undefined;
}

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  row: number;
  col: number;
}

/**
 * Half-open slice over rows or columns, following the usual
 * `start <= i < stop` convention. Negative bounds count from the end.
 */
export interface LineSlice {
  start?: number;
  stop?: number;
  step?: number;
}

// ============================================================================
// Callbacks
// ============================================================================

/** Per-cell transform used by `map()` */
export type CellMapper = (value: CellValue) => CellValue;

/** Row test used by `contains()` */
export type RowPredicate = (row: Row) => boolean;

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_SHEET_NAME = 'Sheet';
export const DEFAULT_BOOK_FILENAME = 'memory';
