/**
 * Sheetgrid Engine - Error Classes
 *
 * Every failure raised by the grid is a caller-contract violation and is
 * reported synchronously. The `code` field tells the kinds apart without
 * relying on `instanceof` across module copies.
 */

export type MatrixErrorCode =
  | 'INDEX_OUT_OF_RANGE'
  | 'DATA_TYPE_MISMATCH'
  | 'EMPTY_CONTENT'
  | 'NOT_IMPLEMENTED'
  | 'INVALID_REFERENCE';

export const MESSAGE_INDEX_OUT_OF_RANGE = 'Index out of range';
export const MESSAGE_DATA_TYPE_MISMATCH = 'Data type mismatch';
export const MESSAGE_EMPTY_CONTENT = 'Nothing to paste: supply either rows or columns';
export const MESSAGE_IMPLEMENTATION_REMOVED = 'Implementation removed: ';
export const MESSAGE_DEPRECATED_ROW_COLUMN =
  'Deprecated usage. Please use [row, column] or an A1 label instead of a bare row index';

export class MatrixError extends Error {
  code: MatrixErrorCode;

  constructor(code: MatrixErrorCode, message: string) {
    super(message);
    this.name = 'MatrixError';
    this.code = code;
  }
}

/**
 * Thrown when a read or a strict structural write addresses a cell, row or
 * column outside the grid.
 */
export class IndexOutOfRangeError extends MatrixError {
  constructor(message: string = MESSAGE_INDEX_OUT_OF_RANGE) {
    super('INDEX_OUT_OF_RANGE', message);
    this.name = 'IndexOutOfRangeError';
  }
}

export class DataTypeMismatchError extends MatrixError {
  constructor(message: string = MESSAGE_DATA_TYPE_MISMATCH) {
    super('DATA_TYPE_MISMATCH', message);
    this.name = 'DataTypeMismatchError';
  }
}

export class EmptyContentError extends MatrixError {
  constructor(message: string = MESSAGE_EMPTY_CONTENT) {
    super('EMPTY_CONTENT', message);
    this.name = 'EmptyContentError';
  }
}

/**
 * Thrown by every entry point of the removed lazy filter/formatter lifecycle.
 */
export class FeatureRemovedError extends MatrixError {
  feature: string;

  constructor(feature: string, hint: string = '') {
    super('NOT_IMPLEMENTED', `${MESSAGE_IMPLEMENTATION_REMOVED}${feature}() is no longer available. ${hint}`.trim());
    this.name = 'FeatureRemovedError';
    this.feature = feature;
  }
}

export class CellReferenceError extends MatrixError {
  reference: string;

  constructor(reference: string) {
    super('INVALID_REFERENCE', `Invalid cell reference: ${reference}`);
    this.name = 'CellReferenceError';
    this.reference = reference;
  }
}

export function isMatrixError(value: unknown): value is MatrixError {
  return value instanceof MatrixError;
}
