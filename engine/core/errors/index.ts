/**
 * Sheetgrid Engine - Error Exports
 */

export {
  MatrixError,
  IndexOutOfRangeError,
  DataTypeMismatchError,
  EmptyContentError,
  FeatureRemovedError,
  CellReferenceError,
  isMatrixError,
  MESSAGE_INDEX_OUT_OF_RANGE,
  MESSAGE_DATA_TYPE_MISMATCH,
  MESSAGE_EMPTY_CONTENT,
  MESSAGE_IMPLEMENTATION_REMOVED,
  MESSAGE_DEPRECATED_ROW_COLUMN,
} from './MatrixError.js';
export type { MatrixErrorCode } from './MatrixError.js';
