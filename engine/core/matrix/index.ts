/**
 * Sheetgrid Engine - Matrix Module Exports
 */

export { Matrix, REMOVED_FEATURES } from './Matrix.js';
export type {
  MatrixConfig,
  MatrixLogger,
  PasteContent,
  FilterOptions,
  LinesArgument,
  RemovedFeature,
} from './Matrix.js';
export { RowAccessor } from './RowAccessor.js';
export { ColumnAccessor } from './ColumnAccessor.js';
export { resolveIndex, sliceIndices, complementIndices } from './LineSlice.js';
