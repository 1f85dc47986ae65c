/**
 * Sheetgrid Engine
 *
 * In-memory rectangular data grid for spreadsheet manipulation:
 * - Jagged input padded to a rectangle, kept rectangular after every edit
 * - Cell, row, column and A1-label addressing
 * - Insert, delete, cut, paste, transpose, filter and bulk transforms
 * - Row-major and column-major iteration in both directions
 *
 * @example
 * ```typescript
 * import { Matrix, asText } from 'sheetgrid';
 *
 * const matrix = new Matrix([
 *   [1, 2, 3],
 *   [4],
 * ]);
 *
 * matrix.get('C2');            // ''
 * matrix.set('E1', 'total');   // grows to 2 x 5
 * matrix.format(asText);
 * ```
 */

export * from './core/index.js';
