/**
 * Sheetgrid Engine - Reference Module Exports
 */

export {
  parseCellLabel,
  cellLabel,
  columnLetterToIndex,
  columnIndexToLetter,
} from './CellReference.js';
