/**
 * Sheetgrid Engine - Geometry Module Exports
 */

export {
  longestRowNumber,
  uniform,
  transpose,
  unique,
  blankLine,
  fillBlanks,
  copyLine,
} from './GridGeometry.js';
export type { UniformResult } from './GridGeometry.js';
