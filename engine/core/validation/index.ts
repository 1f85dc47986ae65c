/**
 * Sheetgrid Engine - Validation Module Exports
 */

export {
  cellInputSchema,
  lineSchema,
  linesSchema,
  indicesSchema,
  cellRefSchema,
  parseLines,
  parseLine,
  parseGrid,
  parseIndices,
  parseCorner,
} from './GridSchemas.js';
export type { LinesInput } from './GridSchemas.js';
