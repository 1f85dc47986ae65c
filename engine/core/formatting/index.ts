/**
 * Sheetgrid Engine - Formatting Module Exports
 */

export {
  toFormat,
  createFormatMapper,
  asText,
  asFloat,
  asInteger,
  asBoolean,
} from './CellFormatters.js';
export type { CellFormatter } from './CellFormatters.js';
