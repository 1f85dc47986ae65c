/**
 * Sheetgrid Engine - Cell Formatters
 *
 * Value coercions applied cell by cell through `Matrix.format()`. Blank cells
 * are never handed to a formatter, so `asFloat` and friends do not have to
 * special-case them.
 */

import { BLANK, CellMapper, CellValue } from '../types/index.js';

export type CellFormatter = (value: CellValue) => CellValue;

const TRUE_WORDS = new Set(['true', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'no', '0']);

/**
 * Apply `formatter` to `value` unless it is the blank cell.
 */
export function toFormat(formatter: CellFormatter, value: CellValue): CellValue {
  if (value === BLANK) {
    return BLANK;
  }
  return formatter(value);
}

/**
 * Wrap a formatter into a mapper that leaves blank cells alone.
 */
export function createFormatMapper(formatter: CellFormatter): CellMapper {
  return (value) => toFormat(formatter, value);
}

// =============================================================================
// Stock formatters
// =============================================================================

export function asText(value: CellValue): CellValue {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * Numeric coercion. Strings that do not read as a finite number are
 * returned unchanged.
 */
export function asFloat(value: CellValue): CellValue {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return value;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : value;
  }
  return value;
}

/** Like {@link asFloat}, truncating toward zero */
export function asInteger(value: CellValue): CellValue {
  const numeric = asFloat(value);
  return typeof numeric === 'number' ? Math.trunc(numeric) : numeric;
}

export function asBoolean(value: CellValue): CellValue {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return value;
}
