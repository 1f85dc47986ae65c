/**
 * Sheetgrid Engine - A1 Cell Labels
 *
 * Converts spreadsheet-style labels ("B3", "$AA$10") to zero-based
 * coordinates and back.
 */

import type { CellRef } from '../types/index.js';
import { CellReferenceError } from '../errors/index.js';

const CELL_LABEL = /^\$?([A-Z]+)\$?(\d+)$/i;

/**
 * Convert column letters to a 0-based index: A→0, Z→25, AA→26
 */
export function columnLetterToIndex(letters: string): number {
  const upper = letters.toUpperCase();
  let col = 0;
  for (let i = 0; i < upper.length; i++) {
    col = col * 26 + (upper.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * Convert a 0-based column index to letters: 0→A, 25→Z, 26→AA
 */
export function columnIndexToLetter(index: number): string {
  let letters = '';
  let c = index + 1;

  while (c > 0) {
    const remainder = (c - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    c = Math.floor((c - 1) / 26);
  }

  return letters;
}

/**
 * Parse a label like "B3" into `{ row: 2, col: 1 }`.
 *
 * @throws CellReferenceError for anything that is not a column/row label
 */
export function parseCellLabel(label: string): CellRef {
  const match = label.trim().match(CELL_LABEL);
  if (!match) {
    throw new CellReferenceError(label);
  }

  const rowNumber = parseInt(match[2], 10);
  if (isNaN(rowNumber) || rowNumber < 1) {
    throw new CellReferenceError(label);
  }

  return { row: rowNumber - 1, col: columnLetterToIndex(match[1]) };
}

/**
 * Build a label from coordinates: (0, 0) → "A1"
 */
export function cellLabel(row: number, col: number): string {
  return `${columnIndexToLetter(col)}${row + 1}`;
}
