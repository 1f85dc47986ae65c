/**
 * Sheetgrid Engine - Input Shape Validation
 *
 * Structural edits accept loosely shaped input (one line or many lines,
 * index lists). These schemas decide the shape up front so that a bad
 * argument is rejected before the store is touched.
 */

import { z } from 'zod';
import type { CellInput, CellRef } from '../types/index.js';
import {
  DataTypeMismatchError,
  IndexOutOfRangeError,
} from '../errors/index.js';

export const cellInputSchema = z.union([
  z.string(),
  z.number(),
  z.nan(),
  z.boolean(),
  z.date(),
  z.null(),
  z.undefined(),
]);

export const lineSchema = z.array(cellInputSchema);

export const linesSchema = z.array(lineSchema);

export const indicesSchema = z.array(z.number().int());

export const cellRefSchema = z.object({
  row: z.number().int().min(0),
  col: z.number().int().min(0),
});

/**
 * Either a single row/column or a list of them. Parsed lines are fresh
 * arrays, so callers keep no alias into the store.
 */
export type LinesInput =
  | { kind: 'line'; line: CellInput[] }
  | { kind: 'lines'; lines: CellInput[][] };

/**
 * Classify `value` as one line or many. An array whose members are all
 * arrays (including the empty array) is a list of lines; any other array is
 * a single line.
 *
 * @throws DataTypeMismatchError when `value` is not an array or holds
 *   something other than cell values
 */
export function parseLines(value: unknown): LinesInput {
  if (!Array.isArray(value)) {
    throw new DataTypeMismatchError(`Cannot use ${describe(value)} as row or column data`);
  }

  if (value.every((member) => Array.isArray(member))) {
    const parsed = linesSchema.safeParse(value);
    if (!parsed.success) {
      throw new DataTypeMismatchError(formatIssue(parsed.error));
    }
    return { kind: 'lines', lines: parsed.data };
  }

  const parsed = lineSchema.safeParse(value);
  if (!parsed.success) {
    throw new DataTypeMismatchError(formatIssue(parsed.error));
  }
  return { kind: 'line', line: parsed.data };
}

/**
 * Parse exactly one row or column.
 */
export function parseLine(value: unknown): CellInput[] {
  const parsed = lineSchema.safeParse(value);
  if (!parsed.success) {
    throw new DataTypeMismatchError(formatIssue(parsed.error));
  }
  return parsed.data;
}

/**
 * Parse a list of lines (rows or columns, depending on the caller).
 */
export function parseGrid(value: unknown): CellInput[][] {
  const parsed = linesSchema.safeParse(value);
  if (!parsed.success) {
    throw new DataTypeMismatchError(formatIssue(parsed.error));
  }
  return parsed.data;
}

/**
 * Parse a list of row or column indices.
 *
 * @param onNonArray - which error a non-array argument raises; row deletion
 *   reports it as an index error, column deletion as a type error
 */
export function parseIndices(
  value: unknown,
  onNonArray: 'index' | 'type'
): number[] {
  if (!Array.isArray(value)) {
    const message = `Cannot use ${describe(value)} as a list of indices`;
    throw onNonArray === 'index'
      ? new IndexOutOfRangeError(message)
      : new DataTypeMismatchError(message);
  }

  const parsed = indicesSchema.safeParse(value);
  if (!parsed.success) {
    throw new DataTypeMismatchError(formatIssue(parsed.error));
  }
  return parsed.data;
}

/**
 * Check that a corner has non-negative integer coordinates.
 */
export function parseCorner(value: unknown): CellRef {
  const parsed = cellRefSchema.safeParse(value);
  if (!parsed.success) {
    throw new IndexOutOfRangeError(`Invalid corner: ${formatIssue(parsed.error)}`);
  }
  return parsed.data;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Data type mismatch';
  const path = issue.path.length > 0 ? ` at [${issue.path.join('][')}]` : '';
  return `Data type mismatch${path}: ${issue.message}`;
}
