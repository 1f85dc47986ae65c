/**
 * Sheetgrid Engine - Line Index Helpers
 *
 * Index arithmetic shared by the row and column accessors.
 */

import type { LineSlice } from '../types/index.js';
import { DataTypeMismatchError } from '../errors/index.js';

/**
 * Negative indices count from the end: -1 is the last line. The result is
 * not range-checked; the matrix does that.
 */
export function resolveIndex(index: number, length: number): number {
  return index < 0 ? index + length : index;
}

function clampBound(bound: number, length: number): number {
  if (bound < 0) return Math.max(0, bound + length);
  return Math.min(bound, length);
}

/**
 * Indices addressed by `slice` over `length` lines, in ascending order.
 * Bounds outside the lines are clamped, never rejected.
 */
export function sliceIndices(slice: LineSlice, length: number): number[] {
  const step = slice.step ?? 1;
  const start = slice.start ?? 0;
  const stop = slice.stop ?? length;

  if (!Number.isInteger(step) || step < 1) {
    throw new DataTypeMismatchError(`Slice step must be a positive integer, got ${step}`);
  }
  if (!Number.isInteger(start) || !Number.isInteger(stop)) {
    throw new DataTypeMismatchError('Slice bounds must be integers');
  }

  const indices: number[] = [];
  for (let index = clampBound(start, length); index < clampBound(stop, length); index += step) {
    indices.push(index);
  }
  return indices;
}

export function isIndexList(selector: readonly number[] | LineSlice): selector is readonly number[] {
  return Array.isArray(selector);
}

/**
 * Everything in `[0, length)` that is not in `keep`.
 */
export function complementIndices(keep: readonly number[], length: number): number[] {
  const kept = new Set(keep.map((index) => resolveIndex(index, length)));
  const result: number[] = [];
  for (let index = 0; index < length; index++) {
    if (!kept.has(index)) result.push(index);
  }
  return result;
}
