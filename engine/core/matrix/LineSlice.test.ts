import { describe, it, expect } from 'vitest';
import { complementIndices, resolveIndex, sliceIndices } from './LineSlice.js';
import { DataTypeMismatchError } from '../errors/index.js';

describe('LineSlice', () => {
  describe('resolveIndex', () => {
    it('should count negative indices from the end', () => {
      expect(resolveIndex(-1, 5)).toBe(4);
      expect(resolveIndex(2, 5)).toBe(2);
      expect(resolveIndex(-6, 5)).toBe(-1);
    });
  });

  describe('sliceIndices', () => {
    it('should cover everything by default', () => {
      expect(sliceIndices({}, 4)).toEqual([0, 1, 2, 3]);
    });

    it('should honor start, stop and step', () => {
      expect(sliceIndices({ start: 1, stop: 6, step: 2 }, 10)).toEqual([1, 3, 5]);
    });

    it('should clamp bounds outside the lines', () => {
      expect(sliceIndices({ start: -2 }, 5)).toEqual([3, 4]);
      expect(sliceIndices({ start: -10, stop: 99 }, 3)).toEqual([0, 1, 2]);
      expect(sliceIndices({ start: 4, stop: 2 }, 5)).toEqual([]);
    });

    it('should reject steps below one and fractional bounds', () => {
      expect(() => sliceIndices({ step: 0 }, 3)).toThrow(DataTypeMismatchError);
      expect(() => sliceIndices({ step: -1 }, 3)).toThrow(DataTypeMismatchError);
      expect(() => sliceIndices({ start: 0.5 }, 3)).toThrow(DataTypeMismatchError);
    });
  });

  describe('complementIndices', () => {
    it('should list the indices that are not kept', () => {
      expect(complementIndices([0, -1], 4)).toEqual([1, 2]);
      expect(complementIndices([], 2)).toEqual([0, 1]);
    });
  });
});
