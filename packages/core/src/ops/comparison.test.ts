import { describe, it, expect } from 'vitest';
import { float64, int64 } from '../dtype/constants';
import { DimensionMismatchError } from '../errors';
import {
  and,
  choose,
  compare,
  isEqual,
  isGreaterThan,
  isGreaterThanOrEqual,
  isLessThan,
  isLessThanOrEqual,
  masked,
  not,
  or,
  trueIndices,
} from './comparison';

describe('ops/comparison', () => {
  describe('scalar comparisons', () => {
    const values = [1, 5, 3];

    it('should compare every element against the scalar', () => {
      expect(isGreaterThan(float64, values, 2)).toEqual([false, true, true]);
      expect(isLessThan(float64, values, 3)).toEqual([true, false, false]);
      expect(isEqual(float64, values, 3)).toEqual([false, false, true]);
      expect(isGreaterThanOrEqual(float64, values, 3)).toEqual([false, true, true]);
      expect(isLessThanOrEqual(float64, values, 3)).toEqual([true, false, true]);
    });

    it('should compare bigint data', () => {
      expect(compare(int64, [1n, 2n, 3n], 'isGreaterThan', 1n)).toEqual([false, true, true]);
    });

    it('should be false for every comparison involving NaN', () => {
      expect(isEqual(float64, [NaN], NaN)).toEqual([false]);
      expect(isLessThan(float64, [NaN, 1], 2)).toEqual([false, true]);
      expect(isGreaterThanOrEqual(float64, [1], NaN)).toEqual([false]);
    });
  });

  describe('element-wise comparisons', () => {
    it('should compare position by position', () => {
      expect(isGreaterThan(float64, [1, 5, 3], [2, 2, 3])).toEqual([false, true, false]);
      expect(isEqual(float64, [1, 5, 3], [2, 2, 3])).toEqual([false, false, true]);
    });

    it('should fail on length mismatch', () => {
      expect(() => isEqual(float64, [1, 2], [1])).toThrow(DimensionMismatchError);
    });
  });

  describe('combinators', () => {
    it('should combine masks', () => {
      expect(and([true, true, false], [true, false, false])).toEqual([true, false, false]);
      expect(or([true, false, false], [false, false, true])).toEqual([true, false, true]);
      expect(not([true, false])).toEqual([false, true]);
    });

    it('should build a range test from two comparisons', () => {
      const values = [1, 4, 6, 9];
      const inRange = and(isGreaterThan(float64, values, 3), isLessThan(float64, values, 7));
      expect(trueIndices(inRange)).toEqual([1, 2]);
      expect(masked(values, inRange)).toEqual([4, 6]);
    });

    it('should fail on mask length mismatch', () => {
      expect(() => and([true], [true, false])).toThrow('and: dimension mismatch');
      expect(() => or([true], [])).toThrow(DimensionMismatchError);
    });

    it('should find no indices in an all-false mask', () => {
      expect(trueIndices([false, false])).toEqual([]);
    });
  });

  describe('selection', () => {
    it('should keep elements under a true mask', () => {
      expect(masked(['a', 'b', 'c'], [true, false, true])).toEqual(['a', 'c']);
    });

    it('should choose between two sources', () => {
      expect(choose([1, 2, 3], [true, false, true], [10, 20, 30])).toEqual([1, 20, 3]);
    });

    it('should fail on length mismatch', () => {
      expect(() => masked([1, 2], [true])).toThrow(DimensionMismatchError);
      expect(() => choose([1, 2], [true, false], [1])).toThrow(DimensionMismatchError);
    });
  });
});
