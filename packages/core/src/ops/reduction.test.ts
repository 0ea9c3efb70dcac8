import { describe, it, expect } from 'vitest';
import { float32, float64, int32, int64 } from '../dtype/constants';
import { DTypeError } from '../dtype/runtime';
import { InvalidArgumentError } from '../errors';
import {
  argmax,
  argmin,
  cumulativeProduct,
  cumulativeSum,
  max,
  mean,
  median,
  min,
  outlierMask,
  product,
  std,
  sum,
  variance,
} from './reduction';

describe('ops/reduction', () => {
  describe('sum and product', () => {
    it('should reduce every element', () => {
      expect(sum(float64, [1, 2, 3, 4])).toBe(10);
      expect(product(float64, [1, 2, 3, 4])).toBe(24);
      expect(sum(int64, [10n, 20n])).toBe(30n);
      expect(product(int64, [2n, 3n])).toBe(6n);
    });

    it('should yield zero for empty input', () => {
      expect(sum(float64, [])).toBe(0);
      expect(product(float64, [])).toBe(0);
      expect(product(int64, [])).toBe(0n);
    });
  });

  describe('extrema', () => {
    it('should find the extreme values', () => {
      expect(min(float64, [3, -1, 7])).toBe(-1);
      expect(max(float64, [3, -1, 7])).toBe(7);
      expect(max(int64, [3n, 9n, 1n])).toBe(9n);
    });

    it('should report the first index on ties', () => {
      expect(argmax(float64, [1, 5, 5, 2])).toBe(1);
      expect(argmin(float64, [0, 3, 0])).toBe(0);
    });

    it('should be undefined for empty input', () => {
      expect(argmin(float64, [])).toBeUndefined();
      expect(argmax(float64, [])).toBeUndefined();
      expect(min(float64, [])).toBeUndefined();
      expect(max(int32, [])).toBeUndefined();
    });
  });

  describe('central tendency', () => {
    it('should compute the mean', () => {
      expect(mean(float64, [1, 2, 3, 4])).toBe(2.5);
      expect(mean(float64, [])).toBeUndefined();
    });

    it('should compute the median of odd and even counts', () => {
      expect(median(float64, [3, 1, 2])).toBe(2);
      expect(median(float64, [4, 1, 3, 2])).toBe(2.5);
      expect(median(float64, [])).toBeUndefined();
    });

    it('should leave the input order untouched', () => {
      const values = [3, 1, 2];
      median(float64, values);
      expect(values).toEqual([3, 1, 2]);
    });

    it('should round to the dtype precision', () => {
      const total = Math.fround(Math.fround(0.1) + 0.2);
      expect(mean(float32, [0.1, 0.2])).toBe(Math.fround(total / 2));
    });

    it('should require floating-point data', () => {
      expect(() => mean(int32, [1, 2])).toThrow(DTypeError);
    });
  });

  describe('dispersion', () => {
    it('should compute population and sample variance', () => {
      expect(variance(float64, [1, 2, 3, 4, 5])).toBe(2);
      expect(variance(float64, [1, 2, 3, 4, 5], 1)).toBe(2.5);
    });

    it('should compute the standard deviation', () => {
      expect(std(float64, [2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    });

    it('should be undefined when there are too few values', () => {
      expect(variance(float64, [])).toBeUndefined();
      expect(variance(float64, [5], 1)).toBeUndefined();
      expect(std(float64, [5], 1)).toBeUndefined();
      expect(variance(float64, [5])).toBe(0);
    });

    it('should reject invalid degrees of freedom', () => {
      expect(() => variance(float64, [1, 2], -1)).toThrow(InvalidArgumentError);
      expect(() => std(float64, [1, 2], -1)).toThrow('variance: ddof must be a non-negative integer, got -1');
      expect(() => variance(float64, [1, 2], 0.5)).toThrow(
        'variance: ddof must be a non-negative integer, got 0.5',
      );
    });
  });

  describe('running totals', () => {
    it('should accumulate sums and products', () => {
      expect(cumulativeSum(float64, [1, 2, 3, 4])).toEqual([1, 3, 6, 10]);
      expect(cumulativeProduct(float64, [1, 2, 3, 4])).toEqual([1, 2, 6, 24]);
      expect(cumulativeSum(int64, [1n, 2n])).toEqual([1n, 3n]);
    });

    it('should end at the full reduction', () => {
      const values = [4, 8, 15, 16, 23, 42];
      expect(cumulativeSum(float64, values).at(-1)).toBe(sum(float64, values));
    });

    it('should return empty output for empty input', () => {
      expect(cumulativeSum(float64, [])).toEqual([]);
      expect(cumulativeProduct(float64, [])).toEqual([]);
    });
  });

  describe('outlierMask', () => {
    it('should flag values beyond the threshold', () => {
      expect(outlierMask(float64, [1, 2, 3, 100], { threshold: 1 })).toEqual([false, false, false, true]);
    });

    it('should accept a precomputed center and spread', () => {
      expect(outlierMask(float64, [8, 10, 13], { mean: 10, std: 1 })).toEqual([false, false, true]);
    });

    it('should default to two standard deviations', () => {
      expect(outlierMask(float64, [1, 1, 1, 1])).toEqual([false, false, false, false]);
    });

    it('should return an empty mask for empty input', () => {
      expect(outlierMask(float64, [])).toEqual([]);
    });
  });
});
