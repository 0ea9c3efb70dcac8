import { describe, it, expect } from 'vitest';
import { float32, float64, int32, int64 } from '../dtype/constants';
import { DTypeValidationError } from '../dtype/runtime';
import { EmptyInputError, InvalidArgumentError } from '../errors';
import { arange, diag, full, identity, linspace, matrix, ones, random, vector, zeros } from './creation';
import { Matrix } from './matrix';
import { Vector } from './vector';

describe('tensor/creation', () => {
  describe('vector and matrix', () => {
    it('should infer float64 for numbers and int64 for bigints', () => {
      expect(vector([1, 2]).dtype).toBe(float64);
      expect(vector([1n, 2n]).dtype).toBe(int64);
      expect(vector([]).dtype).toBe(float64);
      expect(matrix([[1n]]).dtype).toBe(int64);
    });

    it('should honour an explicit dtype', () => {
      expect(vector([1, 2], { dtype: int32 }).dtype).toBe(int32);
      expect(matrix([[1, 2]], { dtype: float32 }).dtype).toBe(float32);
    });

    it('should validate values against the dtype', () => {
      expect(() => vector([1.5], { dtype: int32 })).toThrow(DTypeValidationError);
      expect(() => vector([1.5], { dtype: int32 })).toThrow('Value 1.5 is not valid for DType int32');
      expect(() => matrix([[1, 2147483648]], { dtype: int32 })).toThrow(DTypeValidationError);
    });

    it('should copy the caller rows', () => {
      const rows = [[1, 2]];
      const m = matrix(rows);
      expect(m.rows[0]).not.toBe(rows[0]);
      expect(Object.isFrozen(rows[0])).toBe(false);
    });
  });

  describe('constant fills', () => {
    it('should build vectors from a one-element shape', () => {
      const z = zeros([3]);
      expect(z).toBeInstanceOf(Vector);
      expect(z.toArray()).toEqual([0, 0, 0]);
      expect(ones([2]).toArray()).toEqual([1, 1]);
      expect(full([2], 7).toArray()).toEqual([7, 7]);
    });

    it('should build matrices from a two-element shape', () => {
      const o = ones([2, 3]);
      expect(o).toBeInstanceOf(Matrix);
      expect(o.toArray()).toEqual([
        [1, 1, 1],
        [1, 1, 1],
      ]);
      expect(full([2, 2], 7).toArray()).toEqual([
        [7, 7],
        [7, 7],
      ]);
    });

    it('should use the requested dtype', () => {
      expect(zeros([2], { dtype: int64 }).toArray()).toEqual([0n, 0n]);
      expect(ones([1, 2], { dtype: int64 }).toArray()).toEqual([[1n, 1n]]);
      expect(full([2], 5n).dtype).toBe(int64);
      expect(zeros([2], { dtype: int32 }).dtype).toBe(int32);
    });

    it('should allow empty vectors', () => {
      expect(zeros([0]).length).toBe(0);
    });

    it('should reject negative dimensions', () => {
      expect(() => zeros([-1])).toThrow('zeros: count must be a non-negative integer, got -1');
      expect(() => ones([2, -1])).toThrow('ones: columns must be a non-negative integer, got -1');
    });

    it('should validate the fill value', () => {
      expect(() => full([2], 0.5, { dtype: int32 })).toThrow(DTypeValidationError);
    });
  });

  describe('special matrices', () => {
    it('should build identity matrices', () => {
      expect(identity(2).toArray()).toEqual([
        [1, 0],
        [0, 1],
      ]);
      expect(identity(1, { dtype: int64 }).toArray()).toEqual([[1n]]);
      expect(() => identity(0)).toThrow(EmptyInputError);
    });

    it('should build diagonal matrices with the vector dtype', () => {
      const d = diag(vector([1, 2], { dtype: int32 }));
      expect(d.dtype).toBe(int32);
      expect(d.toArray()).toEqual([
        [1, 0],
        [0, 2],
      ]);
    });
  });

  describe('sequences', () => {
    it('should sample evenly', () => {
      expect(linspace(0, 1, 5).toArray()).toEqual([0, 0.25, 0.5, 0.75, 1]);
    });

    it('should build ranges', () => {
      expect(arange(0, 1, 0.25).toArray()).toEqual([0, 0.25, 0.5, 0.75]);
      expect(arange(0, 3).toArray()).toEqual([0, 1, 2]);
      expect(arange(10n, 0n, -3n).toArray()).toEqual([10n, 7n, 4n, 1n]);
      expect(arange(0, 6, 2, { dtype: int32 }).toArray()).toEqual([0, 2, 4]);
    });

    it('should validate range bounds against the dtype', () => {
      expect(() => arange(0, 1.5, 1, { dtype: int32 })).toThrow(DTypeValidationError);
      expect(() => arange(0, 5, 0)).toThrow(InvalidArgumentError);
    });
  });

  describe('random', () => {
    it('should draw a vector or a matrix', () => {
      const v = random([4]);
      expect(v.length).toBe(4);
      const m = random([2, 3]);
      expect(m.shape).toEqual([2, 3]);
    });

    it('should draw from the supplied source', () => {
      const source = (): number => 0.25;
      expect(random([2], { source }).toArray()).toEqual([0.25, 0.25]);
      expect(random([1, 1], { source, dtype: float32 }).toArray()).toEqual([[0.25]]);
    });
  });
});
