import { describe, it, expect } from 'vitest';
import { float32, float64, int64 } from '../dtype/constants';
import { DimensionMismatchError, DivisionByZeroError } from '../errors';
import {
  broadcastColumn,
  broadcastDivide,
  broadcastDivideRows,
  broadcastRow,
  broadcastScalar,
  broadcastScalarRows,
  broadcastWith,
} from './broadcast';

describe('ops/broadcast', () => {
  describe('scalar', () => {
    it('should apply named operations to every element', () => {
      expect(broadcastScalar(float64, [1, 2, 3], 'add', 10)).toEqual([11, 12, 13]);
      expect(broadcastScalar(float64, [1, 2, 3], 'multiply', 2)).toEqual([2, 4, 6]);
    });

    it('should keep subtraction asymmetric', () => {
      expect(broadcastScalar(float64, [1, 2, 3], 'subtract', 10)).toEqual([-9, -8, -7]);
      expect(broadcastScalar(float64, [1, 2, 3], 'subtract', 10, 'left')).toEqual([9, 8, 7]);
    });

    it('should keep division asymmetric', () => {
      expect(broadcastDivide(float64, [1, 2, 4], 2)).toEqual([0.5, 1, 2]);
      expect(broadcastDivide(float64, [1, 2, 4], 8, 'left')).toEqual([8, 4, 2]);
    });

    it('should reject a zero scalar divisor', () => {
      expect(() => broadcastDivide(float64, [1, 2], 0)).toThrow(DivisionByZeroError);
      expect(() => broadcastDivide(float64, [1, 2], 0)).toThrow('divide: division by zero');
    });

    it('should reject zero elements when they are the divisors', () => {
      expect(() => broadcastDivide(float64, [1, 0], 1, 'left')).toThrow(
        'divide: division by zero at index 1',
      );
      expect(broadcastDivide(float64, [1, 0], 2)).toEqual([0.5, 0]);
    });

    it('should work on bigint data', () => {
      expect(broadcastScalar(int64, [1n, 2n], 'subtract', 5n, 'left')).toEqual([4n, 3n]);
    });

    it('should apply scalars to every matrix entry', () => {
      expect(broadcastScalarRows(float64, [[1, 2], [3, 4]], 'subtract', 10, 'left')).toEqual([
        [9, 8],
        [7, 6],
      ]);
      expect(broadcastDivideRows(float64, [[2, 4]], 2)).toEqual([[1, 2]]);
      expect(() => broadcastDivideRows(float64, [[2, 4], [0, 1]], 1, 'left')).toThrow(
        'divide: division by zero at index [1, 0]',
      );
    });
  });

  describe('custom operations', () => {
    it('should accept a scalar operand', () => {
      expect(broadcastWith(float64, [1, 2, 3], 2, Math.pow)).toEqual([1, 4, 9]);
    });

    it('should accept a same-length vector operand', () => {
      expect(broadcastWith(float64, [2, 3], [3, 2], Math.pow)).toEqual([8, 9]);
    });

    it('should reject a vector operand of another length', () => {
      expect(() => broadcastWith(float64, [1, 2], [1, 2, 3], Math.max)).toThrow(DimensionMismatchError);
    });

    it('should store results in the dtype precision', () => {
      expect(broadcastWith(float32, [1], 3, (a, b) => a / b)).toEqual([Math.fround(1 / 3)]);
    });

    it('should accept custom functions wherever named operations are accepted', () => {
      expect(broadcastScalar(float64, [1, 2], (a, b) => a * 10 + b, 5)).toEqual([15, 25]);
    });
  });

  describe('rows and columns', () => {
    const rows = [
      [1, 2, 3],
      [4, 5, 6],
    ];

    it('should apply a vector to every row', () => {
      expect(broadcastRow(float64, rows, [10, 20, 30], 'add')).toEqual([
        [11, 22, 33],
        [14, 25, 36],
      ]);
    });

    it('should apply vector element i to every entry of row i', () => {
      expect(broadcastColumn(float64, rows, [10, 100], 'multiply')).toEqual([
        [10, 20, 30],
        [400, 500, 600],
      ]);
    });

    it('should require the vector to match the broadcast axis', () => {
      expect(() => broadcastRow(float64, rows, [1, 2], 'add')).toThrow(
        'broadcastRow: dimension mismatch, expected [3] but got [2] (row vector must match the matrix column count)',
      );
      expect(() => broadcastColumn(float64, rows, [1, 2, 3], 'add')).toThrow(
        'broadcastColumn: dimension mismatch, expected [2] but got [3] (column vector must match the matrix row count)',
      );
    });

    it('should reject ragged matrices', () => {
      expect(() => broadcastRow(float64, [[1, 2], [3]], [1, 1], 'add')).toThrow(DimensionMismatchError);
    });

    it('should broadcast an empty vector onto a matrix without rows', () => {
      expect(broadcastRow(float64, [], [], 'add')).toEqual([]);
    });
  });
});
