/**
 * Runtime tests for shape inspection and validation
 */

import { describe, it, expect } from 'vitest';
import { DimensionMismatchError } from '../errors';
import {
  RuntimeShape,
  assertRectangular,
  assertSameLength,
  assertSameShape,
  isRagged,
  matrixShape,
  shapeOf,
  vectorShape,
} from './runtime';

describe('RuntimeShape', () => {
  it('should compute rank and size', () => {
    const shape = new RuntimeShape([2, 3] as const);
    expect(shape.rank).toBe(2);
    expect(shape.size).toBe(6);
    expect(shape.isMatrix).toBe(true);
    expect(shape.isVector).toBe(false);
  });

  it('should support negative dimension indices', () => {
    const shape = new RuntimeShape([2, 3] as const);
    expect(shape.dim(0)).toBe(2);
    expect(shape.dim(-1)).toBe(3);
  });

  it('should reject out-of-range dimension indices', () => {
    expect(() => new RuntimeShape([4] as const).dim(1)).toThrow(
      'Dimension index 1 out of bounds for rank 1 shape',
    );
  });

  it('should compare shapes', () => {
    expect(new RuntimeShape([2, 3]).equals(new RuntimeShape([2, 3]))).toBe(true);
    expect(RuntimeShape.equals([2, 3], [3, 2])).toBe(false);
    expect(RuntimeShape.equals([3], [3, 1])).toBe(false);
  });

  it('should format as a bracketed list', () => {
    expect(new RuntimeShape([2, 3]).toString()).toBe('[2, 3]');
  });
});

describe('shape inspection', () => {
  it('should report vector and matrix shapes', () => {
    expect(vectorShape([1, 2, 3])).toEqual([3]);
    expect(matrixShape([[1, 2, 3], [4, 5, 6]])).toEqual([2, 3]);
    expect(matrixShape([])).toEqual([0, 0]);
  });

  it('should infer the rank from the data', () => {
    expect(shapeOf([1, 2])).toEqual([2]);
    expect(shapeOf([[1], [2], [3]])).toEqual([3, 1]);
    expect(shapeOf([])).toEqual([0]);
  });

  it('should tolerate ragged data when inspecting', () => {
    expect(shapeOf([[1, 2], [3]])).toEqual([2, 2]);
    expect(isRagged([[1, 2], [3]])).toBe(true);
    expect(isRagged([[1, 2], [3, 4]])).toBe(false);
    expect(isRagged([])).toBe(false);
  });
});

describe('shape assertions', () => {
  it('should return the shape of rectangular rows', () => {
    expect(assertRectangular([[1, 2], [3, 4], [5, 6]], 'test')).toEqual([3, 2]);
  });

  it('should name the first ragged row', () => {
    expect(() => assertRectangular([[1, 2], [3, 4], [5]], 'transpose')).toThrow(
      'transpose: dimension mismatch, expected [2] but got [1] (row 2 of a ragged matrix)',
    );
  });

  it('should require equal lengths', () => {
    expect(() => assertSameLength([1, 2, 3], [1, 2], 'add')).toThrow(DimensionMismatchError);
    expect(() => assertSameLength([1, 2, 3], [1, 2], 'add')).toThrow(
      'add: dimension mismatch, expected [3] but got [2]',
    );
  });

  it('should require equal matrix shapes', () => {
    expect(assertSameShape([[1, 2]], [[3, 4]], 'add')).toEqual([1, 2]);
    expect(() => assertSameShape([[1, 2]], [[1], [2]], 'add')).toThrow(
      'add: dimension mismatch, expected [1, 2] but got [2, 1]',
    );
  });
});
