import { describe, it, expect } from 'vitest';
import { float64, int32, int64 } from '../dtype/constants';
import { DTypeError } from '../dtype/runtime';
import { DimensionMismatchError, ZeroVectorError } from '../errors';
import { add } from './arithmetic';
import {
  angle,
  angleInDegrees,
  cosineOfAngle,
  distance,
  dot,
  magnitude,
  normalized,
  orthogonalComponent,
  scalarProjection,
  vectorProjection,
} from './vector';

describe('ops/vector', () => {
  describe('dot', () => {
    it('should sum the element products', () => {
      expect(dot(float64, [1, 2, 3], [4, 5, 6])).toBe(32);
      expect(dot(int64, [1n, 2n, 3n], [4n, 5n, 6n])).toBe(32n);
      expect(dot(float64, [], [])).toBe(0);
    });

    it('should fail on length mismatch', () => {
      expect(() => dot(float64, [1, 2, 3], [1, 2])).toThrow(DimensionMismatchError);
    });
  });

  describe('magnitude', () => {
    it('should compute the Euclidean length', () => {
      expect(magnitude(float64, [3, 4])).toBe(5);
    });

    it('should be zero for the zero vector', () => {
      expect(magnitude(float64, [0, 0, 0])).toBe(0);
    });

    it('should require floating-point data', () => {
      expect(() => magnitude(int32, [3, 4])).toThrow(DTypeError);
    });
  });

  describe('normalized', () => {
    it('should scale to unit length', () => {
      expect(normalized(float64, [3, 4])).toEqual([0.6, 0.8]);
      expect(magnitude(float64, normalized(float64, [1, 2, 2]))).toBeCloseTo(1, 12);
    });

    it('should be idempotent', () => {
      const once = normalized(float64, [2, -7, 1]);
      const twice = normalized(float64, once);
      twice.forEach((value, i) => expect(value).toBeCloseTo(once[i], 12));
    });

    it('should reject the zero vector', () => {
      expect(() => normalized(float64, [0, 0])).toThrow(ZeroVectorError);
      expect(() => normalized(float64, [0, 0])).toThrow('normalized: cannot normalize a zero vector');
    });
  });

  describe('angles', () => {
    it('should compute the cosine of the angle', () => {
      expect(cosineOfAngle(float64, [1, 0], [0, 1])).toBe(0);
      expect(cosineOfAngle(float64, [1, 1], [2, 2])).toBeCloseTo(1, 12);
      expect(cosineOfAngle(float64, [1, 0], [-1, 0])).toBe(-1);
    });

    it('should be symmetric', () => {
      const a = [1, 2, 3];
      const b = [-2, 0.5, 4];
      expect(cosineOfAngle(float64, a, b)).toBe(cosineOfAngle(float64, b, a));
    });

    it('should reject zero vectors on either side', () => {
      expect(() => cosineOfAngle(float64, [0, 0], [1, 0])).toThrow(ZeroVectorError);
      expect(() => cosineOfAngle(float64, [1, 0], [0, 0])).toThrow(ZeroVectorError);
    });

    it('should report dimension mismatch before zero vectors', () => {
      expect(() => cosineOfAngle(float64, [0, 0], [1])).toThrow(DimensionMismatchError);
    });

    it('should convert to radians and degrees', () => {
      expect(angle(float64, [1, 0], [0, 1])).toBeCloseTo(Math.PI / 2, 12);
      expect(angleInDegrees(float64, [1, 0], [0, 1])).toBeCloseTo(90, 10);
      expect(angleInDegrees(float64, [1, 0], [1, 1])).toBeCloseTo(45, 10);
    });
  });

  describe('distance', () => {
    it('should compute the Euclidean distance', () => {
      expect(distance(float64, [0, 0], [3, 4])).toBe(5);
      expect(distance(float64, [3, 4], [0, 0])).toBe(5);
      expect(distance(float64, [1, 2, 3], [1, 2, 3])).toBe(0);
    });

    it('should fail on length mismatch', () => {
      expect(() => distance(float64, [1], [1, 2])).toThrow(DimensionMismatchError);
    });
  });

  describe('projections', () => {
    it('should compute the scalar projection', () => {
      expect(scalarProjection(float64, [3, 4], [1, 0])).toBe(3);
      expect(scalarProjection(float64, [3, 4], [0, 2])).toBe(4);
    });

    it('should compute the vector projection', () => {
      expect(vectorProjection(float64, [3, 4], [2, 0])).toEqual([3, 0]);
    });

    it('should compute the orthogonal component', () => {
      expect(orthogonalComponent(float64, [3, 4], [1, 0])).toEqual([0, 4]);
    });

    it('should reconstruct the vector from its two components', () => {
      const v = [2, 5, -1];
      const axis = [1, 1, 0];
      const rebuilt = add(float64, vectorProjection(float64, v, axis), orthogonalComponent(float64, v, axis));
      rebuilt.forEach((value, i) => expect(value).toBeCloseTo(v[i], 12));
    });

    it('should reject projection onto the zero vector', () => {
      expect(() => scalarProjection(float64, [1, 2], [0, 0])).toThrow(
        'scalarProjection: cannot project onto a zero vector',
      );
      expect(() => vectorProjection(float64, [1, 2], [0, 0])).toThrow(ZeroVectorError);
      expect(() => orthogonalComponent(float64, [1, 2], [0, 0])).toThrow(ZeroVectorError);
    });
  });
});
