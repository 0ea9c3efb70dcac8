import { describe, it, expect } from 'vitest';
import { float64 } from '../dtype/constants';
import { DimensionMismatchError, InvalidArgumentError, ZeroVectorError } from '../errors';
import {
  areValidVectorDimensions,
  averaged,
  clusterCohesion,
  cosineSimilarities,
  findDuplicates,
  meanVector,
  topIndices,
} from './similarity';

describe('ops/similarity', () => {
  describe('cosineSimilarities', () => {
    it('should score every row against the query', () => {
      const scores = cosineSimilarities(float64, [[1, 0], [0, 1], [1, 1]], [1, 0]);
      expect(scores[0]).toBe(1);
      expect(scores[1]).toBe(0);
      expect(scores[2]).toBeCloseTo(Math.SQRT1_2, 12);
    });

    it('should reject a zero query', () => {
      expect(() => cosineSimilarities(float64, [[1, 0]], [0, 0])).toThrow(ZeroVectorError);
    });

    it('should reject rows of another length', () => {
      expect(() => cosineSimilarities(float64, [[1, 0, 0]], [1, 0])).toThrow(DimensionMismatchError);
    });
  });

  describe('findDuplicates', () => {
    const database = [
      [1, 0],
      [2, 0],
      [0, 1],
      [0, 3],
      [1, 1],
    ];

    it('should return pairs at or above the threshold, highest first', () => {
      expect(findDuplicates(float64, database)).toEqual([
        { i: 0, j: 1, similarity: 1 },
        { i: 2, j: 3, similarity: 1 },
      ]);
    });

    it('should honour a lower threshold', () => {
      const pairs = findDuplicates(float64, database, 0.7);
      expect(pairs).toHaveLength(6);
      expect(pairs.slice(0, 2).map(({ i, j }) => [i, j])).toEqual([
        [0, 1],
        [2, 3],
      ]);
      for (let n = 1; n < pairs.length; n++) {
        expect(pairs[n].similarity).toBeLessThanOrEqual(pairs[n - 1].similarity);
      }
    });

    it('should find nothing in fewer than two rows', () => {
      expect(findDuplicates(float64, [[1, 2]])).toEqual([]);
      expect(findDuplicates(float64, [])).toEqual([]);
    });
  });

  describe('clusterCohesion', () => {
    it('should average the pairwise similarity', () => {
      expect(clusterCohesion(float64, [[1, 0], [0, 1]])).toBe(0);
      expect(clusterCohesion(float64, [[1, 0], [1, 0], [0, 1]])).toBeCloseTo(1 / 3, 12);
    });

    it('should be zero for fewer than two items', () => {
      expect(clusterCohesion(float64, [[1, 2]])).toBe(0);
      expect(clusterCohesion(float64, [])).toBe(0);
    });
  });

  describe('averaged', () => {
    it('should compute the element-wise mean', () => {
      expect(
        averaged(float64, [
          [1, 2, 3],
          [4, 5, 6],
          [7, 8, 9],
        ]),
      ).toEqual([4, 5, 6]);
      expect(meanVector(float64, [[2, 4]])).toEqual([2, 4]);
    });

    it('should be undefined for no vectors or mixed lengths', () => {
      expect(averaged(float64, [])).toBeUndefined();
      expect(averaged(float64, [[1, 2], [3]])).toBeUndefined();
    });

    it('should validate dimensions', () => {
      expect(areValidVectorDimensions([[1, 2], [3, 4]])).toBe(true);
      expect(areValidVectorDimensions([[1, 2], [3]])).toBe(false);
      expect(areValidVectorDimensions([])).toBe(false);
    });
  });

  describe('topIndices', () => {
    it('should return the highest scores first', () => {
      expect(topIndices([0.3, 0.9, 0.1, 0.7, 0.5], 3)).toEqual([
        { index: 1, score: 0.9 },
        { index: 3, score: 0.7 },
        { index: 4, score: 0.5 },
      ]);
    });

    it('should order equal scores by index', () => {
      expect(topIndices([1, 2, 2, 1], 2)).toEqual([
        { index: 1, score: 2 },
        { index: 2, score: 2 },
      ]);
      expect(topIndices([5, 5, 5], 3).map(({ index }) => index)).toEqual([0, 1, 2]);
    });

    it('should return everything when k exceeds the count', () => {
      expect(topIndices([2, 3, 1], 10).map(({ index }) => index)).toEqual([1, 0, 2]);
    });

    it('should return nothing for k of zero or no scores', () => {
      expect(topIndices([1, 2], 0)).toEqual([]);
      expect(topIndices([], 3)).toEqual([]);
    });

    it('should rank NaN below every number', () => {
      expect(topIndices([NaN, 1, -5], 2)).toEqual([
        { index: 1, score: 1 },
        { index: 2, score: -5 },
      ]);
    });

    it('should attach labels', () => {
      expect(topIndices([0.2, 0.8, 0.5], 2, ['cat', 'dog', 'bird'])).toEqual([
        { label: 'dog', score: 0.8 },
        { label: 'bird', score: 0.5 },
      ]);
    });

    it('should reject invalid arguments', () => {
      expect(() => topIndices([1], -1)).toThrow(InvalidArgumentError);
      expect(() => topIndices([1], 1.5)).toThrow('topIndices: k must be a non-negative integer, got 1.5');
      expect(() => topIndices([1, 2], 1, ['a'])).toThrow(DimensionMismatchError);
    });
  });
});
