import { describe, it, expect } from 'vitest';
import { vector } from '@vecta/core';
import { asPercentages, scaled, standardized } from './scaling';

describe('scaling', () => {
  describe('scaled', () => {
    it('should map the data range onto the target range', () => {
      expect(scaled([10, 15, 20], 0, 1)).toEqual([0, 0.5, 1]);
      expect(scaled(vector([10, 15, 20]), -1, 1)).toEqual([-1, 0, 1]);
    });

    it('should map constant data to the lower bound', () => {
      expect(scaled([3, 3], 5, 10)).toEqual([5, 5]);
    });

    it('should be empty for empty data', () => {
      expect(scaled([], 0, 1)).toEqual([]);
    });
  });

  describe('asPercentages', () => {
    it('should divide by the total', () => {
      expect(asPercentages([1, 1, 2])).toEqual([25, 25, 50]);
    });

    it('should return zeros for a zero total', () => {
      expect(asPercentages([0, 0])).toEqual([0, 0]);
      expect(asPercentages([])).toEqual([]);
    });
  });

  describe('standardized', () => {
    it('should compute z-scores', () => {
      expect(standardized([2, 4, 4, 4, 5, 5, 7, 9])).toEqual([-1.5, -0.5, -0.5, -0.5, 0, 0, 1, 2]);
    });

    it('should return zeros for constant data', () => {
      expect(standardized([3, 3])).toEqual([0, 0]);
      expect(standardized([])).toEqual([]);
    });
  });
});
