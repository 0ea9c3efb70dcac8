import { describe, it, expect } from 'vitest';
import { float32, float64, int32 } from '../dtype/constants';
import { DTypeError } from '../dtype/runtime';
import { power, unary } from './unary';

describe('ops/unary', () => {
  it('should apply rounding functions', () => {
    expect(unary(float64, [1.2, 1.5, -1.2], 'floor')).toEqual([1, 1, -2]);
    expect(unary(float64, [1.2, 1.5, -1.2], 'ceil')).toEqual([2, 2, -1]);
  });

  it('should round halves away from zero', () => {
    expect(unary(float64, [2.5, -2.5, 1.4, -1.6], 'round')).toEqual([3, -3, 1, -2]);
  });

  it('should apply exponential and logarithmic functions', () => {
    expect(unary(float64, [0], 'exp')).toEqual([1]);
    expect(unary(float64, [1], 'exp')[0]).toBeCloseTo(Math.E, 12);
    expect(unary(float64, [1], 'log')).toEqual([0]);
    expect(unary(float64, [Math.E], 'log')[0]).toBeCloseTo(1, 12);
    expect(unary(float64, [100], 'log10')[0]).toBeCloseTo(2, 12);
    expect(unary(float64, [4, 9], 'sqrt')).toEqual([2, 3]);
    expect(unary(float64, [-3, 4], 'square')).toEqual([9, 16]);
  });

  it('should follow IEEE rules outside the domain', () => {
    const [negative, zero] = unary(float64, [-1, 0], 'log');
    expect(negative).toBeNaN();
    expect(zero).toBe(-Infinity);
    expect(unary(float64, [-4], 'sqrt')[0]).toBeNaN();
  });

  it('should apply trigonometric functions', () => {
    expect(unary(float64, [0], 'sin')).toEqual([0]);
    expect(unary(float64, [0], 'cos')).toEqual([1]);
    expect(unary(float64, [Math.PI / 4], 'tan')[0]).toBeCloseTo(1, 12);
  });

  it('should store results in the dtype precision', () => {
    expect(unary(float32, [2], 'sqrt')).toEqual([Math.fround(Math.SQRT2)]);
  });

  it('should raise every element to a power', () => {
    expect(power(float64, [1, 2, 3], 2)).toEqual([1, 4, 9]);
    expect(power(float64, [4], 0.5)[0]).toBeCloseTo(2, 12);
  });

  it('should require floating-point data', () => {
    expect(() => unary(int32, [1], 'sqrt')).toThrow(DTypeError);
    expect(() => power(int32, [1], 2)).toThrow(DTypeError);
  });

  it('should return empty output for empty input', () => {
    expect(unary(float64, [], 'exp')).toEqual([]);
  });
});
