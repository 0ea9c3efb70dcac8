/**
 * Rescaling a series for display
 */

import { float64, ops } from '@vecta/core';
import type { Series } from './types';
import { valuesOf } from './values';

/**
 * Min-max scale into `[lower, upper]`
 *
 * A constant series maps every value to `lower`.
 *
 * @example
 * scaled([10, 15, 20], 0, 1); // [0, 0.5, 1]
 */
export function scaled(series: Series, lower: number, upper: number): number[] {
  const values = valuesOf(series);
  const lowest = ops.min(float64, values);
  const highest = ops.max(float64, values);
  if (lowest === undefined || highest === undefined) {
    return [];
  }
  const range = highest - lowest;
  if (range === 0) {
    return new Array<number>(values.length).fill(lower);
  }
  return values.map((value) => ((value - lowest) / range) * (upper - lower) + lower);
}

/**
 * Each value as a percentage of the series total; all zeros when the total is zero
 */
export function asPercentages(series: Series): number[] {
  const values = valuesOf(series);
  const total = ops.sum(float64, values);
  if (total === 0) {
    return new Array<number>(values.length).fill(0);
  }
  return values.map((value) => (value / total) * 100);
}

/**
 * Z-scores using the population standard deviation
 *
 * A constant series yields all zeros.
 */
export function standardized(series: Series): number[] {
  const values = valuesOf(series);
  const center = ops.mean(float64, values);
  const spread = ops.std(float64, values);
  if (center === undefined || spread === undefined) {
    return [];
  }
  if (spread === 0) {
    return new Array<number>(values.length).fill(0);
  }
  return values.map((value) => (value - center) / spread);
}
