/**
 * Time-series transforms: moving averages and period-over-period change
 */

import { float64, ops } from '@vecta/core';
import type { Series } from './types';
import { valuesOf } from './values';

/**
 * Trailing mean over at most `window` values ending at each position
 *
 * The first `window - 1` entries average the shorter prefix available. A
 * window longer than the series fills every entry with the overall mean.
 *
 * @example
 * rollingMean([1, 2, 3, 4, 5], 3); // [1, 1.5, 2, 3, 4]
 */
export function rollingMean(series: Series, window: number): number[] {
  const values = valuesOf(series);
  if (window <= 0 || values.length === 0) {
    return [];
  }
  if (window > values.length) {
    return new Array<number>(values.length).fill(ops.mean(float64, values) ?? 0);
  }
  return values.map((_, i) => {
    const slice = values.slice(Math.max(0, i - window + 1), i + 1);
    return ops.sum(float64, slice) / slice.length;
  });
}

function isValidLag(lag: number, length: number): boolean {
  return lag > 0 && lag < length;
}

/**
 * `values[i] - values[i - lag]` for every `i >= lag`
 *
 * Empty when `lag` is outside `1..length-1`.
 */
export function diff(series: Series, lag = 1): number[] {
  const values = valuesOf(series);
  if (!isValidLag(lag, values.length)) {
    return [];
  }
  return values.slice(lag).map((value, i) => value - values[i]);
}

/**
 * Percentage change from the value `lag` periods earlier
 *
 * A zero earlier value yields 0 for that period.
 *
 * @example
 * percentChange([100, 110, 99]); // [10, -10]
 */
export function percentChange(series: Series, lag = 1): number[] {
  const values = valuesOf(series);
  if (!isValidLag(lag, values.length)) {
    return [];
  }
  return values.slice(lag).map((value, i) => {
    const previous = values[i];
    return previous === 0 ? 0 : ((value - previous) / previous) * 100;
  });
}
