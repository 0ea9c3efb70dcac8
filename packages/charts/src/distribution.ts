/**
 * Distribution analysis: histograms, percentiles and quartiles
 */

import { float64, ops } from '@vecta/core';
import type { HistogramBin, Quartiles, Series } from './types';
import { valuesOf } from './values';

/**
 * Count values into `bins` equal-width bins spanning the data range
 *
 * Bins are half-open except the last, which also takes the maximum. Data
 * whose values are all equal yields a single bin.
 *
 * @example
 * histogram([1, 2, 2, 3, 4], 3);
 * // [{ midpoint: 1.5, count: 1 }, { midpoint: 2.5, count: 2 }, { midpoint: 3.5, count: 2 }]
 */
export function histogram(series: Series, bins: number): HistogramBin[] {
  const values = valuesOf(series);
  const lowest = ops.min(float64, values);
  const highest = ops.max(float64, values);
  if (bins <= 0 || lowest === undefined || highest === undefined) {
    return [];
  }
  if (lowest === highest) {
    return [{ midpoint: lowest, count: values.length }];
  }

  const width = (highest - lowest) / bins;
  return Array.from({ length: bins }, (_, i) => {
    const lower = lowest + i * width;
    const upper = lower + width;
    const last = i === bins - 1;
    const count = values.filter((value) => value >= lower && (last ? value <= upper : value < upper)).length;
    return { midpoint: (lower + upper) / 2, count };
  });
}

function sortedValues(values: readonly number[]): number[] {
  return [...values].sort(float64.compare);
}

function percentileOfSorted(sorted: readonly number[], p: number): number {
  const position = (p / 100) * (sorted.length - 1);
  const lowerIndex = Math.trunc(position);
  const upperIndex = Math.min(lowerIndex + 1, sorted.length - 1);
  const fraction = position - lowerIndex;
  return sorted[lowerIndex] + fraction * (sorted[upperIndex] - sorted[lowerIndex]);
}

/**
 * Value at percentile `p` (0-100), interpolating linearly between ranks
 *
 * `undefined` for empty data or `p` outside [0, 100].
 *
 * @example
 * percentile([1, 2, 3, 4, 5], 25); // 2
 */
export function percentile(series: Series, p: number): number | undefined {
  const values = valuesOf(series);
  if (values.length === 0 || !(p >= 0 && p <= 100)) {
    return undefined;
  }
  return percentileOfSorted(sortedValues(values), p);
}

/**
 * Five-number summary plus interquartile range, or `undefined` for empty data
 */
export function quartiles(series: Series): Quartiles | undefined {
  const values = valuesOf(series);
  if (values.length === 0) {
    return undefined;
  }
  const sorted = sortedValues(values);
  const q1 = percentileOfSorted(sorted, 25);
  const q3 = percentileOfSorted(sorted, 75);
  return {
    min: sorted[0],
    q1,
    median: percentileOfSorted(sorted, 50),
    q3,
    max: sorted[sorted.length - 1],
    iqr: q3 - q1,
  };
}

/**
 * Share of the data below `value`, counting equal values as half, as a percentage
 *
 * 0 for empty data.
 */
export function percentileRank(series: Series, value: number): number {
  const values = valuesOf(series);
  if (values.length === 0) {
    return 0;
  }
  let below = 0;
  let equal = 0;
  for (const item of values) {
    if (item < value) {
      below++;
    } else if (item === value) {
      equal++;
    }
  }
  return ((below + equal / 2) / values.length) * 100;
}

/**
 * {@link percentileRank} of every value against the whole series
 */
export function percentileRanks(series: Series): number[] {
  const values = valuesOf(series);
  return values.map((value) => percentileRank(values, value));
}
