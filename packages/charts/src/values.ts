/**
 * Series access and aggregation shared by the chart helpers
 */

import { Vector, assertExhaustiveSwitch, float64, ops } from '@vecta/core';
import type { AggregationMethod, Series } from './types';

/**
 * Plain values of a series
 */
export function valuesOf(series: Series): readonly number[] {
  return series instanceof Vector ? series.data : series;
}

/**
 * Collapse values with an aggregation method; absent results become 0
 */
export function aggregate(values: readonly number[], method: AggregationMethod): number {
  switch (method) {
    case 'sum':
      return ops.sum(float64, values);
    case 'mean':
      return ops.mean(float64, values) ?? 0;
    case 'count':
      return values.length;
    case 'min':
      return ops.min(float64, values) ?? 0;
    case 'max':
      return ops.max(float64, values) ?? 0;
    default:
      return assertExhaustiveSwitch(method);
  }
}
