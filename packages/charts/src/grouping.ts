/**
 * Grouping by category and downsampling by window
 */

import type { AggregationMethod, GroupedDatum, Series } from './types';
import { aggregate, valuesOf } from './values';

/**
 * Aggregate values per category label
 *
 * Categories appear in the map in order of first occurrence. A category list
 * of a different length than the series yields an empty map.
 *
 * @example
 * groupBy([1, 2, 3], ['a', 'b', 'a'], 'sum'); // Map { 'a' => 4, 'b' => 2 }
 */
export function groupBy(
  series: Series,
  categories: readonly string[],
  method: AggregationMethod,
): Map<string, number> {
  const values = valuesOf(series);
  const result = new Map<string, number>();
  if (categories.length !== values.length) {
    return result;
  }

  const groups = new Map<string, number[]>();
  values.forEach((value, i) => {
    const category = categories[i];
    const members = groups.get(category);
    if (members === undefined) {
      groups.set(category, [value]);
    } else {
      members.push(value);
    }
  });

  for (const [category, members] of groups) {
    result.set(category, aggregate(members, method));
  }
  return result;
}

/**
 * {@link groupBy} as `{ category, value }` records sorted by category
 */
export function groupedData(
  series: Series,
  categories: readonly string[],
  method: AggregationMethod,
): GroupedDatum[] {
  return [...groupBy(series, categories, method)]
    .map(([category, value]) => ({ category, value }))
    .sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
}

/**
 * Aggregate consecutive windows of `factor` values; the last window may be shorter
 *
 * A factor not smaller than the series length aggregates everything into one value.
 *
 * @example
 * downsample([1, 2, 3, 4, 5], 2, 'sum'); // [3, 7, 5]
 */
export function downsample(series: Series, factor: number, method: AggregationMethod): number[] {
  const values = valuesOf(series);
  if (factor <= 0 || values.length === 0) {
    return [];
  }
  if (factor >= values.length) {
    return [aggregate(values, method)];
  }
  const result: number[] = [];
  for (let start = 0; start < values.length; start += factor) {
    result.push(aggregate(values.slice(start, start + factor), method));
  }
  return result;
}
