/**
 * Statistics: reductions, order statistics, dispersion and running totals
 *
 * Results that are mathematically undefined for the input (the mean of no
 * values, a sample variance of one value) are `undefined` rather than errors.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { InvalidArgumentError } from '../errors';

// =============================================================================
// Reductions
// =============================================================================

/**
 * Sum of all elements; `zero` for empty input
 */
export function sum<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T {
  let total = dtype.zero;
  for (const value of values) {
    total = dtype.add(total, value);
  }
  return total;
}

/**
 * Product of all elements
 *
 * Empty input yields `zero`, not `one`.
 */
export function product<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T {
  if (values.length === 0) {
    return dtype.zero;
  }
  let total = dtype.one;
  for (const value of values) {
    total = dtype.multiply(total, value);
  }
  return total;
}

// =============================================================================
// Extrema
// =============================================================================

type Extremum = 'min' | 'max';

function extremumIndex<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  kind: Extremum,
): number | undefined {
  if (values.length === 0) {
    return undefined;
  }
  const sign = kind === 'min' ? -1 : 1;
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    // strict, so the earliest index wins ties
    if (sign * dtype.compare(values[i], values[best]) > 0) {
      best = i;
    }
  }
  return best;
}

/**
 * Index of the first minimum, or `undefined` for empty input
 */
export function argmin<T extends Scalar>(dtype: DType<T>, values: readonly T[]): number | undefined {
  return extremumIndex(dtype, values, 'min');
}

/**
 * Index of the first maximum, or `undefined` for empty input
 */
export function argmax<T extends Scalar>(dtype: DType<T>, values: readonly T[]): number | undefined {
  return extremumIndex(dtype, values, 'max');
}

export function min<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T | undefined {
  const index = argmin(dtype, values);
  return index === undefined ? undefined : values[index];
}

export function max<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T | undefined {
  const index = argmax(dtype, values);
  return index === undefined ? undefined : values[index];
}

// =============================================================================
// Central Tendency and Dispersion
// =============================================================================

/**
 * Arithmetic mean, or `undefined` for empty input
 */
export function mean(dtype: DType<number>, values: readonly number[]): number | undefined {
  assertFloatDType(dtype, 'mean');
  if (values.length === 0) {
    return undefined;
  }
  return dtype.fromNumber(sum(dtype, values) / values.length);
}

/**
 * Middle value of the sorted data; the mean of the two middle values for even counts
 */
export function median(dtype: DType<number>, values: readonly number[]): number | undefined {
  assertFloatDType(dtype, 'median');
  if (values.length === 0) {
    return undefined;
  }
  const sorted = [...values].sort(dtype.compare);
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return dtype.fromNumber((sorted[middle - 1] + sorted[middle]) / 2);
  }
  return sorted[middle];
}

/**
 * `Σ(x - mean)² / (n - ddof)`, or `undefined` when `n <= ddof`
 *
 * `ddof = 0` gives the population variance, `ddof = 1` the sample variance.
 *
 * @throws {InvalidArgumentError} When `ddof` is negative or not an integer
 */
export function variance(dtype: DType<number>, values: readonly number[], ddof = 0): number | undefined {
  assertFloatDType(dtype, 'variance');
  if (!Number.isInteger(ddof) || ddof < 0) {
    throw new InvalidArgumentError(
      'variance',
      `ddof must be a non-negative integer, got ${String(ddof)}`,
      ddof,
    );
  }
  const center = mean(dtype, values);
  if (center === undefined || values.length <= ddof) {
    return undefined;
  }
  let squares = dtype.zero;
  for (const value of values) {
    const deviation = dtype.subtract(value, center);
    squares = dtype.add(squares, dtype.multiply(deviation, deviation));
  }
  return dtype.fromNumber(squares / (values.length - ddof));
}

/**
 * Square root of {@link variance}
 */
export function std(dtype: DType<number>, values: readonly number[], ddof = 0): number | undefined {
  const spread = variance(dtype, values, ddof);
  return spread === undefined ? undefined : dtype.fromNumber(Math.sqrt(spread));
}

// =============================================================================
// Running Totals
// =============================================================================

function scan<T>(values: readonly T[], fn: (acc: T, value: T) => T): T[] {
  const result: T[] = [];
  let acc: T | undefined;
  for (const value of values) {
    acc = acc === undefined ? value : fn(acc, value);
    result.push(acc);
  }
  return result;
}

/**
 * Running sum: `result[i] = values[0] + … + values[i]`
 */
export function cumulativeSum<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T[] {
  return scan(values, dtype.add);
}

/**
 * Running product: `result[i] = values[0] * … * values[i]`
 */
export function cumulativeProduct<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T[] {
  return scan(values, dtype.multiply);
}

// =============================================================================
// Outliers
// =============================================================================

export interface OutlierOptions {
  /** Number of standard deviations beyond which a value is an outlier (default 2) */
  readonly threshold?: number;
  /** Center to measure from; computed from the data when omitted */
  readonly mean?: number;
  /** Spread to scale by; the population std of the data when omitted */
  readonly std?: number;
}

/**
 * Flag every value with `|x - mean| > threshold * std`
 *
 * @example
 * outlierMask(float64, [1, 2, 3, 100], { threshold: 1 }); // [false, false, false, true]
 */
export function outlierMask(
  dtype: DType<number>,
  values: readonly number[],
  options: OutlierOptions = {},
): boolean[] {
  assertFloatDType(dtype, 'outlierMask');
  if (values.length === 0) {
    return [];
  }
  const threshold = options.threshold ?? 2;
  const center = options.mean ?? mean(dtype, values) ?? 0;
  const spread = options.std ?? std(dtype, values) ?? 1;
  return values.map((value) => Math.abs(value - center) > threshold * spread);
}
