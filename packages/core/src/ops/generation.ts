/**
 * Sequence generation: constant fills, evenly spaced samples and ranges
 */

import type { DType, Scalar } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { InvalidArgumentError } from '../errors';

/**
 * @throws {InvalidArgumentError} When `count` is negative or not an integer
 */
export function assertCount(count: number, operation: string, name = 'count'): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError(
      operation,
      `${name} must be a non-negative integer, got ${String(count)}`,
      count,
    );
  }
}

/**
 * `count` copies of `value`
 *
 * @throws {InvalidArgumentError} When `count` is negative
 */
export function filled<T>(count: number, value: T, operation = 'full'): T[] {
  assertCount(count, operation);
  return new Array<T>(count).fill(value);
}

/**
 * `rows×columns` matrix of `value`, each row its own array
 *
 * @throws {InvalidArgumentError} When either dimension is negative
 */
export function filledRows<T>(rows: number, columns: number, value: T, operation = 'full'): T[][] {
  assertCount(rows, operation, 'rows');
  assertCount(columns, operation, 'columns');
  return Array.from({ length: rows }, () => new Array<T>(columns).fill(value));
}

/**
 * `num` evenly spaced samples from `start` to `stop`, both included
 *
 * @example
 * linspace(float64, 0, 1, 5); // [0, 0.25, 0.5, 0.75, 1]
 *
 * @throws {InvalidArgumentError} When `num` is not a positive integer
 */
export function linspace(dtype: DType<number>, start: number, stop: number, num: number): number[] {
  assertFloatDType(dtype, 'linspace');
  if (!Number.isInteger(num) || num <= 0) {
    throw new InvalidArgumentError('linspace', `num must be a positive integer, got ${String(num)}`, num);
  }
  if (num === 1) {
    return [dtype.fromNumber(start)];
  }
  const step = (stop - start) / (num - 1);
  return Array.from({ length: num }, (_, i) => dtype.fromNumber(start + step * i));
}

/**
 * Values from `start` towards `stop` (excluded), advancing by `step`
 *
 * Each value is the previous one plus `step`, so float steps accumulate
 * rounding. Negative steps count down.
 *
 * @example
 * arange(float64, 0, 5);      // [0, 1, 2, 3, 4]
 * arange(int64, 5n, 0n, -2n); // [5n, 3n, 1n]
 *
 * @throws {InvalidArgumentError} When `step` is zero
 */
export function arange<T extends Scalar>(dtype: DType<T>, start: T, stop: T, step: T = dtype.one): T[] {
  const direction = dtype.compare(step, dtype.zero);
  if (direction === 0) {
    throw new InvalidArgumentError('arange', 'step must not be zero', step);
  }
  const result: T[] = [];
  const sign = Math.sign(direction);
  let current = start;
  while (Math.sign(dtype.compare(stop, current)) === sign) {
    result.push(current);
    const next = dtype.add(current, step);
    // stalled by float precision, or wrapped past the integer range
    if (Math.sign(dtype.compare(next, current)) !== sign) {
      break;
    }
    current = next;
  }
  return result;
}
