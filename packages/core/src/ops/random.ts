/**
 * Uniform random data
 *
 * Values come from a {@link RandomSource}, `Math.random` unless the caller
 * supplies another. There is no seeding API.
 */

import type { DType } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { InvalidArgumentError } from '../errors';
import { assertCount } from './generation';

/**
 * Produces uniform values in [0, 1)
 */
export type RandomSource = () => number;

/**
 * `count` uniform samples in [0, 1)
 *
 * @throws {InvalidArgumentError} When `count` is negative
 */
export function random(dtype: DType<number>, count: number, source: RandomSource = Math.random): number[] {
  assertFloatDType(dtype, 'random');
  assertCount(count, 'random');
  return Array.from({ length: count }, () => dtype.fromNumber(source()));
}

/**
 * `rows×columns` matrix of uniform samples in [0, 1)
 *
 * @throws {InvalidArgumentError} When either dimension is not positive
 */
export function random2D(
  dtype: DType<number>,
  rows: number,
  columns: number,
  source: RandomSource = Math.random,
): number[][] {
  assertFloatDType(dtype, 'random');
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows <= 0 || columns <= 0) {
    throw new InvalidArgumentError(
      'random',
      `dimensions must be positive integers, got ${String(rows)}x${String(columns)}`,
    );
  }
  return Array.from({ length: rows }, () => random(dtype, columns, source));
}
