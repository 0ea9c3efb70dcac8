/**
 * Data generation utilities for benchmarks
 */

import { float64, ops } from '@vecta/core';

/**
 * `count` uniform values in [0, 1)
 */
export function generateRandomValues(count: number): number[] {
  return ops.random(float64, count);
}

/**
 * `rows×columns` uniform values in [0, 1)
 */
export function generateRandomRows(rows: number, columns: number): number[][] {
  return ops.random2D(float64, rows, columns);
}

/**
 * `count` values counting up from `start`
 */
export function generateSequentialValues(count: number, start = 0): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}

/**
 * Unit-length embedding rows, as a semantic index would hold them
 */
export function generateEmbeddings(count: number, dimensions: number): number[][] {
  return generateRandomRows(count, dimensions).map((row) => ops.normalized(float64, row));
}
