/**
 * Common container sizes for benchmarking
 */

import type { MatrixShape, VectorShape } from '@vecta/core';

export interface BenchmarkSize<S extends VectorShape | MatrixShape> {
  readonly name: string;
  readonly shape: S;
  readonly elements: number;
}

export const VECTOR_SIZES: readonly BenchmarkSize<VectorShape>[] = [
  { name: 'tiny', shape: [10], elements: 10 },
  { name: 'small', shape: [100], elements: 100 },
  { name: 'medium', shape: [1000], elements: 1000 },
  { name: 'large', shape: [10000], elements: 10000 },
  { name: 'xlarge', shape: [100000], elements: 100000 },
];

export const MATRIX_SIZES: readonly BenchmarkSize<MatrixShape>[] = [
  { name: 'tiny', shape: [10, 10], elements: 100 },
  { name: 'small', shape: [32, 32], elements: 1024 },
  { name: 'medium', shape: [100, 100], elements: 10000 },
  { name: 'large', shape: [256, 256], elements: 65536 },
];

export function formatSize(size: BenchmarkSize<VectorShape | MatrixShape>): string {
  return `${size.name} ${size.shape.join('x')} (${size.elements.toLocaleString()} elements)`;
}
