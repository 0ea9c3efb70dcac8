/**
 * Container creation benchmarks
 *
 * Creating vectors and matrices from data, constant fills and sequences.
 */

import { bench, describe } from 'vitest';
import { arange, float32, int32, linspace, matrix, ones, vector, zeros } from '@vecta/core';
import { generateRandomRows, generateRandomValues, generateSequentialValues } from '../utils/data';
import { MATRIX_SIZES, VECTOR_SIZES } from '../utils/sizes';

describe('creation from data', () => {
  for (const size of VECTOR_SIZES) {
    const data = generateRandomValues(size.elements);
    const integers = generateSequentialValues(size.elements);

    bench(`vector ${size.name} (${size.elements.toString()} elements) - float64`, () => {
      vector(data);
    });

    bench(`vector ${size.name} (${size.elements.toString()} elements) - int32`, () => {
      vector(integers, { dtype: int32 });
    });
  }

  for (const size of MATRIX_SIZES) {
    const [rows, columns] = size.shape;
    const data = generateRandomRows(rows, columns);

    bench(`matrix ${size.name} ${size.shape.join('x')} - float32`, () => {
      matrix(data, { dtype: float32 });
    });
  }
});

describe('constant fills', () => {
  for (const size of MATRIX_SIZES) {
    bench(`zeros ${size.name} ${size.shape.join('x')}`, () => {
      zeros(size.shape);
    });

    bench(`ones ${size.name} ${size.shape.join('x')}`, () => {
      ones(size.shape);
    });
  }
});

describe('sequences', () => {
  bench('linspace 10000 samples', () => {
    linspace(0, 1, 10000);
  });

  bench('arange 10000 steps', () => {
    arange(0, 10000);
  });
});
