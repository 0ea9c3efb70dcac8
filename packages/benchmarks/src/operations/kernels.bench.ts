/**
 * Kernel benchmarks
 *
 * Element-wise arithmetic, reductions, vector algebra and the matrix product
 * across vector and matrix sizes.
 */

import { bench, describe } from 'vitest';
import { matrix, vector } from '@vecta/core';
import { generateRandomRows, generateRandomValues } from '../utils/data';
import { MATRIX_SIZES, VECTOR_SIZES } from '../utils/sizes';

describe('vector arithmetic', () => {
  for (const size of VECTOR_SIZES) {
    const a = vector(generateRandomValues(size.elements));
    const b = vector(generateRandomValues(size.elements)).add(1);

    bench(`add ${size.name} (${size.elements.toString()} elements)`, () => {
      a.add(b);
    });

    bench(`divide ${size.name} (${size.elements.toString()} elements)`, () => {
      a.divide(b);
    });

    bench(`scalar multiply ${size.name} (${size.elements.toString()} elements)`, () => {
      a.multiply(2);
    });
  }
});

describe('reductions', () => {
  for (const size of VECTOR_SIZES) {
    const a = vector(generateRandomValues(size.elements));

    bench(`sum ${size.name}`, () => {
      a.sum();
    });

    bench(`median ${size.name}`, () => {
      a.median();
    });

    bench(`std ${size.name}`, () => {
      a.std();
    });
  }
});

describe('vector algebra', () => {
  for (const size of VECTOR_SIZES) {
    const a = vector(generateRandomValues(size.elements));
    const b = vector(generateRandomValues(size.elements));

    bench(`dot ${size.name}`, () => {
      a.dot(b);
    });

    bench(`cosineOfAngle ${size.name}`, () => {
      a.cosineOfAngle(b);
    });
  }
});

describe('matrix algebra', () => {
  for (const size of MATRIX_SIZES) {
    const [rows, columns] = size.shape;
    const a = matrix(generateRandomRows(rows, columns));
    const b = matrix(generateRandomRows(columns, rows));

    bench(`multiplyMatrix ${size.name} ${size.shape.join('x')}`, () => {
      a.multiplyMatrix(b);
    });

    bench(`transpose ${size.name} ${size.shape.join('x')}`, () => {
      a.transpose();
    });

    bench(`hadamard ${size.name} ${size.shape.join('x')}`, () => {
      a.multiply(a);
    });
  }
});
