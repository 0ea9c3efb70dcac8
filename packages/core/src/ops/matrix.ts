/**
 * Matrix algebra on row-major data
 *
 * The true matrix product lives here as {@link multiplyMatrix}; the `*` of the
 * arithmetic engine is the Hadamard product and the two are never interchangeable.
 */

import type { DType, Scalar } from '../dtype/types';
import { DimensionMismatchError, EmptyInputError, InvalidArgumentError } from '../errors';
import { assertRectangular } from '../shape/runtime';
import type { Rows } from '../shape/types';
import { dot } from './vector';

/**
 * Swap rows and columns: an `r×c` input yields a `c×r` result
 *
 * Empty input (no rows, or rows without columns) yields `[]`.
 *
 * @throws {DimensionMismatchError} For ragged input
 */
export function transpose<T>(rows: Rows<T>): T[][] {
  const [rowCount, columnCount] = assertRectangular(rows, 'transpose');
  if (rowCount === 0 || columnCount === 0) {
    return [];
  }
  const result: T[][] = [];
  for (let j = 0; j < columnCount; j++) {
    const column: T[] = new Array<T>(rowCount);
    for (let i = 0; i < rowCount; i++) {
      column[i] = rows[i][j];
    }
    result.push(column);
  }
  return result;
}

/**
 * Matrix product: `result[i][j] = Σ_k lhs[i][k] * rhs[k][j]`
 *
 * @example
 * multiplyMatrix(float64, [[1, 2], [3, 4]], [[5, 6], [7, 8]]); // [[19, 22], [43, 50]]
 *
 * @throws {EmptyInputError} When either operand has no rows
 * @throws {DimensionMismatchError} When `lhs` columns differ from `rhs` rows
 */
export function multiplyMatrix<T extends Scalar>(dtype: DType<T>, lhs: Rows<T>, rhs: Rows<T>): T[][] {
  const [lhsRows, lhsColumns] = assertRectangular(lhs, 'multiplyMatrix');
  const [rhsRows, rhsColumns] = assertRectangular(rhs, 'multiplyMatrix');
  if (lhsRows === 0 || rhsRows === 0) {
    throw new EmptyInputError('multiplyMatrix', 'matrices must not be empty');
  }
  if (lhsColumns !== rhsRows) {
    throw new DimensionMismatchError(
      'multiplyMatrix',
      [lhsRows, lhsColumns],
      [rhsRows, rhsColumns],
      'left column count must equal right row count',
    );
  }

  const result: T[][] = [];
  for (let i = 0; i < lhsRows; i++) {
    const row: T[] = new Array<T>(rhsColumns);
    for (let j = 0; j < rhsColumns; j++) {
      let sum = dtype.zero;
      for (let k = 0; k < lhsColumns; k++) {
        sum = dtype.add(sum, dtype.multiply(lhs[i][k], rhs[k][j]));
      }
      row[j] = sum;
    }
    result.push(row);
  }
  return result;
}

/**
 * Matrix-vector product: `result[i] = dot(rows[i], vector)`
 *
 * @example
 * transform(float64, [[0, -1], [1, 0]], [1, 0]); // [0, 1]
 *
 * @throws {DimensionMismatchError} When `vector.length` differs from the column count
 */
export function transform<T extends Scalar>(dtype: DType<T>, rows: Rows<T>, vector: readonly T[]): T[] {
  const shape = assertRectangular(rows, 'transform');
  if (shape[1] !== vector.length) {
    throw new DimensionMismatchError(
      'transform',
      [shape[1]],
      [vector.length],
      'vector length must equal the matrix column count',
    );
  }
  return rows.map((row) => dot(dtype, row, vector));
}

/**
 * {@link transform} with the vector written first
 */
export function transformedBy<T extends Scalar>(
  dtype: DType<T>,
  vector: readonly T[],
  rows: Rows<T>,
): T[] {
  return transform(dtype, rows, vector);
}

// =============================================================================
// Construction
// =============================================================================

/**
 * `size×size` matrix with `one` on the diagonal and `zero` elsewhere
 *
 * @throws {EmptyInputError} When `size` is not positive
 * @throws {InvalidArgumentError} When `size` is not an integer
 */
export function identity<T extends Scalar>(dtype: DType<T>, size: number): T[][] {
  if (size <= 0) {
    throw new EmptyInputError('identity', `size must be positive, got ${String(size)}`);
  }
  if (!Number.isInteger(size)) {
    throw new InvalidArgumentError('identity', `size must be an integer, got ${String(size)}`, size);
  }
  return diagonalOf(dtype, new Array<T>(size).fill(dtype.one));
}

/**
 * Square matrix with `values` on the diagonal and `zero` elsewhere
 *
 * @throws {EmptyInputError} When `values` is empty
 */
export function diag<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T[][] {
  if (values.length === 0) {
    throw new EmptyInputError('diag', 'diagonal values must not be empty');
  }
  return diagonalOf(dtype, values);
}

function diagonalOf<T extends Scalar>(dtype: DType<T>, values: readonly T[]): T[][] {
  return values.map((value, i) => {
    const row = new Array<T>(values.length).fill(dtype.zero);
    row[i] = value;
    return row;
  });
}

// =============================================================================
// Extraction
// =============================================================================

function assertIndex(index: number, count: number, operation: string, axis: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new InvalidArgumentError(
      operation,
      `${axis} index ${String(index)} out of range for ${String(count)} ${axis}s`,
      index,
    );
  }
}

/**
 * Entries of column `index`, top to bottom
 *
 * @throws {InvalidArgumentError} When `index` is outside `0..columnCount-1`
 */
export function column<T>(rows: Rows<T>, index: number): T[] {
  const [, columnCount] = assertRectangular(rows, 'column');
  assertIndex(index, columnCount, 'column', 'column');
  return rows.map((row) => row[index]);
}

/**
 * Copy of row `index`
 *
 * @throws {InvalidArgumentError} When `index` is outside `0..rowCount-1`
 */
export function row<T>(rows: Rows<T>, index: number): T[] {
  const [rowCount] = assertRectangular(rows, 'row');
  assertIndex(index, rowCount, 'row', 'row');
  return [...rows[index]];
}
