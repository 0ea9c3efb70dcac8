/**
 * Container creation functions
 *
 * Number data defaults to float64 and bigint data to int64; pass `{ dtype }`
 * to choose another. Input is validated against the dtype and copied, so the
 * caller's arrays are never frozen or retained.
 */

import { float64 } from '../dtype/constants';
import { inferDType, isBigIntDType, validateValue, validateValues } from '../dtype/runtime';
import type { DType, Scalar, TensorOptions } from '../dtype/types';
import type { MatrixShape, Rows, VectorShape } from '../shape/types';
import {
  arange as arangeValues,
  diag as diagonal,
  filled,
  filledRows,
  identity as identityRows,
  linspace as linspaceValues,
  random as randomValues,
  random2D,
  type RandomSource,
} from '../ops';
import { Matrix } from './matrix';
import { Vector } from './vector';

/**
 * Options selecting a bigint-backed dtype
 */
export interface BigIntOptions {
  readonly dtype: DType<bigint>;
}

// =============================================================================
// From Data
// =============================================================================

/**
 * Create a vector from an array of values
 *
 * @example
 * vector([1, 2, 3]);                    // float64
 * vector([1, 2, 3], { dtype: int32 });  // int32
 * vector([1n, 2n]);                     // int64
 *
 * @throws {DTypeValidationError} When a value does not fit the dtype
 */
export function vector(data: readonly number[], options?: TensorOptions<number>): Vector<number>;
export function vector(data: readonly bigint[], options?: TensorOptions<bigint>): Vector<bigint>;
export function vector(
  data: readonly number[] | readonly bigint[],
  options?: TensorOptions<number> | TensorOptions<bigint>,
): Vector<number> | Vector<bigint> {
  const dtype = options?.dtype ?? inferDType(data);
  if (isBigIntDType(dtype)) {
    return new Vector(validateValues(data, dtype), dtype);
  }
  return new Vector(validateValues(data, dtype), dtype);
}

/**
 * Create a matrix from row-major data
 *
 * @example
 * matrix([[1, 2], [3, 4]]);
 *
 * @throws {DimensionMismatchError} For ragged rows
 * @throws {DTypeValidationError} When a value does not fit the dtype
 */
export function matrix(rows: Rows<number>, options?: TensorOptions<number>): Matrix<number>;
export function matrix(rows: Rows<bigint>, options?: TensorOptions<bigint>): Matrix<bigint>;
export function matrix(
  rows: Rows<number> | Rows<bigint>,
  options?: TensorOptions<number> | TensorOptions<bigint>,
): Matrix<number> | Matrix<bigint> {
  const source: Rows<Scalar> = rows;
  const dtype = options?.dtype ?? inferDType(source[0] ?? []);
  if (isBigIntDType(dtype)) {
    return new Matrix(
      source.map((values) => validateValues(values, dtype)),
      dtype,
    );
  }
  return new Matrix(
    source.map((values) => validateValues(values, dtype)),
    dtype,
  );
}

// =============================================================================
// Constant Fills
// =============================================================================

function filledWith<T extends Scalar>(
  shape: VectorShape | MatrixShape,
  dtype: DType<T>,
  value: T,
  operation: string,
): Vector<T> | Matrix<T> {
  if (shape.length === 1) {
    return new Vector(filled(shape[0], value, operation), dtype);
  }
  return new Matrix(filledRows(shape[0], shape[1], value, operation), dtype);
}

/**
 * Vector (`[count]`) or matrix (`[rows, columns]`) of zeros
 *
 * @throws {InvalidArgumentError} When a dimension is negative
 */
export function zeros(shape: VectorShape, options?: TensorOptions<number>): Vector<number>;
export function zeros(shape: VectorShape, options: BigIntOptions): Vector<bigint>;
export function zeros(shape: MatrixShape, options?: TensorOptions<number>): Matrix<number>;
export function zeros(shape: MatrixShape, options: BigIntOptions): Matrix<bigint>;
export function zeros(
  shape: VectorShape | MatrixShape,
  options?: TensorOptions<number> | BigIntOptions,
): Vector<number> | Vector<bigint> | Matrix<number> | Matrix<bigint> {
  const dtype = options?.dtype ?? float64;
  return isBigIntDType(dtype)
    ? filledWith(shape, dtype, dtype.zero, 'zeros')
    : filledWith(shape, dtype, dtype.zero, 'zeros');
}

/**
 * Vector (`[count]`) or matrix (`[rows, columns]`) of ones
 *
 * @throws {InvalidArgumentError} When a dimension is negative
 */
export function ones(shape: VectorShape, options?: TensorOptions<number>): Vector<number>;
export function ones(shape: VectorShape, options: BigIntOptions): Vector<bigint>;
export function ones(shape: MatrixShape, options?: TensorOptions<number>): Matrix<number>;
export function ones(shape: MatrixShape, options: BigIntOptions): Matrix<bigint>;
export function ones(
  shape: VectorShape | MatrixShape,
  options?: TensorOptions<number> | BigIntOptions,
): Vector<number> | Vector<bigint> | Matrix<number> | Matrix<bigint> {
  const dtype = options?.dtype ?? float64;
  return isBigIntDType(dtype)
    ? filledWith(shape, dtype, dtype.one, 'ones')
    : filledWith(shape, dtype, dtype.one, 'ones');
}

/**
 * Vector or matrix with every entry set to `value`
 *
 * @example
 * full([2, 2], 7); // [[7, 7], [7, 7]]
 *
 * @throws {InvalidArgumentError} When a dimension is negative
 * @throws {DTypeValidationError} When `value` does not fit the dtype
 */
export function full(shape: VectorShape, value: number, options?: TensorOptions<number>): Vector<number>;
export function full(shape: VectorShape, value: bigint, options?: TensorOptions<bigint>): Vector<bigint>;
export function full(shape: MatrixShape, value: number, options?: TensorOptions<number>): Matrix<number>;
export function full(shape: MatrixShape, value: bigint, options?: TensorOptions<bigint>): Matrix<bigint>;
export function full(
  shape: VectorShape | MatrixShape,
  value: number | bigint,
  options?: TensorOptions<number> | TensorOptions<bigint>,
): Vector<number> | Vector<bigint> | Matrix<number> | Matrix<bigint> {
  const dtype = options?.dtype ?? inferDType([value]);
  return isBigIntDType(dtype)
    ? filledWith(shape, dtype, validateValue(value, dtype), 'full')
    : filledWith(shape, dtype, validateValue(value, dtype), 'full');
}

// =============================================================================
// Special Matrices
// =============================================================================

/**
 * `size×size` identity matrix
 *
 * @throws {EmptyInputError} When `size` is not positive
 */
export function identity(size: number, options?: TensorOptions<number>): Matrix<number>;
export function identity(size: number, options: BigIntOptions): Matrix<bigint>;
export function identity(
  size: number,
  options?: TensorOptions<number> | BigIntOptions,
): Matrix<number> | Matrix<bigint> {
  const dtype = options?.dtype ?? float64;
  return isBigIntDType(dtype)
    ? new Matrix(identityRows(dtype, size), dtype)
    : new Matrix(identityRows(dtype, size), dtype);
}

/**
 * Square matrix with `values` on the diagonal
 *
 * @throws {EmptyInputError} When `values` is empty
 */
export function diag<T extends Scalar>(values: Vector<T>): Matrix<T> {
  return new Matrix(diagonal(values.dtype, values.data), values.dtype);
}

// =============================================================================
// Sequences
// =============================================================================

/**
 * `num` evenly spaced samples from `start` to `stop` inclusive
 *
 * @throws {InvalidArgumentError} When `num` is not positive
 */
export function linspace(
  start: number,
  stop: number,
  num: number,
  options?: TensorOptions<number>,
): Vector<number> {
  const dtype = options?.dtype ?? float64;
  return new Vector(linspaceValues(dtype, start, stop, num), dtype);
}

/**
 * Values from `start` up to (or, for a negative step, down to) `stop` exclusive
 *
 * @example
 * arange(0, 1, 0.25).toArray(); // [0, 0.25, 0.5, 0.75]
 * arange(10n, 0n, -3n).toArray(); // [10n, 7n, 4n, 1n]
 *
 * @throws {InvalidArgumentError} When `step` is zero
 */
export function arange(start: number, stop: number, step?: number, options?: TensorOptions<number>): Vector<number>;
export function arange(start: bigint, stop: bigint, step?: bigint, options?: TensorOptions<bigint>): Vector<bigint>;
export function arange(
  start: number | bigint,
  stop: number | bigint,
  step?: number | bigint,
  options?: TensorOptions<number> | TensorOptions<bigint>,
): Vector<number> | Vector<bigint> {
  const dtype = options?.dtype ?? inferDType([start]);
  if (isBigIntDType(dtype)) {
    return new Vector(
      arangeValues(
        dtype,
        validateValue(start, dtype),
        validateValue(stop, dtype),
        step === undefined ? dtype.one : validateValue(step, dtype),
      ),
      dtype,
    );
  }
  return new Vector(
    arangeValues(
      dtype,
      validateValue(start, dtype),
      validateValue(stop, dtype),
      step === undefined ? dtype.one : validateValue(step, dtype),
    ),
    dtype,
  );
}

// =============================================================================
// Random Data
// =============================================================================

export interface RandomOptions extends TensorOptions<number> {
  /** Uniform [0, 1) source, `Math.random` by default */
  readonly source?: RandomSource;
}

/**
 * Uniform samples in [0, 1): a vector for `[count]`, a matrix for `[rows, columns]`
 *
 * @throws {InvalidArgumentError} When the count is negative or a matrix dimension is not positive
 */
export function random(shape: VectorShape, options?: RandomOptions): Vector<number>;
export function random(shape: MatrixShape, options?: RandomOptions): Matrix<number>;
export function random(
  shape: VectorShape | MatrixShape,
  options: RandomOptions = {},
): Vector<number> | Matrix<number> {
  const dtype = options.dtype ?? float64;
  if (shape.length === 1) {
    return new Vector(randomValues(dtype, shape[0], options.source), dtype);
  }
  return new Matrix(random2D(dtype, shape[0], shape[1], options.source), dtype);
}
