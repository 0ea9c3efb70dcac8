/**
 * Broadcast operations: scalar-to-array and vector-to-matrix
 *
 * Scalar forms keep track of which side the scalar was written on, because
 * `10 - [1, 2, 3]` is `[9, 8, 7]` while `[1, 2, 3] - 10` is `[-9, -8, -7]`.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { DivisionByZeroError } from '../errors';
import {
  BroadcastManager,
  type BinaryFn,
  type BroadcastAxis,
  type ScalarSide,
} from '../shape/broadcasting';
import { assertRectangular, vectorShape } from '../shape/runtime';
import type { Rows } from '../shape/types';
import { assertNonZeroDivisors, binaryFn, divisionFn, type BinaryOpType } from './arithmetic';

/**
 * Named operations usable without a division-by-zero check
 */
export type ScalarOpType = Exclude<BinaryOpType, 'divide'>;

/**
 * Either a named operation or a caller-supplied element function
 */
export type BroadcastOp<T> = ScalarOpType | BinaryFn<T>;

function resolveOp<T extends Scalar>(dtype: DType<T>, op: BroadcastOp<T>): BinaryFn<T> {
  return typeof op === 'function' ? conformingFn(dtype, op) : binaryFn(dtype, op);
}

// =============================================================================
// Scalar Broadcasting
// =============================================================================

/**
 * Combine every element with a scalar
 *
 * @example
 * broadcastScalar(float64, [1, 2, 3], 'subtract', 10);          // [-9, -8, -7]
 * broadcastScalar(float64, [1, 2, 3], 'subtract', 10, 'left');  // [9, 8, 7]
 */
export function broadcastScalar<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  op: BroadcastOp<T>,
  scalar: T,
  side: ScalarSide = 'right',
): T[] {
  return BroadcastManager.scalar(values, scalar, resolveOp(dtype, op), side);
}

/**
 * Divide every element by a scalar (`'right'`) or a scalar by every element (`'left'`)
 *
 * @throws {DivisionByZeroError} When the divisor (scalar or element) is zero
 */
export function broadcastDivide(
  dtype: DType<number>,
  values: readonly number[],
  scalar: number,
  side: ScalarSide = 'right',
): number[] {
  assertFloatDType(dtype, 'divide');
  assertScalarDivisors(values, scalar, side);
  return BroadcastManager.scalar(values, scalar, divisionFn(dtype), side);
}

/**
 * {@link broadcastScalar} over every row of a matrix
 */
export function broadcastScalarRows<T extends Scalar>(
  dtype: DType<T>,
  rows: Rows<T>,
  op: BroadcastOp<T>,
  scalar: T,
  side: ScalarSide = 'right',
): T[][] {
  assertRectangular(rows, 'broadcast');
  return BroadcastManager.scalarRows(rows, scalar, resolveOp(dtype, op), side);
}

/**
 * {@link broadcastDivide} over every row of a matrix
 *
 * @throws {DivisionByZeroError} When the divisor (scalar or entry) is zero
 */
export function broadcastDivideRows(
  dtype: DType<number>,
  rows: Rows<number>,
  scalar: number,
  side: ScalarSide = 'right',
): number[][] {
  assertFloatDType(dtype, 'divide');
  assertRectangular(rows, 'divide');
  if (side === 'right') {
    if (scalar === 0) {
      throw new DivisionByZeroError('divide');
    }
  } else {
    rows.forEach((row, i) => {
      const j = row.indexOf(0);
      if (j !== -1) {
        throw new DivisionByZeroError('divide', [i, j]);
      }
    });
  }
  return BroadcastManager.scalarRows(rows, scalar, divisionFn(dtype), side);
}

function assertScalarDivisors(values: readonly number[], scalar: number, side: ScalarSide): void {
  if (side === 'right') {
    if (scalar === 0) {
      throw new DivisionByZeroError('divide');
    }
    return;
  }
  assertNonZeroDivisors(values, 'divide');
}

// =============================================================================
// Custom Operations
// =============================================================================

/**
 * Apply a caller-supplied operation with a scalar or a same-length vector
 *
 * Results are converted back into the dtype, so an exponentiation on float32
 * data stays float32.
 *
 * @example
 * broadcastWith(float64, [1, 2, 3], 2, Math.pow); // [1, 4, 9]
 *
 * @throws {DimensionMismatchError} When a vector operand has a different length
 */
export function broadcastWith<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  operand: T | readonly T[],
  operation: BinaryFn<T>,
): T[] {
  const fn = conformingFn(dtype, operation);
  if (isSequence(operand)) {
    BroadcastManager.createContext(vectorShape(values), vectorShape(operand), 'broadcast');
    return BroadcastManager.elementwise(values, operand, fn);
  }
  return BroadcastManager.scalar(values, operand, fn);
}

function isSequence<T extends Scalar>(operand: T | readonly T[]): operand is readonly T[] {
  return Array.isArray(operand);
}

/**
 * Wrap a custom operation so its results are stored in the dtype's precision
 */
function conformingFn<T extends Scalar>(dtype: DType<T>, operation: BinaryFn<T>): BinaryFn<T> {
  return (lhs, rhs) => {
    const value = operation(lhs, rhs);
    return typeof value === 'number' ? dtype.fromNumber(value) : value;
  };
}

// =============================================================================
// Vector-to-Matrix Broadcasting
// =============================================================================

function broadcastAxis<T extends Scalar>(
  dtype: DType<T>,
  rows: Rows<T>,
  vector: readonly T[],
  op: BroadcastOp<T>,
  axis: BroadcastAxis,
): T[][] {
  const operation = axis === 'row' ? 'broadcastRow' : 'broadcastColumn';
  const shape = assertRectangular(rows, operation);
  BroadcastManager.createContext(shape, vectorShape(vector), operation, axis);
  const fn = resolveOp(dtype, op);
  return axis === 'row'
    ? BroadcastManager.rows(rows, vector, fn)
    : BroadcastManager.columns(rows, vector, fn);
}

/**
 * Apply a vector to every row: `result[i][j] = op(rows[i][j], vector[j])`
 *
 * @throws {DimensionMismatchError} When `vector.length` differs from the column count
 */
export function broadcastRow<T extends Scalar>(
  dtype: DType<T>,
  rows: Rows<T>,
  vector: readonly T[],
  op: BroadcastOp<T>,
): T[][] {
  return broadcastAxis(dtype, rows, vector, op, 'row');
}

/**
 * Apply vector element `i` to every entry of row `i`: `result[i][j] = op(rows[i][j], vector[i])`
 *
 * @throws {DimensionMismatchError} When `vector.length` differs from the row count
 */
export function broadcastColumn<T extends Scalar>(
  dtype: DType<T>,
  rows: Rows<T>,
  vector: readonly T[],
  op: BroadcastOp<T>,
): T[][] {
  return broadcastAxis(dtype, rows, vector, op, 'column');
}
