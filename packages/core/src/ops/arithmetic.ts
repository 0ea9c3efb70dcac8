/**
 * Element-wise arithmetic for vectors and matrices
 *
 * Two operands of identical shape are combined position by position. Matrix
 * operations are the vector operation applied row by row, after the whole
 * shape has been validated.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { DivisionByZeroError } from '../errors';
import { BroadcastManager, assertExhaustiveSwitch, type BinaryFn } from '../shape/broadcasting';
import { assertSameShape, vectorShape } from '../shape/runtime';
import type { Rows } from '../shape/types';

/**
 * Binary operations supported by the arithmetic engine
 */
export type BinaryOpType = 'add' | 'subtract' | 'multiply' | 'divide';

/**
 * Resolve the element function for an operation
 *
 * Division is only defined for number dtypes and is checked separately for
 * zero divisors, so it is resolved by {@link divisionFn}.
 */
export function binaryFn<T extends Scalar>(
  dtype: DType<T>,
  op: Exclude<BinaryOpType, 'divide'>,
): BinaryFn<T> {
  switch (op) {
    case 'add':
      return dtype.add;
    case 'subtract':
      return dtype.subtract;
    case 'multiply':
      return dtype.multiply;
    default:
      return assertExhaustiveSwitch(op);
  }
}

/**
 * Element function for floating-point division
 */
export function divisionFn(dtype: DType<number>): BinaryFn<number> {
  return (lhs, rhs) => dtype.fromNumber(lhs / rhs);
}

// =============================================================================
// Vector Operations
// =============================================================================

function elementwise<T extends Scalar>(
  lhs: readonly T[],
  rhs: readonly T[],
  fn: BinaryFn<T>,
  operation: string,
): T[] {
  BroadcastManager.createContext(vectorShape(lhs), vectorShape(rhs), operation);
  return BroadcastManager.elementwise(lhs, rhs, fn);
}

/**
 * `lhs[i] + rhs[i]`
 *
 * @throws {DimensionMismatchError} When the lengths differ
 */
export function add<T extends Scalar>(dtype: DType<T>, lhs: readonly T[], rhs: readonly T[]): T[] {
  return elementwise(lhs, rhs, dtype.add, 'add');
}

/**
 * `lhs[i] - rhs[i]`
 *
 * @throws {DimensionMismatchError} When the lengths differ
 */
export function subtract<T extends Scalar>(
  dtype: DType<T>,
  lhs: readonly T[],
  rhs: readonly T[],
): T[] {
  return elementwise(lhs, rhs, dtype.subtract, 'subtract');
}

/**
 * `lhs[i] * rhs[i]` (the Hadamard product, not the matrix product)
 *
 * @throws {DimensionMismatchError} When the lengths differ
 */
export function multiply<T extends Scalar>(
  dtype: DType<T>,
  lhs: readonly T[],
  rhs: readonly T[],
): T[] {
  return elementwise(lhs, rhs, dtype.multiply, 'multiply');
}

/**
 * `lhs[i] / rhs[i]` for floating-point data
 *
 * @throws {DimensionMismatchError} When the lengths differ
 * @throws {DivisionByZeroError} When any divisor is zero
 * @throws {DTypeError} For integer dtypes
 */
export function divide(dtype: DType<number>, lhs: readonly number[], rhs: readonly number[]): number[] {
  assertFloatDType(dtype, 'divide');
  BroadcastManager.createContext(vectorShape(lhs), vectorShape(rhs), 'divide');
  assertNonZeroDivisors(rhs, 'divide');
  return BroadcastManager.elementwise(lhs, rhs, divisionFn(dtype));
}

/**
 * @throws {DivisionByZeroError} Naming the first zero divisor
 */
export function assertNonZeroDivisors(divisors: readonly number[], operation: string): void {
  const index = divisors.indexOf(0);
  if (index !== -1) {
    throw new DivisionByZeroError(operation, index);
  }
}

// =============================================================================
// Matrix Operations
// =============================================================================

function elementwiseRows<T extends Scalar>(
  lhs: Rows<T>,
  rhs: Rows<T>,
  fn: BinaryFn<T>,
  operation: string,
): T[][] {
  assertSameShape(lhs, rhs, operation);
  return lhs.map((row, i) => BroadcastManager.elementwise(row, rhs[i], fn));
}

/**
 * Row-wise {@link add}
 *
 * @throws {DimensionMismatchError} When the shapes differ
 */
export function addMatrices<T extends Scalar>(dtype: DType<T>, lhs: Rows<T>, rhs: Rows<T>): T[][] {
  return elementwiseRows(lhs, rhs, dtype.add, 'add');
}

/**
 * Row-wise {@link subtract}
 *
 * @throws {DimensionMismatchError} When the shapes differ
 */
export function subtractMatrices<T extends Scalar>(
  dtype: DType<T>,
  lhs: Rows<T>,
  rhs: Rows<T>,
): T[][] {
  return elementwiseRows(lhs, rhs, dtype.subtract, 'subtract');
}

/**
 * Row-wise {@link multiply} (Hadamard product)
 *
 * @throws {DimensionMismatchError} When the shapes differ
 */
export function multiplyMatrices<T extends Scalar>(
  dtype: DType<T>,
  lhs: Rows<T>,
  rhs: Rows<T>,
): T[][] {
  return elementwiseRows(lhs, rhs, dtype.multiply, 'multiply');
}

/**
 * Row-wise {@link divide}
 *
 * @throws {DimensionMismatchError} When the shapes differ
 * @throws {DivisionByZeroError} When any divisor is zero
 */
export function divideMatrices(
  dtype: DType<number>,
  lhs: Rows<number>,
  rhs: Rows<number>,
): number[][] {
  assertFloatDType(dtype, 'divide');
  assertSameShape(lhs, rhs, 'divide');
  rhs.forEach((row, i) => {
    const j = row.indexOf(0);
    if (j !== -1) {
      throw new DivisionByZeroError('divide', [i, j]);
    }
  });
  const fn = divisionFn(dtype);
  return lhs.map((row, i) => BroadcastManager.elementwise(row, rhs[i], fn));
}
