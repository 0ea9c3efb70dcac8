/**
 * Boolean/comparison engine
 *
 * Comparisons produce masks the same length as their input; masks select from
 * a source array with {@link masked} and {@link choose}.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertExhaustiveSwitch } from '../shape/broadcasting';
import { assertSameLength } from '../shape/runtime';

/**
 * Same-length boolean selector
 */
export type Mask = readonly boolean[];

/**
 * Supported element comparisons
 */
export type ComparisonOp =
  | 'isEqual'
  | 'isGreaterThan'
  | 'isLessThan'
  | 'isGreaterThanOrEqual'
  | 'isLessThanOrEqual';

function holds(op: ComparisonOp, order: number): boolean {
  switch (op) {
    case 'isEqual':
      return order === 0;
    case 'isGreaterThan':
      return order > 0;
    case 'isLessThan':
      return order < 0;
    case 'isGreaterThanOrEqual':
      return order >= 0;
    case 'isLessThanOrEqual':
      return order <= 0;
    default:
      return assertExhaustiveSwitch(op);
  }
}

function isSequence<T extends Scalar>(operand: T | readonly T[]): operand is readonly T[] {
  return Array.isArray(operand);
}

/**
 * Compare every element against a scalar, or element-wise against a same-length array
 *
 * NaN compares as neither less, greater nor equal, so every comparison with it is false.
 *
 * @example
 * compare(float64, [1, 5, 3], 'isGreaterThan', 2); // [false, true, true]
 *
 * @throws {DimensionMismatchError} When an array operand has a different length
 */
export function compare<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  op: ComparisonOp,
  operand: T | readonly T[],
): boolean[] {
  if (isSequence(operand)) {
    assertSameLength(values, operand, op);
    return values.map((value, i) => isOrdered(value, operand[i]) && holds(op, dtype.compare(value, operand[i])));
  }
  return values.map((value) => isOrdered(value, operand) && holds(op, dtype.compare(value, operand)));
}

function isOrdered(lhs: Scalar, rhs: Scalar): boolean {
  return !Number.isNaN(lhs) && !Number.isNaN(rhs);
}

export function isEqual<T extends Scalar>(dtype: DType<T>, values: readonly T[], operand: T | readonly T[]): boolean[] {
  return compare(dtype, values, 'isEqual', operand);
}

export function isGreaterThan<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  operand: T | readonly T[],
): boolean[] {
  return compare(dtype, values, 'isGreaterThan', operand);
}

export function isLessThan<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  operand: T | readonly T[],
): boolean[] {
  return compare(dtype, values, 'isLessThan', operand);
}

export function isGreaterThanOrEqual<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  operand: T | readonly T[],
): boolean[] {
  return compare(dtype, values, 'isGreaterThanOrEqual', operand);
}

export function isLessThanOrEqual<T extends Scalar>(
  dtype: DType<T>,
  values: readonly T[],
  operand: T | readonly T[],
): boolean[] {
  return compare(dtype, values, 'isLessThanOrEqual', operand);
}

// =============================================================================
// Logical Combinators
// =============================================================================

/**
 * @throws {DimensionMismatchError} When the masks differ in length
 */
export function and(lhs: Mask, rhs: Mask): boolean[] {
  assertSameLength(lhs, rhs, 'and');
  return lhs.map((value, i) => value && rhs[i]);
}

/**
 * @throws {DimensionMismatchError} When the masks differ in length
 */
export function or(lhs: Mask, rhs: Mask): boolean[] {
  assertSameLength(lhs, rhs, 'or');
  return lhs.map((value, i) => value || rhs[i]);
}

export function not(mask: Mask): boolean[] {
  return mask.map((value) => !value);
}

/**
 * Indices where the mask is true, ascending
 */
export function trueIndices(mask: Mask): number[] {
  const indices: number[] = [];
  mask.forEach((value, i) => {
    if (value) {
      indices.push(i);
    }
  });
  return indices;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Elements whose mask entry is true, in their original order
 *
 * @throws {DimensionMismatchError} When the mask length differs from the source
 */
export function masked<E>(values: readonly E[], mask: Mask): E[] {
  assertSameLength(values, mask, 'masked');
  return values.filter((_, i) => mask[i]);
}

/**
 * Element-wise select: `condition[i] ? values[i] : otherwise[i]`
 *
 * @throws {DimensionMismatchError} When any of the three lengths differ
 */
export function choose<E>(values: readonly E[], condition: Mask, otherwise: readonly E[]): E[] {
  assertSameLength(values, condition, 'choose');
  assertSameLength(values, otherwise, 'choose');
  return values.map((value, i) => (condition[i] ? value : otherwise[i]));
}
