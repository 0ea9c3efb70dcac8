/**
 * Runtime DType management and validation
 *
 * Bridges the compile-time restrictions (bigint data cannot be divided) with
 * run-time checks for the cases the type system cannot see, such as an int32
 * vector reaching a floating-point-only kernel.
 */

import type { AnyDType, DType, DTypeName, Float64, Int64, Scalar } from './types';
import { DTYPE_CONSTANTS_MAP, float64, int64 } from './constants';

// =============================================================================
// Lookup and Inference
// =============================================================================

/**
 * Names of every supported dtype, in registry order
 */
export const DTYPE_NAMES: readonly DTypeName[] = Object.freeze(
  Object.keys(DTYPE_CONSTANTS_MAP).filter(isValidDTypeName),
);

/**
 * Check whether a string names a supported dtype
 */
export function isValidDTypeName(name: string): name is DTypeName {
  return name === 'float32' || name === 'float64' || name === 'int32' || name === 'int64';
}

/**
 * Resolve a dtype constant from its name
 *
 * @throws {DTypeError} When the name is not a supported dtype
 */
export function getDType(name: string): AnyDType {
  if (!isValidDTypeName(name)) {
    throw new DTypeError(
      `Unknown dtype '${name}'. Supported dtypes: ${DTYPE_NAMES.join(', ')}`,
      undefined,
      name,
    );
  }
  return DTYPE_CONSTANTS_MAP[name];
}

/**
 * Pick the default dtype for a sequence of values
 *
 * bigint data maps to int64, everything else (including empty input) to float64.
 */
export function inferDType(values: readonly Scalar[]): Float64 | Int64 {
  const first = values[0];
  return typeof first === 'bigint' ? int64 : float64;
}

/**
 * Narrow a dtype to the bigint-backed family
 */
export function isBigIntDType(dtype: DType<number> | DType<bigint>): dtype is DType<bigint> {
  return typeof dtype.zero === 'bigint';
}

/**
 * Check whether a dtype is floating point
 */
export function isFloatDType(dtype: DType): boolean {
  return !dtype.__isInteger;
}

/**
 * Guard for kernels that only make sense for floating-point data
 *
 * @throws {DTypeError} When `dtype` is an integer dtype
 */
export function assertFloatDType(dtype: DType<number>, operation: string): void {
  if (dtype.__isInteger) {
    throw new DTypeError(
      `${operation}: requires a floating-point dtype, got ${dtype.__dtype}`,
      dtype,
    );
  }
}

/**
 * Guard for binary operations whose operands must share a dtype
 *
 * @throws {DTypeError} When the dtypes differ
 */
export function assertSameDType(lhs: DType, rhs: DType, operation: string): void {
  if (lhs.__dtype !== rhs.__dtype) {
    throw new DTypeError(
      `${operation}: dtype mismatch, ${lhs.__dtype} and ${rhs.__dtype} cannot be combined`,
      lhs,
    );
  }
}

/**
 * Validate a single value for `dtype`
 *
 * @throws {DTypeValidationError} When the dtype cannot hold the value
 */
export function validateValue<T extends Scalar>(value: unknown, dtype: DType<T>): T {
  if (!dtype.isValid(value)) {
    throw new DTypeValidationError(value, dtype);
  }
  return value;
}

/**
 * Validate and copy values into a fresh array typed for `dtype`
 *
 * @throws {DTypeValidationError} On the first value the dtype cannot hold
 */
export function validateValues<T extends Scalar>(
  values: readonly unknown[],
  dtype: DType<T>,
): T[] {
  const result: T[] = [];
  for (const value of values) {
    if (!dtype.isValid(value)) {
      throw new DTypeValidationError(value, dtype);
    }
    result.push(value);
  }
  return result;
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when DType operations fail
 */
export class DTypeError extends Error {
  constructor(
    message: string,
    public readonly dtype?: DType,
    public readonly value?: unknown,
  ) {
    super(message);
    this.name = 'DTypeError';
  }
}

/**
 * Error thrown when a value cannot be stored in a dtype
 */
export class DTypeValidationError extends DTypeError {
  constructor(value: unknown, expectedDType: DType) {
    super(
      `Value ${String(value)} is not valid for DType ${expectedDType.__dtype}`,
      expectedDType,
      value,
    );
    this.name = 'DTypeValidationError';
  }
}
