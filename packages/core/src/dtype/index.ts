/**
 * DType System - numeric scalar types for vectors and matrices
 *
 * A dtype is a frozen object carrying the arithmetic for one scalar type.
 * Kernels are generic over the scalar and receive the dtype as their first
 * argument, so float32 results stay rounded to single precision and int32 /
 * int64 results wrap the way their typed arrays would.
 *
 * @example Basic Usage
 * ```typescript
 * import { getDType, float32, int64 } from './dtype';
 *
 * float32.add(0.1, 0.2);      // 0.30000001192092896
 * int64.multiply(2n ** 62n, 4n); // 0n (wrapped)
 * getDType('int32').__isInteger; // true
 * ```
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  Scalar,
  DType,
  DTypeName,
  Float32,
  Float64,
  Int32,
  Int64,
  AnyDType,
  FloatDType,
  ScalarOf,
  DTypeFromName,
  TensorOptions,
} from './types';

// =============================================================================
// Runtime Exports
// =============================================================================

export { float32, float64, int32, int64, DTYPE_CONSTANTS_MAP, getDTypeConstant } from './constants';

export {
  DTYPE_NAMES,
  isValidDTypeName,
  getDType,
  inferDType,
  isBigIntDType,
  isFloatDType,
  assertFloatDType,
  assertSameDType,
  validateValue,
  validateValues,
  DTypeError,
  DTypeValidationError,
} from './runtime';
