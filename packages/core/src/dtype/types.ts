/**
 * DType definitions for the numeric kernel
 *
 * A dtype describes the scalar type stored in a vector or matrix and carries
 * the arithmetic for it. Kernels are generic over the scalar type and take the
 * dtype as their first argument, so the same loop serves float64, float32,
 * int32 and int64 data.
 */

// =============================================================================
// Core DType Interface
// =============================================================================

/**
 * JavaScript scalar types a dtype can be backed by
 */
export type Scalar = number | bigint;

/**
 * Names of the supported dtypes
 */
export type DTypeName = 'float32' | 'float64' | 'int32' | 'int64';

/**
 * Arithmetic and validation for one scalar type
 *
 * Every operation returns a value already rounded or wrapped to the dtype's
 * precision, so kernels never need to post-process results.
 */
export interface DType<T extends Scalar = Scalar, Name extends DTypeName = DTypeName> {
  readonly __dtype: Name;
  readonly __byteSize: 4 | 8;
  readonly __isInteger: boolean;

  /** Additive identity */
  readonly zero: T;
  /** Multiplicative identity */
  readonly one: T;

  add(a: T, b: T): T;
  subtract(a: T, b: T): T;
  multiply(a: T, b: T): T;

  /**
   * Three-way comparison: negative when `a < b`, positive when `a > b`, 0 otherwise
   */
  compare(a: T, b: T): number;

  /**
   * Convert a plain JS number into this dtype (rounding or truncating as needed)
   */
  fromNumber(value: number): T;
  toNumber(value: T): number;

  /**
   * Check that a value can be stored without conversion
   */
  isValid(value: unknown): value is T;
}

// =============================================================================
// Concrete DType Definitions
// =============================================================================

/**
 * 32-bit floating point, every result rounded with Math.fround
 */
export interface Float32 extends DType<number, 'float32'> {
  readonly __byteSize: 4;
  readonly __isInteger: false;
}

/**
 * 64-bit floating point (the JS number itself)
 */
export interface Float64 extends DType<number, 'float64'> {
  readonly __byteSize: 8;
  readonly __isInteger: false;
}

/**
 * 32-bit signed integer stored in a JS number, results wrap like Int32Array
 */
export interface Int32 extends DType<number, 'int32'> {
  readonly __byteSize: 4;
  readonly __isInteger: true;
}

/**
 * 64-bit signed integer stored in a bigint, results wrap like BigInt64Array
 */
export interface Int64 extends DType<bigint, 'int64'> {
  readonly __byteSize: 8;
  readonly __isInteger: true;
}

/**
 * Union of every concrete dtype
 */
export type AnyDType = Float32 | Float64 | Int32 | Int64;

/**
 * Floating-point dtypes (the only ones that support division)
 */
export type FloatDType = Float32 | Float64;

/**
 * Extract the JS scalar type of a dtype
 *
 * @example
 * type T = ScalarOf<Int64>; // bigint
 */
export type ScalarOf<D> = D extends DType<infer T> ? T : never;

/**
 * Look up a dtype interface by its name
 */
export type DTypeFromName<Name extends DTypeName> = Extract<AnyDType, { __dtype: Name }>;

/**
 * Options accepted by every container constructor
 */
export interface TensorOptions<T extends Scalar> {
  readonly dtype?: DType<T>;
}
