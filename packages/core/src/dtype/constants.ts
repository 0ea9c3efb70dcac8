/**
 * Runtime dtype constants
 *
 * These constants satisfy the compile-time dtype interfaces and carry the
 * arithmetic the kernels delegate to.
 */

import type { DTypeName, Float32, Float64, Int32, Int64 } from './types';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function compareNumbers(a: number, b: number): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

function compareBigInts(a: bigint, b: bigint): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

/**
 * 64-bit floating point dtype constant (the default for number data)
 */
export const float64: Float64 = Object.freeze({
  __dtype: 'float64',
  __byteSize: 8,
  __isInteger: false,
  zero: 0,
  one: 1,
  add: (a: number, b: number) => a + b,
  subtract: (a: number, b: number) => a - b,
  multiply: (a: number, b: number) => a * b,
  compare: compareNumbers,
  fromNumber: (value: number) => value,
  toNumber: (value: number) => value,
  isValid: (value: unknown): value is number => typeof value === 'number',
});

/**
 * 32-bit floating point dtype constant
 */
export const float32: Float32 = Object.freeze({
  __dtype: 'float32',
  __byteSize: 4,
  __isInteger: false,
  zero: 0,
  one: 1,
  add: (a: number, b: number) => Math.fround(a + b),
  subtract: (a: number, b: number) => Math.fround(a - b),
  multiply: (a: number, b: number) => Math.fround(a * b),
  compare: compareNumbers,
  fromNumber: (value: number) => Math.fround(value),
  toNumber: (value: number) => value,
  isValid: (value: unknown): value is number => typeof value === 'number',
});

/**
 * 32-bit signed integer dtype constant
 */
export const int32: Int32 = Object.freeze({
  __dtype: 'int32',
  __byteSize: 4,
  __isInteger: true,
  zero: 0,
  one: 1,
  add: (a: number, b: number) => (a + b) | 0,
  subtract: (a: number, b: number) => (a - b) | 0,
  multiply: (a: number, b: number) => Math.imul(a, b),
  compare: compareNumbers,
  fromNumber: (value: number) => value | 0,
  toNumber: (value: number) => value,
  isValid: (value: unknown): value is number =>
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= INT32_MIN &&
    value <= INT32_MAX,
});

/**
 * 64-bit signed integer dtype constant (the default for bigint data)
 */
export const int64: Int64 = Object.freeze({
  __dtype: 'int64',
  __byteSize: 8,
  __isInteger: true,
  zero: 0n,
  one: 1n,
  add: (a: bigint, b: bigint) => BigInt.asIntN(64, a + b),
  subtract: (a: bigint, b: bigint) => BigInt.asIntN(64, a - b),
  multiply: (a: bigint, b: bigint) => BigInt.asIntN(64, a * b),
  compare: compareBigInts,
  fromNumber: (value: number) => BigInt.asIntN(64, BigInt(Math.trunc(value))),
  toNumber: (value: bigint) => Number(value),
  isValid: (value: unknown): value is bigint =>
    typeof value === 'bigint' && BigInt.asIntN(64, value) === value,
});

/**
 * Registry mapping dtype names to their constants
 */
export const DTYPE_CONSTANTS_MAP = Object.freeze({
  float32,
  float64,
  int32,
  int64,
} as const satisfies Record<DTypeName, unknown>);

/**
 * Get a dtype constant by name
 */
export function getDTypeConstant<T extends DTypeName>(name: T): (typeof DTYPE_CONSTANTS_MAP)[T] {
  return DTYPE_CONSTANTS_MAP[name];
}
