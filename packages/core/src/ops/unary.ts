/**
 * Element-wise math for floating-point data
 */

import type { DType } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { assertExhaustiveSwitch } from '../shape/broadcasting';

/**
 * Unary functions applied to every element
 */
export type UnaryOpType =
  | 'sin'
  | 'cos'
  | 'tan'
  | 'floor'
  | 'ceil'
  | 'round'
  | 'log'
  | 'log10'
  | 'exp'
  | 'sqrt'
  | 'square';

function unaryFn(op: UnaryOpType): (value: number) => number {
  switch (op) {
    case 'sin':
      return Math.sin;
    case 'cos':
      return Math.cos;
    case 'tan':
      return Math.tan;
    case 'floor':
      return Math.floor;
    case 'ceil':
      return Math.ceil;
    case 'round':
      return roundHalfAwayFromZero;
    case 'log':
      return Math.log;
    case 'log10':
      return Math.log10;
    case 'exp':
      return Math.exp;
    case 'sqrt':
      return Math.sqrt;
    case 'square':
      return (value) => value * value;
    default:
      return assertExhaustiveSwitch(op);
  }
}

// Math.round rounds -2.5 to -2; halves go away from zero here
function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/**
 * Apply a named unary function to every element
 *
 * Domain errors follow IEEE rules: `log` of a negative number is NaN, `log(0)` is -Infinity.
 */
export function unary(dtype: DType<number>, values: readonly number[], op: UnaryOpType): number[] {
  assertFloatDType(dtype, op);
  const fn = unaryFn(op);
  return values.map((value) => dtype.fromNumber(fn(value)));
}

/**
 * Raise every element to `exponent`
 */
export function power(dtype: DType<number>, values: readonly number[], exponent: number): number[] {
  assertFloatDType(dtype, 'power');
  return values.map((value) => dtype.fromNumber(Math.pow(value, exponent)));
}
