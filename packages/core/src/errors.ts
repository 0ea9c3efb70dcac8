/**
 * Error types for kernel precondition violations
 *
 * Every kernel validates its operands before producing output and throws one
 * of these synchronously. Mathematically undefined results (the mean of no
 * values, the argmax of an empty vector) are reported as `undefined` instead.
 */

import type { Shape } from './shape/types';

/**
 * Discriminant shared by every kernel error
 */
export type VectaErrorCode =
  | 'DimensionMismatch'
  | 'DivisionByZero'
  | 'ZeroVector'
  | 'EmptyInput'
  | 'InvalidArgument';

/**
 * Base error for kernel failures
 */
export class VectaError extends Error {
  constructor(
    public readonly code: VectaErrorCode,
    public readonly operation: string,
    message: string,
  ) {
    super(`${operation}: ${message}`);
    this.name = 'VectaError';
  }
}

/**
 * Operand lengths or shapes fail a stated precondition
 */
export class DimensionMismatchError extends VectaError {
  constructor(
    operation: string,
    public readonly expected: Shape,
    public readonly actual: Shape,
    detail?: string,
  ) {
    super(
      'DimensionMismatch',
      operation,
      `dimension mismatch, expected ${formatShape(expected)} but got ${formatShape(actual)}` +
        (detail === undefined ? '' : ` (${detail})`),
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * A divisor element or scalar is exactly zero
 */
export class DivisionByZeroError extends VectaError {
  constructor(
    operation: string,
    public readonly index?: number | readonly [number, number],
  ) {
    super(
      'DivisionByZero',
      operation,
      index === undefined
        ? 'division by zero'
        : `division by zero at index ${typeof index === 'number' ? String(index) : formatShape(index)}`,
    );
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Normalization, angle or projection against a vector of zero magnitude
 */
export class ZeroVectorError extends VectaError {
  constructor(operation: string, detail = 'cannot use a zero vector') {
    super('ZeroVector', operation, detail);
    this.name = 'ZeroVectorError';
  }
}

/**
 * Operation requires at least one element
 */
export class EmptyInputError extends VectaError {
  constructor(operation: string, detail = 'input must not be empty') {
    super('EmptyInput', operation, detail);
    this.name = 'EmptyInputError';
  }
}

/**
 * Argument outside its documented range (negative count, zero step, bad index)
 */
export class InvalidArgumentError extends VectaError {
  constructor(
    operation: string,
    detail: string,
    public readonly value?: unknown,
  ) {
    super('InvalidArgument', operation, detail);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Render a shape the way error messages quote it, e.g. `[2, 3]`
 */
export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(', ')}]`;
}
