/**
 * Vector algebra: products, norms, angles and projections
 */

import type { DType, Scalar } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { ZeroVectorError } from '../errors';
import { assertSameLength } from '../shape/runtime';
import { subtract } from './arithmetic';

/**
 * `Σ lhs[i] * rhs[i]`
 *
 * @throws {DimensionMismatchError} When the lengths differ
 */
export function dot<T extends Scalar>(dtype: DType<T>, lhs: readonly T[], rhs: readonly T[]): T {
  assertSameLength(lhs, rhs, 'dot');
  let result = dtype.zero;
  for (let i = 0; i < lhs.length; i++) {
    result = dtype.add(result, dtype.multiply(lhs[i], rhs[i]));
  }
  return result;
}

/**
 * Euclidean length `sqrt(Σ v[i]²)`; 0 for the zero vector
 */
export function magnitude(dtype: DType<number>, values: readonly number[]): number {
  assertFloatDType(dtype, 'magnitude');
  let sumOfSquares = dtype.zero;
  for (const value of values) {
    sumOfSquares = dtype.add(sumOfSquares, dtype.multiply(value, value));
  }
  return dtype.fromNumber(Math.sqrt(sumOfSquares));
}

/**
 * Unit vector in the direction of `values`
 *
 * @throws {ZeroVectorError} When the magnitude is 0
 */
export function normalized(dtype: DType<number>, values: readonly number[]): number[] {
  const length = magnitude(dtype, values);
  if (length === 0) {
    throw new ZeroVectorError('normalized', 'cannot normalize a zero vector');
  }
  return values.map((value) => dtype.fromNumber(value / length));
}

/**
 * `dot(a, b) / (|a| |b|)`
 *
 * Not clamped: rounding can put the result marginally outside [-1, 1].
 *
 * @throws {DimensionMismatchError} When the lengths differ
 * @throws {ZeroVectorError} When either vector has zero magnitude
 */
export function cosineOfAngle(
  dtype: DType<number>,
  lhs: readonly number[],
  rhs: readonly number[],
): number {
  const product = dot(dtype, lhs, rhs);
  const magnitudes = magnitude(dtype, lhs) * magnitude(dtype, rhs);
  if (magnitudes === 0) {
    throw new ZeroVectorError('cosineOfAngle', 'cannot calculate an angle with a zero vector');
  }
  return dtype.fromNumber(product / magnitudes);
}

/**
 * Angle between two vectors in radians
 */
export function angle(dtype: DType<number>, lhs: readonly number[], rhs: readonly number[]): number {
  return dtype.fromNumber(Math.acos(cosineOfAngle(dtype, lhs, rhs)));
}

/**
 * Angle between two vectors in degrees
 */
export function angleInDegrees(
  dtype: DType<number>,
  lhs: readonly number[],
  rhs: readonly number[],
): number {
  return dtype.fromNumber((angle(dtype, lhs, rhs) * 180) / Math.PI);
}

/**
 * Euclidean distance `|lhs - rhs|`
 *
 * @throws {DimensionMismatchError} When the lengths differ
 */
export function distance(dtype: DType<number>, lhs: readonly number[], rhs: readonly number[]): number {
  return magnitude(dtype, subtract(dtype, lhs, rhs));
}

/**
 * Length of the shadow of `values` on `onto`: `dot(values, onto) / |onto|`
 *
 * @throws {ZeroVectorError} When `onto` has zero magnitude
 */
export function scalarProjection(
  dtype: DType<number>,
  values: readonly number[],
  onto: readonly number[],
): number {
  const product = dot(dtype, values, onto);
  const length = magnitude(dtype, onto);
  if (length === 0) {
    throw new ZeroVectorError('scalarProjection', 'cannot project onto a zero vector');
  }
  return dtype.fromNumber(product / length);
}

/**
 * Component of `values` along `onto`: `(dot(values, onto) / dot(onto, onto)) * onto`
 *
 * @throws {ZeroVectorError} When `onto` is the zero vector
 */
export function vectorProjection(
  dtype: DType<number>,
  values: readonly number[],
  onto: readonly number[],
): number[] {
  assertFloatDType(dtype, 'vectorProjection');
  const product = dot(dtype, values, onto);
  const ontoSquared = dot(dtype, onto, onto);
  if (ontoSquared === 0) {
    throw new ZeroVectorError('vectorProjection', 'cannot project onto a zero vector');
  }
  const scale = dtype.fromNumber(product / ontoSquared);
  return onto.map((value) => dtype.multiply(value, scale));
}

/**
 * Component of `values` perpendicular to `to`
 *
 * `vectorProjection(v, axis) + orthogonalComponent(v, axis)` reconstructs `v`.
 *
 * @throws {ZeroVectorError} When `to` is the zero vector
 */
export function orthogonalComponent(
  dtype: DType<number>,
  values: readonly number[],
  to: readonly number[],
): number[] {
  return subtract(dtype, values, vectorProjection(dtype, values, to));
}
