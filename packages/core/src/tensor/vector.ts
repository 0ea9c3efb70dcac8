/**
 * Immutable 1-D container
 *
 * A Vector pairs a frozen array with the dtype that does its arithmetic.
 * Every operation delegates to a plain-array kernel and wraps the result in a
 * new Vector, so no method ever mutates its receiver or operands.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertSameDType } from '../dtype/runtime';
import type { VectorShape } from '../shape/types';
import type { BinaryFn, ScalarSide } from '../shape/broadcasting';
import {
  add,
  subtract,
  multiply,
  divide,
  broadcastScalar,
  broadcastDivide,
  broadcastWith,
  dot,
  magnitude,
  normalized,
  cosineOfAngle,
  angle,
  angleInDegrees,
  distance,
  scalarProjection,
  vectorProjection,
  orthogonalComponent,
  transformedBy,
  sum,
  product,
  min,
  max,
  argmin,
  argmax,
  mean,
  median,
  variance,
  std,
  cumulativeSum,
  cumulativeProduct,
  outlierMask,
  compare,
  masked,
  choose,
  unary,
  power,
  topIndices,
  type BroadcastOp,
  type ComparisonOp,
  type Mask,
  type OutlierOptions,
  type RankedIndex,
  type RankedLabel,
  type UnaryOpType,
} from '../ops';
import type { Matrix } from './matrix';
import { formatValues, info } from './utils';

function isVector<T extends Scalar>(value: Vector<T> | T): value is Vector<T> {
  return value instanceof Vector;
}

export class Vector<T extends Scalar = number> implements Iterable<T> {
  /** Frozen element storage */
  readonly data: readonly T[];

  /**
   * Wrap a frozen copy of `data`. Use {@link vector} to validate untrusted input.
   */
  constructor(
    data: readonly T[],
    readonly dtype: DType<T>,
  ) {
    this.data = Object.freeze([...data]);
  }

  // =============================================================================
  // Property Accessors
  // =============================================================================

  get length(): number {
    return this.data.length;
  }

  get shape(): VectorShape {
    return [this.data.length];
  }

  /**
   * Element at `index`; negative indices count from the end
   */
  at(index: number): T | undefined {
    return this.data.at(index);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.data[Symbol.iterator]();
  }

  toArray(): T[] {
    return [...this.data];
  }

  private derive(data: T[]): Vector<T> {
    return new Vector(data, this.dtype);
  }

  private operand(other: Vector<T>, operation: string): readonly T[] {
    assertSameDType(this.dtype, other.dtype, operation);
    return other.data;
  }

  // =============================================================================
  // Arithmetic
  // =============================================================================

  /**
   * Element-wise sum with a vector, or every element plus a scalar
   */
  add(other: Vector<T> | T): Vector<T> {
    return this.derive(
      isVector(other)
        ? add(this.dtype, this.data, this.operand(other, 'add'))
        : broadcastScalar(this.dtype, this.data, 'add', other),
    );
  }

  subtract(other: Vector<T> | T): Vector<T> {
    return this.derive(
      isVector(other)
        ? subtract(this.dtype, this.data, this.operand(other, 'subtract'))
        : broadcastScalar(this.dtype, this.data, 'subtract', other),
    );
  }

  /**
   * Hadamard product with a vector, or every element times a scalar
   */
  multiply(other: Vector<T> | T): Vector<T> {
    return this.derive(
      isVector(other)
        ? multiply(this.dtype, this.data, this.operand(other, 'multiply'))
        : broadcastScalar(this.dtype, this.data, 'multiply', other),
    );
  }

  /**
   * @throws {DivisionByZeroError} When a divisor is zero
   */
  divide(this: Vector<number>, other: Vector<number> | number): Vector<number> {
    return this.derive(
      isVector(other)
        ? divide(this.dtype, this.data, this.operand(other, 'divide'))
        : broadcastDivide(this.dtype, this.data, other),
    );
  }

  /**
   * `scalar - this[i]`
   */
  rsubtract(scalar: T): Vector<T> {
    return this.derive(broadcastScalar(this.dtype, this.data, 'subtract', scalar, 'left'));
  }

  /**
   * `scalar / this[i]`
   *
   * @throws {DivisionByZeroError} When any element is zero
   */
  rdivide(this: Vector<number>, scalar: number): Vector<number> {
    return this.derive(broadcastDivide(this.dtype, this.data, scalar, 'left'));
  }

  // =============================================================================
  // Broadcasting
  // =============================================================================

  /**
   * Combine every element with a scalar through a named or custom operation
   */
  broadcast(op: BroadcastOp<T>, scalar: T, side: ScalarSide = 'right'): Vector<T> {
    return this.derive(broadcastScalar(this.dtype, this.data, op, scalar, side));
  }

  /**
   * Apply a custom operation with a scalar or, element by element, a same-length vector
   *
   * @example
   * vector([1, 2, 3]).broadcastWith(2, Math.pow); // [1, 4, 9]
   */
  broadcastWith(operand: Vector<T> | T, operation: BinaryFn<T>): Vector<T> {
    const rhs = isVector(operand) ? this.operand(operand, 'broadcast') : operand;
    return this.derive(broadcastWith(this.dtype, this.data, rhs, operation));
  }

  // =============================================================================
  // Vector Algebra
  // =============================================================================

  dot(other: Vector<T>): T {
    return dot(this.dtype, this.data, this.operand(other, 'dot'));
  }

  magnitude(this: Vector<number>): number {
    return magnitude(this.dtype, this.data);
  }

  normalized(this: Vector<number>): Vector<number> {
    return this.derive(normalized(this.dtype, this.data));
  }

  cosineOfAngle(this: Vector<number>, other: Vector<number>): number {
    return cosineOfAngle(this.dtype, this.data, this.operand(other, 'cosineOfAngle'));
  }

  angle(this: Vector<number>, other: Vector<number>): number {
    return angle(this.dtype, this.data, this.operand(other, 'angle'));
  }

  angleInDegrees(this: Vector<number>, other: Vector<number>): number {
    return angleInDegrees(this.dtype, this.data, this.operand(other, 'angleInDegrees'));
  }

  distance(this: Vector<number>, other: Vector<number>): number {
    return distance(this.dtype, this.data, this.operand(other, 'distance'));
  }

  scalarProjection(this: Vector<number>, onto: Vector<number>): number {
    return scalarProjection(this.dtype, this.data, this.operand(onto, 'scalarProjection'));
  }

  vectorProjection(this: Vector<number>, onto: Vector<number>): Vector<number> {
    return this.derive(vectorProjection(this.dtype, this.data, this.operand(onto, 'vectorProjection')));
  }

  orthogonalComponent(this: Vector<number>, to: Vector<number>): Vector<number> {
    return this.derive(orthogonalComponent(this.dtype, this.data, this.operand(to, 'orthogonalComponent')));
  }

  /**
   * Matrix-vector product written vector first; equal to `matrix.transform(this)`
   */
  transformedBy(matrix: Matrix<T>): Vector<T> {
    assertSameDType(this.dtype, matrix.dtype, 'transformedBy');
    return this.derive(transformedBy(this.dtype, this.data, matrix.rows));
  }

  // =============================================================================
  // Statistics
  // =============================================================================

  sum(): T {
    return sum(this.dtype, this.data);
  }

  /**
   * Product of all elements; zero for an empty vector
   */
  product(): T {
    return product(this.dtype, this.data);
  }

  min(): T | undefined {
    return min(this.dtype, this.data);
  }

  max(): T | undefined {
    return max(this.dtype, this.data);
  }

  argmin(): number | undefined {
    return argmin(this.dtype, this.data);
  }

  argmax(): number | undefined {
    return argmax(this.dtype, this.data);
  }

  mean(this: Vector<number>): number | undefined {
    return mean(this.dtype, this.data);
  }

  median(this: Vector<number>): number | undefined {
    return median(this.dtype, this.data);
  }

  variance(this: Vector<number>, ddof = 0): number | undefined {
    return variance(this.dtype, this.data, ddof);
  }

  std(this: Vector<number>, ddof = 0): number | undefined {
    return std(this.dtype, this.data, ddof);
  }

  cumulativeSum(): Vector<T> {
    return this.derive(cumulativeSum(this.dtype, this.data));
  }

  cumulativeProduct(): Vector<T> {
    return this.derive(cumulativeProduct(this.dtype, this.data));
  }

  outlierMask(this: Vector<number>, options?: OutlierOptions): boolean[] {
    return outlierMask(this.dtype, this.data, options);
  }

  // =============================================================================
  // Comparison and Selection
  // =============================================================================

  private compareWith(op: ComparisonOp, operand: Vector<T> | T): boolean[] {
    const rhs = isVector(operand) ? this.operand(operand, op) : operand;
    return compare(this.dtype, this.data, op, rhs);
  }

  isEqual(operand: Vector<T> | T): boolean[] {
    return this.compareWith('isEqual', operand);
  }

  isGreaterThan(operand: Vector<T> | T): boolean[] {
    return this.compareWith('isGreaterThan', operand);
  }

  isLessThan(operand: Vector<T> | T): boolean[] {
    return this.compareWith('isLessThan', operand);
  }

  isGreaterThanOrEqual(operand: Vector<T> | T): boolean[] {
    return this.compareWith('isGreaterThanOrEqual', operand);
  }

  isLessThanOrEqual(operand: Vector<T> | T): boolean[] {
    return this.compareWith('isLessThanOrEqual', operand);
  }

  /**
   * Elements whose mask entry is true
   */
  masked(mask: Mask): Vector<T> {
    return this.derive(masked(this.data, mask));
  }

  /**
   * `condition[i] ? this[i] : otherwise[i]`
   */
  choose(condition: Mask, otherwise: Vector<T>): Vector<T> {
    return this.derive(choose(this.data, condition, this.operand(otherwise, 'choose')));
  }

  // =============================================================================
  // Element-wise Math
  // =============================================================================

  /**
   * Apply a named unary function to every element
   */
  apply(this: Vector<number>, op: UnaryOpType): Vector<number> {
    return this.derive(unary(this.dtype, this.data, op));
  }

  power(this: Vector<number>, exponent: number): Vector<number> {
    return this.derive(power(this.dtype, this.data, exponent));
  }

  sin(this: Vector<number>): Vector<number> {
    return this.apply('sin');
  }

  cos(this: Vector<number>): Vector<number> {
    return this.apply('cos');
  }

  tan(this: Vector<number>): Vector<number> {
    return this.apply('tan');
  }

  floor(this: Vector<number>): Vector<number> {
    return this.apply('floor');
  }

  ceil(this: Vector<number>): Vector<number> {
    return this.apply('ceil');
  }

  /**
   * Round to the nearest integer, halves away from zero
   */
  round(this: Vector<number>): Vector<number> {
    return this.apply('round');
  }

  log(this: Vector<number>): Vector<number> {
    return this.apply('log');
  }

  log10(this: Vector<number>): Vector<number> {
    return this.apply('log10');
  }

  exp(this: Vector<number>): Vector<number> {
    return this.apply('exp');
  }

  sqrt(this: Vector<number>): Vector<number> {
    return this.apply('sqrt');
  }

  square(this: Vector<number>): Vector<number> {
    return this.apply('square');
  }

  // =============================================================================
  // Ranking
  // =============================================================================

  /**
   * The `k` highest scores with their indices (or labels), highest first
   */
  topIndices(this: Vector<number>, k: number): RankedIndex[];
  topIndices<L>(this: Vector<number>, k: number, labels: readonly L[]): RankedLabel<L>[];
  topIndices<L>(this: Vector<number>, k: number, labels?: readonly L[]): RankedIndex[] | RankedLabel<L>[] {
    return labels === undefined ? topIndices(this.data, k) : topIndices(this.data, k, labels);
  }

  // =============================================================================
  // Utilities
  // =============================================================================

  /**
   * Multi-line summary: count, shape, dtype, statistics for float data and a preview
   */
  info(): string {
    return info(this.data, this.dtype);
  }

  toString(): string {
    return `Vector(length=${this.length.toString()}, dtype=${this.dtype.__dtype})`;
  }

  /**
   * Render the elements, e.g. `vector([1, 2, 3])`
   */
  format(): string {
    return `vector(${formatValues(this.data)})`;
  }
}

/**
 * `scalar - v[i]` for every element
 */
export function subtractFrom<T extends Scalar>(scalar: T, values: Vector<T>): Vector<T> {
  return values.rsubtract(scalar);
}

/**
 * `scalar / v[i]` for every element
 *
 * @throws {DivisionByZeroError} When any element is zero
 */
export function divideInto(scalar: number, values: Vector<number>): Vector<number> {
  return values.rdivide(scalar);
}
