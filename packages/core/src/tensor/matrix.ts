/**
 * Immutable 2-D container
 *
 * Rows are validated as rectangular on construction and frozen. Element-wise
 * operations are the vector kernels applied row by row; the matrix product is
 * the separate {@link Matrix.multiplyMatrix}.
 */

import type { DType, Scalar } from '../dtype/types';
import { assertSameDType } from '../dtype/runtime';
import type { ScalarSide } from '../shape/broadcasting';
import { assertRectangular } from '../shape/runtime';
import type { MatrixShape, Rows } from '../shape/types';
import {
  addMatrices,
  subtractMatrices,
  multiplyMatrices,
  divideMatrices,
  broadcastScalarRows,
  broadcastDivideRows,
  broadcastRow,
  broadcastColumn,
  transpose,
  multiplyMatrix,
  transform,
  row,
  column,
  cosineSimilarities,
  findDuplicates,
  clusterCohesion,
  averaged,
  type BroadcastOp,
  type DuplicatePair,
} from '../ops';
import { formatRows, infoRows } from './utils';
import { Vector } from './vector';

function isMatrix<T extends Scalar>(value: Matrix<T> | T): value is Matrix<T> {
  return value instanceof Matrix;
}

export class Matrix<T extends Scalar = number> implements Iterable<Vector<T>> {
  /** Frozen row storage */
  readonly rows: Rows<T>;
  readonly shape: MatrixShape;

  /**
   * Wrap frozen copies of `rows`. Use {@link matrix} to validate untrusted input.
   *
   * @throws {DimensionMismatchError} For ragged rows
   */
  constructor(
    rows: Rows<T>,
    readonly dtype: DType<T>,
  ) {
    this.shape = assertRectangular(rows, 'matrix');
    this.rows = Object.freeze(rows.map((values) => Object.freeze([...values])));
  }

  // =============================================================================
  // Property Accessors
  // =============================================================================

  get rowCount(): number {
    return this.shape[0];
  }

  get columnCount(): number {
    return this.shape[1];
  }

  /** Total number of elements */
  get size(): number {
    return this.shape[0] * this.shape[1];
  }

  /**
   * Entry at `[rowIndex][columnIndex]`, or `undefined` outside the matrix
   */
  at(rowIndex: number, columnIndex: number): T | undefined {
    return this.rows.at(rowIndex)?.at(columnIndex);
  }

  /**
   * @throws {InvalidArgumentError} When `index` is outside `0..rowCount-1`
   */
  row(index: number): Vector<T> {
    return new Vector(row(this.rows, index), this.dtype);
  }

  /**
   * @throws {InvalidArgumentError} When `index` is outside `0..columnCount-1`
   */
  column(index: number): Vector<T> {
    return new Vector(column(this.rows, index), this.dtype);
  }

  *[Symbol.iterator](): Iterator<Vector<T>> {
    for (const values of this.rows) {
      yield new Vector(values, this.dtype);
    }
  }

  toArray(): T[][] {
    return this.rows.map((values) => [...values]);
  }

  private derive(rows: T[][]): Matrix<T> {
    return new Matrix(rows, this.dtype);
  }

  private operand(other: Matrix<T>, operation: string): Rows<T> {
    assertSameDType(this.dtype, other.dtype, operation);
    return other.rows;
  }

  private vectorOperand(other: Vector<T>, operation: string): readonly T[] {
    assertSameDType(this.dtype, other.dtype, operation);
    return other.data;
  }

  // =============================================================================
  // Arithmetic
  // =============================================================================

  add(other: Matrix<T> | T): Matrix<T> {
    return this.derive(
      isMatrix(other)
        ? addMatrices(this.dtype, this.rows, this.operand(other, 'add'))
        : broadcastScalarRows(this.dtype, this.rows, 'add', other),
    );
  }

  subtract(other: Matrix<T> | T): Matrix<T> {
    return this.derive(
      isMatrix(other)
        ? subtractMatrices(this.dtype, this.rows, this.operand(other, 'subtract'))
        : broadcastScalarRows(this.dtype, this.rows, 'subtract', other),
    );
  }

  /**
   * Hadamard (element-wise) product; see {@link multiplyMatrix} for the matrix product
   *
   * @example
   * matrix([[1, 2], [3, 4]]).multiply(matrix([[5, 6], [7, 8]])); // [[5, 12], [21, 32]]
   */
  multiply(other: Matrix<T> | T): Matrix<T> {
    return this.derive(
      isMatrix(other)
        ? multiplyMatrices(this.dtype, this.rows, this.operand(other, 'multiply'))
        : broadcastScalarRows(this.dtype, this.rows, 'multiply', other),
    );
  }

  divide(this: Matrix<number>, other: Matrix<number> | number): Matrix<number> {
    return this.derive(
      isMatrix(other)
        ? divideMatrices(this.dtype, this.rows, this.operand(other, 'divide'))
        : broadcastDivideRows(this.dtype, this.rows, other),
    );
  }

  rsubtract(scalar: T): Matrix<T> {
    return this.derive(broadcastScalarRows(this.dtype, this.rows, 'subtract', scalar, 'left'));
  }

  rdivide(this: Matrix<number>, scalar: number): Matrix<number> {
    return this.derive(broadcastDivideRows(this.dtype, this.rows, scalar, 'left'));
  }

  // =============================================================================
  // Broadcasting
  // =============================================================================

  broadcast(op: BroadcastOp<T>, scalar: T, side: ScalarSide = 'right'): Matrix<T> {
    return this.derive(broadcastScalarRows(this.dtype, this.rows, op, scalar, side));
  }

  /**
   * `result[i][j] = op(this[i][j], vector[j])`
   *
   * @throws {DimensionMismatchError} When the vector length differs from the column count
   */
  broadcastRow(vector: Vector<T>, op: BroadcastOp<T>): Matrix<T> {
    return this.derive(broadcastRow(this.dtype, this.rows, this.vectorOperand(vector, 'broadcastRow'), op));
  }

  /**
   * `result[i][j] = op(this[i][j], vector[i])`
   *
   * @throws {DimensionMismatchError} When the vector length differs from the row count
   */
  broadcastColumn(vector: Vector<T>, op: BroadcastOp<T>): Matrix<T> {
    return this.derive(
      broadcastColumn(this.dtype, this.rows, this.vectorOperand(vector, 'broadcastColumn'), op),
    );
  }

  addToEachRow(vector: Vector<T>): Matrix<T> {
    return this.broadcastRow(vector, 'add');
  }

  addToEachColumn(vector: Vector<T>): Matrix<T> {
    return this.broadcastColumn(vector, 'add');
  }

  multiplyEachRowBy(vector: Vector<T>): Matrix<T> {
    return this.broadcastRow(vector, 'multiply');
  }

  multiplyEachColumnBy(vector: Vector<T>): Matrix<T> {
    return this.broadcastColumn(vector, 'multiply');
  }

  // =============================================================================
  // Matrix Algebra
  // =============================================================================

  transpose(): Matrix<T> {
    return this.derive(transpose(this.rows));
  }

  /**
   * True matrix product
   *
   * @example
   * matrix([[1, 2], [3, 4]]).multiplyMatrix(matrix([[5, 6], [7, 8]])); // [[19, 22], [43, 50]]
   */
  multiplyMatrix(other: Matrix<T>): Matrix<T> {
    return this.derive(multiplyMatrix(this.dtype, this.rows, this.operand(other, 'multiplyMatrix')));
  }

  /**
   * Matrix-vector product: `result[i] = dot(this[i], vector)`
   */
  transform(vector: Vector<T>): Vector<T> {
    return new Vector(transform(this.dtype, this.rows, this.vectorOperand(vector, 'transform')), this.dtype);
  }

  // =============================================================================
  // Similarity
  // =============================================================================

  /**
   * Cosine similarity of every row to `query`, in row order
   */
  cosineSimilarities(this: Matrix<number>, query: Vector<number>): Vector<number> {
    return new Vector(
      cosineSimilarities(this.dtype, this.rows, this.vectorOperand(query, 'cosineSimilarities')),
      this.dtype,
    );
  }

  findDuplicates(this: Matrix<number>, threshold?: number): DuplicatePair[] {
    return findDuplicates(this.dtype, this.rows, threshold);
  }

  clusterCohesion(this: Matrix<number>): number {
    return clusterCohesion(this.dtype, this.rows);
  }

  /**
   * Element-wise mean of the rows, or `undefined` for a matrix without rows
   */
  meanVector(this: Matrix<number>): Vector<number> | undefined {
    const centroid = averaged(this.dtype, this.rows);
    return centroid === undefined ? undefined : new Vector(centroid, this.dtype);
  }

  averaged(this: Matrix<number>): Vector<number> | undefined {
    return this.meanVector();
  }

  // =============================================================================
  // Utilities
  // =============================================================================

  info(): string {
    return infoRows(this.rows, this.dtype);
  }

  toString(): string {
    return `Matrix(shape=[${this.shape.join(', ')}], dtype=${this.dtype.__dtype})`;
  }

  /**
   * Render the rows one per line, e.g.
   *
   * ```
   * matrix([[1, 2],
   *         [3, 4]])
   * ```
   */
  format(): string {
    return formatRows(this.rows);
  }
}
