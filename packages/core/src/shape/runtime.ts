/**
 * Runtime shape inspection and validation
 *
 * Shape inspection tolerates ragged input so callers can look at malformed
 * data; the assertion helpers are what kernels use to reject it.
 */

import { DimensionMismatchError } from '../errors';
import type { MatrixShape, Rows, Shape, VectorShape } from './types';

// =============================================================================
// Runtime Shape Class
// =============================================================================

/**
 * Runtime representation of a container shape with computed properties
 */
export class RuntimeShape<S extends Shape = Shape> {
  readonly dims: S;

  constructor(dims: S) {
    this.dims = dims;
  }

  /**
   * Number of dimensions (1 for vectors, 2 for matrices)
   */
  get rank(): number {
    return this.dims.length;
  }

  /**
   * Total number of elements
   */
  get size(): number {
    return RuntimeShape.product(this.dims);
  }

  get isVector(): boolean {
    return this.rank === 1;
  }

  get isMatrix(): boolean {
    return this.rank === 2;
  }

  /**
   * Get a dimension size by index, with support for negative indexing
   */
  dim(index: number): number {
    const normalizedIndex = index < 0 ? this.rank + index : index;
    const dimension = this.dims[normalizedIndex];
    if (dimension === undefined) {
      throw new Error(
        `Dimension index ${index.toString()} out of bounds for rank ${this.rank.toString()} shape`,
      );
    }
    return dimension;
  }

  /**
   * Check if this shape is exactly equal to another
   */
  equals(other: RuntimeShape): boolean {
    return RuntimeShape.equals(this.dims, other.dims);
  }

  toString(): string {
    return `[${this.dims.join(', ')}]`;
  }

  // ===========================================================================
  // Static Utilities
  // ===========================================================================

  /**
   * Total element count of a shape
   */
  static product(shape: Shape): number {
    return shape.reduce((acc, dim) => acc * dim, 1);
  }

  /**
   * Check two shapes for exact equality
   */
  static equals(a: Shape, b: Shape): boolean {
    return a.length === b.length && a.every((dim, i) => dim === b[i]);
  }
}

// =============================================================================
// Shape Inspection
// =============================================================================

/**
 * Shape of a flat sequence
 */
export function vectorShape(values: readonly unknown[]): VectorShape {
  return [values.length];
}

/**
 * Shape of row-major data, taking the column count from the first row
 *
 * Ragged data is reported, not rejected: `[[1, 2], [3]]` has shape `[2, 2]`.
 * Use {@link isRagged} to detect it.
 */
export function matrixShape(rows: Rows<unknown>): MatrixShape {
  return [rows.length, rows[0]?.length ?? 0];
}

/**
 * Shape of flat or nested data
 */
export function shapeOf(data: readonly unknown[]): VectorShape | MatrixShape {
  if (data.length > 0 && data.every((item) => Array.isArray(item))) {
    return [data.length, lengthOf(data[0])];
  }
  return [data.length];
}

function lengthOf(item: unknown): number {
  return Array.isArray(item) ? item.length : 0;
}

/**
 * Whether rows have differing lengths
 */
export function isRagged(rows: Rows<unknown>): boolean {
  const columns = rows[0]?.length ?? 0;
  return rows.some((row) => row.length !== columns);
}

// =============================================================================
// Assertions
// =============================================================================

/**
 * Reject ragged row data
 *
 * @throws {DimensionMismatchError} Naming the first row whose length differs
 */
export function assertRectangular(rows: Rows<unknown>, operation: string): MatrixShape {
  const shape = matrixShape(rows);
  const columns = shape[1];
  rows.forEach((row, index) => {
    if (row.length !== columns) {
      throw new DimensionMismatchError(
        operation,
        [columns],
        [row.length],
        `row ${index.toString()} of a ragged matrix`,
      );
    }
  });
  return shape;
}

/**
 * Require two sequences of equal length
 *
 * @throws {DimensionMismatchError}
 */
export function assertSameLength(
  lhs: readonly unknown[],
  rhs: readonly unknown[],
  operation: string,
): void {
  if (lhs.length !== rhs.length) {
    throw new DimensionMismatchError(operation, [lhs.length], [rhs.length]);
  }
}

/**
 * Require two rectangular matrices of identical shape
 *
 * @throws {DimensionMismatchError}
 */
export function assertSameShape(lhs: Rows<unknown>, rhs: Rows<unknown>, operation: string): MatrixShape {
  const lhsShape = assertRectangular(lhs, operation);
  const rhsShape = assertRectangular(rhs, operation);
  if (!RuntimeShape.equals(lhsShape, rhsShape)) {
    throw new DimensionMismatchError(operation, lhsShape, rhsShape);
  }
  return lhsShape;
}
