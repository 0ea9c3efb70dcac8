/**
 * Broadcasting engine for vector and matrix operations
 *
 * Supports the three broadcast patterns of dense 1-D/2-D data: a scalar
 * against every element, a vector against every row, and a vector against
 * every column (element `i` of the vector paired with every entry of row `i`).
 * Operand order is preserved throughout, so non-commutative operations such as
 * `scalar - vector` and `vector - scalar` stay distinct.
 */

import { DimensionMismatchError } from '../errors';
import type { Rows, Shape } from './types';
import { RuntimeShape } from './runtime';

// =============================================================================
// Broadcasting Strategy Types
// =============================================================================

/**
 * Broadcasting patterns the engine executes
 */
export type BroadcastStrategy =
  | 'elementwise' // Operands share a shape
  | 'scalar' // Operand is a single value
  | 'row' // Vector applied to every row of a matrix
  | 'column'; // Vector element i applied to every entry of row i

/**
 * Which matrix axis a vector operand follows
 */
export type BroadcastAxis = 'row' | 'column';

/**
 * Position of the scalar in the written expression
 *
 * `'right'` computes `element op scalar`, `'left'` computes `scalar op element`.
 */
export type ScalarSide = 'left' | 'right';

/**
 * Element operation applied by the engine
 */
export type BinaryFn<T> = (lhs: T, rhs: T) => T;

/**
 * Validated broadcasting plan
 */
export interface BroadcastContext {
  readonly strategy: BroadcastStrategy;
  readonly operation: string;
  readonly targetShape: Shape;
  readonly operandShape: Shape;
}

// =============================================================================
// Broadcasting Manager
// =============================================================================

/**
 * Analyzes operand shapes and runs broadcast loops
 */
// eslint-disable-next-line @typescript-eslint/no-extraneous-class
export class BroadcastManager {
  /**
   * Determine the broadcast pattern for a target and an operand shape
   *
   * @throws {DimensionMismatchError} When the operand rank cannot be broadcast onto the target
   */
  static analyze(targetShape: Shape, operandShape: Shape, axis?: BroadcastAxis): BroadcastStrategy {
    if (operandShape.length === 0) {
      return 'scalar';
    }
    if (targetShape.length === operandShape.length) {
      return 'elementwise';
    }
    if (targetShape.length === 2 && operandShape.length === 1) {
      return axis ?? 'row';
    }
    throw new DimensionMismatchError(
      'broadcast',
      targetShape,
      operandShape,
      'operand rank cannot be broadcast onto the target',
    );
  }

  /**
   * Check whether an operand can be broadcast onto a target
   */
  static canBroadcast(targetShape: Shape, operandShape: Shape, axis?: BroadcastAxis): boolean {
    try {
      this.createContext(targetShape, operandShape, 'canBroadcast', axis);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Create a validated broadcasting plan
   *
   * @throws {DimensionMismatchError} When the operand does not fit the target
   */
  static createContext(
    targetShape: Shape,
    operandShape: Shape,
    operation: string,
    axis?: BroadcastAxis,
  ): BroadcastContext {
    const strategy = this.analyze(targetShape, operandShape, axis);

    switch (strategy) {
      case 'scalar':
        break;
      case 'elementwise':
        if (!RuntimeShape.equals(targetShape, operandShape)) {
          throw new DimensionMismatchError(operation, targetShape, operandShape);
        }
        break;
      case 'row':
      case 'column': {
        const required = strategy === 'row' ? targetShape[1] : targetShape[0];
        const length = operandShape[0];
        if (required === undefined || length !== required) {
          throw new DimensionMismatchError(
            operation,
            [required ?? 0],
            operandShape,
            `${strategy} vector must match the matrix ${strategy === 'row' ? 'column' : 'row'} count`,
          );
        }
        break;
      }
      default:
        assertExhaustiveSwitch(strategy);
    }

    return { strategy, operation, targetShape, operandShape };
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Apply a scalar to every element
   */
  static scalar<T>(values: readonly T[], scalar: T, fn: BinaryFn<T>, side: ScalarSide = 'right'): T[] {
    return side === 'right'
      ? values.map((value) => fn(value, scalar))
      : values.map((value) => fn(scalar, value));
  }

  /**
   * Apply a scalar to every entry of row-major data
   */
  static scalarRows<T>(rows: Rows<T>, scalar: T, fn: BinaryFn<T>, side: ScalarSide = 'right'): T[][] {
    return rows.map((row) => this.scalar(row, scalar, fn, side));
  }

  /**
   * Pair equal-length sequences element by element
   *
   * Callers validate lengths through {@link createContext} first.
   */
  static elementwise<T>(lhs: readonly T[], rhs: readonly T[], fn: BinaryFn<T>): T[] {
    const result: T[] = new Array<T>(lhs.length);
    for (let i = 0; i < lhs.length; i++) {
      result[i] = fn(lhs[i], rhs[i]);
    }
    return result;
  }

  /**
   * Apply a vector to every row: `result[i][j] = fn(rows[i][j], vector[j])`
   */
  static rows<T>(rows: Rows<T>, vector: readonly T[], fn: BinaryFn<T>): T[][] {
    return rows.map((row) => this.elementwise(row, vector, fn));
  }

  /**
   * Apply a vector down the columns: `result[i][j] = fn(rows[i][j], vector[i])`
   */
  static columns<T>(rows: Rows<T>, vector: readonly T[], fn: BinaryFn<T>): T[][] {
    return rows.map((row, i) => {
      const operand = vector[i];
      return row.map((value) => fn(value, operand));
    });
  }
}

/**
 * Compile-time exhaustiveness check for switch statements
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}
