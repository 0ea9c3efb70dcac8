/**
 * Shape module exports
 *
 * @module shape
 *
 * Shape inspection and validation for dense 1-D and 2-D data, and the
 * broadcasting engine that pairs operands of different rank.
 *
 * ## Broadcasting Patterns
 * ```typescript
 * [n] op []        => scalar applied to every element
 * [r, c] op [c]    => vector applied to every row
 * [r, c] op [r]    => vector element i applied to every entry of row i (column axis)
 * [n] op [n]       => element-wise
 * ```
 */

export type { Shape, VectorShape, MatrixShape, Rows } from './types';

export {
  RuntimeShape,
  vectorShape,
  matrixShape,
  shapeOf,
  isRagged,
  assertRectangular,
  assertSameLength,
  assertSameShape,
} from './runtime';

export { BroadcastManager, assertExhaustiveSwitch } from './broadcasting';
export type {
  BroadcastStrategy,
  BroadcastAxis,
  BroadcastContext,
  ScalarSide,
  BinaryFn,
} from './broadcasting';
