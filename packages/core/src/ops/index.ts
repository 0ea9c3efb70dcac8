/**
 * Plain-array numeric kernels
 *
 * Every kernel takes the dtype first and returns new arrays; inputs are never mutated.
 */

export {
  add,
  subtract,
  multiply,
  divide,
  addMatrices,
  subtractMatrices,
  multiplyMatrices,
  divideMatrices,
  binaryFn,
  divisionFn,
  assertNonZeroDivisors,
} from './arithmetic';
export type { BinaryOpType } from './arithmetic';

export {
  broadcastScalar,
  broadcastDivide,
  broadcastScalarRows,
  broadcastDivideRows,
  broadcastWith,
  broadcastRow,
  broadcastColumn,
} from './broadcast';
export type { ScalarOpType, BroadcastOp } from './broadcast';

export {
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
} from './vector';

export { transpose, multiplyMatrix, transform, transformedBy, identity, diag, column, row } from './matrix';

export {
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
} from './reduction';
export type { OutlierOptions } from './reduction';

export {
  compare,
  isEqual,
  isGreaterThan,
  isLessThan,
  isGreaterThanOrEqual,
  isLessThanOrEqual,
  and,
  or,
  not,
  trueIndices,
  masked,
  choose,
} from './comparison';
export type { ComparisonOp, Mask } from './comparison';

export { unary, power } from './unary';
export type { UnaryOpType } from './unary';

export {
  cosineSimilarities,
  findDuplicates,
  clusterCohesion,
  areValidVectorDimensions,
  averaged,
  meanVector,
  topIndices,
} from './similarity';
export type { DuplicatePair, RankedIndex, RankedLabel } from './similarity';

export { linspace, arange, filled, filledRows } from './generation';
export { random, random2D } from './random';
export type { RandomSource } from './random';
