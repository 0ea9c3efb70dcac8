export * from './dtype';
export * from './shape';
export * from './errors';
export * from './tensor';

// Plain-array kernels
export * as ops from './ops';
export type {
  BinaryOpType,
  ScalarOpType,
  BroadcastOp,
  ComparisonOp,
  Mask,
  UnaryOpType,
  OutlierOptions,
  DuplicatePair,
  RankedIndex,
  RankedLabel,
  RandomSource,
} from './ops';
export { and, or, not, trueIndices, topIndices, areValidVectorDimensions } from './ops';
