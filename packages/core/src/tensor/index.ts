/**
 * Container module exports
 *
 * @module tensor
 *
 * Immutable Vector and Matrix containers and the functions that create them.
 * Containers delegate every computation to the plain-array kernels in `ops`.
 */

export { Vector, subtractFrom, divideInto } from './vector';
export { Matrix } from './matrix';
export {
  vector,
  matrix,
  zeros,
  ones,
  full,
  identity,
  diag,
  linspace,
  arange,
  random,
} from './creation';
export type { BigIntOptions, RandomOptions } from './creation';
export { info, infoRows, formatValues, formatRows, INFO_PREVIEW_ITEMS } from './utils';
