/**
 * Type tests for the containers and creation functions
 *
 * Float-only methods must be unreachable on bigint data, and creation
 * overloads must pick the container from the shape literal.
 */

import { expectTypeOf } from 'expect-type';
import { int64 } from '../dtype/constants';
import { arange, full, identity, matrix, ones, vector, zeros } from './creation';
import type { Matrix } from './matrix';
import type { Vector } from './vector';
import type { RankedIndex, RankedLabel } from '../ops';

// =============================================================================
// Creation
// =============================================================================

expectTypeOf(vector([1, 2, 3])).toEqualTypeOf<Vector<number>>();
expectTypeOf(vector([1n, 2n])).toEqualTypeOf<Vector<bigint>>();
expectTypeOf(matrix([[1, 2]])).toEqualTypeOf<Matrix<number>>();
expectTypeOf(matrix([[1n]])).toEqualTypeOf<Matrix<bigint>>();

expectTypeOf(zeros([3])).toEqualTypeOf<Vector<number>>();
expectTypeOf(zeros([2, 3])).toEqualTypeOf<Matrix<number>>();
expectTypeOf(ones([2], { dtype: int64 })).toEqualTypeOf<Vector<bigint>>();
expectTypeOf(full([2, 2], 1n)).toEqualTypeOf<Matrix<bigint>>();
expectTypeOf(identity(3, { dtype: int64 })).toEqualTypeOf<Matrix<bigint>>();
expectTypeOf(arange(0n, 5n)).toEqualTypeOf<Vector<bigint>>();

// =============================================================================
// Operations
// =============================================================================

const floats = vector([1, 2, 3]);
const bigints = vector([1n, 2n, 3n]);

expectTypeOf(floats.sum()).toEqualTypeOf<number>();
expectTypeOf(bigints.sum()).toEqualTypeOf<bigint>();
expectTypeOf(floats.mean()).toEqualTypeOf<number | undefined>();
expectTypeOf(bigints.max()).toEqualTypeOf<bigint | undefined>();
expectTypeOf(floats.isGreaterThan(1)).toEqualTypeOf<boolean[]>();
expectTypeOf(floats.topIndices(2)).toEqualTypeOf<RankedIndex[]>();
expectTypeOf(floats.topIndices(2, ['a', 'b', 'c'])).toEqualTypeOf<RankedLabel<string>[]>();
expectTypeOf(matrix([[1]]).transform(floats)).toEqualTypeOf<Vector<number>>();
expectTypeOf(matrix([[1]]).meanVector()).toEqualTypeOf<Vector<number> | undefined>();

// @ts-expect-error - bigint data cannot be divided
bigints.divide(2n);

// @ts-expect-error - magnitude is defined for floating-point data only
bigints.magnitude();

// @ts-expect-error - number and bigint vectors cannot be combined
floats.add(bigints);

// @ts-expect-error - bigint matrices have no cosine similarity
matrix([[1n]]).cosineSimilarities(bigints);
