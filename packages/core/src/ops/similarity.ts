/**
 * Similarity search and ranking over collections of vectors
 */

import type { DType } from '../dtype/types';
import { assertFloatDType } from '../dtype/runtime';
import { InvalidArgumentError } from '../errors';
import { assertSameLength } from '../shape/runtime';
import type { Rows } from '../shape/types';
import { add } from './arithmetic';
import { cosineOfAngle } from './vector';

// =============================================================================
// Batch Similarity
// =============================================================================

/**
 * `cosineOfAngle(row, query)` for every row, in row order
 *
 * @throws {DimensionMismatchError} When a row length differs from the query
 * @throws {ZeroVectorError} When the query or a row has zero magnitude
 */
export function cosineSimilarities(
  dtype: DType<number>,
  database: Rows<number>,
  query: readonly number[],
): number[] {
  return database.map((row) => cosineOfAngle(dtype, row, query));
}

/**
 * A pair of rows whose cosine similarity met the threshold, with `i < j`
 */
export interface DuplicatePair {
  readonly i: number;
  readonly j: number;
  readonly similarity: number;
}

/**
 * Every pair `i < j` with `cosineOfAngle(database[i], database[j]) >= threshold`
 *
 * Sorted by similarity, highest first; equal similarities keep `(i, j)` order.
 */
export function findDuplicates(
  dtype: DType<number>,
  database: Rows<number>,
  threshold = 0.95,
): DuplicatePair[] {
  const pairs: DuplicatePair[] = [];
  for (let i = 0; i < database.length; i++) {
    for (let j = i + 1; j < database.length; j++) {
      const similarity = cosineOfAngle(dtype, database[i], database[j]);
      if (similarity >= threshold) {
        pairs.push({ i, j, similarity });
      }
    }
  }
  // Array.prototype.sort is stable, and pairs were generated in (i, j) order
  return pairs.sort((a, b) => b.similarity - a.similarity);
}

/**
 * Mean cosine similarity over all unordered pairs; 0 for fewer than two items
 */
export function clusterCohesion(dtype: DType<number>, items: Rows<number>): number {
  assertFloatDType(dtype, 'clusterCohesion');
  if (items.length < 2) {
    return 0;
  }
  let total = 0;
  let pairCount = 0;
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      total += cosineOfAngle(dtype, items[i], items[j]);
      pairCount++;
    }
  }
  return dtype.fromNumber(total / pairCount);
}

// =============================================================================
// Averaging
// =============================================================================

/**
 * True when there is at least one vector and all share a length
 */
export function areValidVectorDimensions(vectors: Rows<unknown>): boolean {
  if (vectors.length === 0) {
    return false;
  }
  const dimensions = vectors[0].length;
  return vectors.every((vector) => vector.length === dimensions);
}

/**
 * Element-wise mean of equal-length vectors
 *
 * `undefined` for no vectors or vectors of differing lengths.
 *
 * @example
 * averaged(float64, [[1, 2, 3], [4, 5, 6], [7, 8, 9]]); // [4, 5, 6]
 */
export function averaged(dtype: DType<number>, vectors: Rows<number>): number[] | undefined {
  assertFloatDType(dtype, 'averaged');
  if (!areValidVectorDimensions(vectors)) {
    return undefined;
  }
  let total: number[] = new Array<number>(vectors[0].length).fill(dtype.zero);
  for (const vector of vectors) {
    total = add(dtype, total, vector);
  }
  return total.map((value) => dtype.fromNumber(value / vectors.length));
}

/**
 * Alias of {@link averaged}: the centroid of a set of vectors
 */
export const meanVector = averaged;

// =============================================================================
// Top-K Ranking
// =============================================================================

export interface RankedIndex {
  readonly index: number;
  readonly score: number;
}

export interface RankedLabel<L> {
  readonly label: L;
  readonly score: number;
}

// Higher score first, lower index on ties, NaN below every number
function outranks(a: RankedIndex, b: RankedIndex): boolean {
  if (a.score !== b.score) {
    if (Number.isNaN(a.score)) {
      return Number.isNaN(b.score) && a.index < b.index;
    }
    if (Number.isNaN(b.score)) {
      return true;
    }
    return a.score > b.score;
  }
  return a.index < b.index;
}

/**
 * Bounded heap whose root is the weakest retained entry
 */
class TopKHeap {
  private readonly entries: RankedIndex[] = [];

  constructor(private readonly capacity: number) {}

  offer(entry: RankedIndex): void {
    if (this.entries.length < this.capacity) {
      this.entries.push(entry);
      this.siftUp(this.entries.length - 1);
      return;
    }
    const weakest = this.entries[0];
    if (this.capacity > 0 && outranks(entry, weakest)) {
      this.entries[0] = entry;
      this.siftDown(0);
    }
  }

  drain(): RankedIndex[] {
    return [...this.entries].sort((a, b) => (outranks(a, b) ? -1 : outranks(b, a) ? 1 : 0));
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!outranks(this.entries[parent], this.entries[child])) {
        return;
      }
      this.swap(parent, child);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let weakest = parent;
      if (left < this.entries.length && outranks(this.entries[weakest], this.entries[left])) {
        weakest = left;
      }
      if (right < this.entries.length && outranks(this.entries[weakest], this.entries[right])) {
        weakest = right;
      }
      if (weakest === parent) {
        return;
      }
      this.swap(parent, weakest);
      parent = weakest;
    }
  }

  private swap(a: number, b: number): void {
    const entry = this.entries[a];
    this.entries[a] = this.entries[b];
    this.entries[b] = entry;
  }
}

/**
 * The `k` highest scores with their indices, highest first
 *
 * Returns every entry when `k` exceeds the number of scores. Equal scores are
 * ordered by ascending index. Runs in O(n log k).
 *
 * @example
 * topIndices([0.3, 0.9, 0.1, 0.7, 0.5], 3);
 * // [{ index: 1, score: 0.9 }, { index: 3, score: 0.7 }, { index: 4, score: 0.5 }]
 *
 * @throws {InvalidArgumentError} When `k` is negative or not an integer
 * @throws {DimensionMismatchError} When `labels` differs in length from `scores`
 */
export function topIndices(scores: readonly number[], k: number): RankedIndex[];
export function topIndices<L>(
  scores: readonly number[],
  k: number,
  labels: readonly L[],
): RankedLabel<L>[];
export function topIndices<L>(
  scores: readonly number[],
  k: number,
  labels?: readonly L[],
): RankedIndex[] | RankedLabel<L>[] {
  if (!Number.isInteger(k) || k < 0) {
    throw new InvalidArgumentError('topIndices', `k must be a non-negative integer, got ${String(k)}`, k);
  }
  if (labels !== undefined) {
    assertSameLength(scores, labels, 'topIndices');
  }

  const heap = new TopKHeap(Math.min(k, scores.length));
  scores.forEach((score, index) => heap.offer({ index, score }));
  const ranked = heap.drain();

  if (labels === undefined) {
    return ranked;
  }
  return ranked.map(({ index, score }) => ({ label: labels[index], score }));
}
