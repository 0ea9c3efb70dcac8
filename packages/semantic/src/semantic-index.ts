/**
 * Text search over a fixed set of labelled documents
 *
 * Each document is embedded once, as the mean vector of its known words. A
 * query is embedded the same way and ranked against every document by cosine
 * similarity.
 */

import { DimensionMismatchError, Matrix, float64, ops, topIndices } from '@vecta/core';
import type { RankedLabel } from '@vecta/core';
import { embedText, type Embeddings } from './embeddings';

/**
 * Two documents whose embeddings are nearly parallel
 */
export interface DuplicateLabels<L> {
  readonly first: L;
  readonly second: L;
  readonly similarity: number;
}

export class SemanticIndex<L = string> {
  private readonly entries: readonly L[];
  private readonly vectors: Matrix<number>;

  /**
   * Embed `texts[i]` under `labels[i]`
   *
   * Documents without a known word, or whose mean embedding is the zero
   * vector, are left out of the index.
   *
   * @throws {DimensionMismatchError} When `labels` and `texts` differ in length,
   *   or document embeddings differ in dimension
   */
  constructor(
    labels: readonly L[],
    texts: readonly string[],
    private readonly embeddings: Embeddings,
  ) {
    if (labels.length !== texts.length) {
      throw new DimensionMismatchError(
        'SemanticIndex',
        [labels.length],
        [texts.length],
        'every label needs one text',
      );
    }

    const entries: L[] = [];
    const rows: number[][] = [];
    texts.forEach((text, i) => {
      const embedding = embedText(text, embeddings);
      if (embedding !== undefined && ops.magnitude(float64, embedding) > 0) {
        entries.push(labels[i]);
        rows.push(embedding);
      }
    });
    this.entries = entries;
    this.vectors = new Matrix(rows, float64);
  }

  /** Number of indexed documents */
  get size(): number {
    return this.entries.length;
  }

  /** Labels of the indexed documents, in insertion order */
  get labels(): readonly L[] {
    return this.entries;
  }

  /**
   * The `k` documents most similar to `query`, best first
   *
   * Empty when the query has no known word or embeds to the zero vector.
   *
   * @example
   * index.search('running shoes', 3); // [{ label: 'sneakers', score: 0.97 }, …]
   *
   * @throws {InvalidArgumentError} When `k` is negative or not an integer
   */
  search(query: string, k: number): RankedLabel<L>[] {
    const embedding = embedText(query, this.embeddings);
    if (embedding === undefined || this.size === 0 || ops.magnitude(float64, embedding) === 0) {
      return topIndices<L>([], k, []);
    }
    const scores = ops.cosineSimilarities(float64, this.vectors.rows, embedding);
    return topIndices(scores, k, this.entries);
  }

  /**
   * Document pairs with similarity at or above `threshold`, most similar first
   */
  duplicates(threshold = 0.95): DuplicateLabels<L>[] {
    return this.vectors.findDuplicates(threshold).map(({ i, j, similarity }) => ({
      first: this.entries[i],
      second: this.entries[j],
      similarity,
    }));
  }
}
