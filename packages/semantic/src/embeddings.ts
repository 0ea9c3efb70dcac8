/**
 * Word embedding lookup and loading
 */

import { DimensionMismatchError, InvalidArgumentError, float64, ops } from '@vecta/core';
import { tokenize } from './tokenize';

/**
 * Word to vector dictionary, as a Map or a plain record
 */
export type Embeddings =
  | ReadonlyMap<string, readonly number[]>
  | Readonly<Record<string, readonly number[]>>;

function isMap(embeddings: Embeddings): embeddings is ReadonlyMap<string, readonly number[]> {
  return embeddings instanceof Map;
}

/**
 * Vector for an exact word, or `undefined` when the dictionary lacks it
 */
export function lookup(embeddings: Embeddings, word: string): readonly number[] | undefined {
  if (isMap(embeddings)) {
    return embeddings.get(word);
  }
  return Object.hasOwn(embeddings, word) ? embeddings[word] : undefined;
}

/**
 * Vectors of the known tokens, in token order; unknown tokens are skipped
 */
export function embed(tokens: readonly string[], embeddings: Embeddings): (readonly number[])[] {
  const vectors: (readonly number[])[] = [];
  for (const token of tokens) {
    const vector = lookup(embeddings, token);
    if (vector !== undefined) {
      vectors.push(vector);
    }
  }
  return vectors;
}

/**
 * Mean embedding of a text's known words
 *
 * `undefined` when no word is known or the known vectors differ in length.
 *
 * @example
 * embedText('Red shoes', { red: [1, 0], shoes: [0, 1] }); // [0.5, 0.5]
 */
export function embedText(text: string, embeddings: Embeddings): number[] | undefined {
  return ops.averaged(float64, embed(tokenize(text), embeddings));
}

/**
 * Parse the whitespace-separated word-vector text format, one `word v1 v2 …` per line
 *
 * Blank lines are ignored and a later duplicate word replaces the earlier one.
 *
 * @throws {DimensionMismatchError} When a line's dimension differs from the first line's
 * @throws {InvalidArgumentError} When a line has no values or a value is not a number
 */
export function loadEmbeddings(source: string): Map<string, number[]> {
  const embeddings = new Map<string, number[]>();
  let dimension: number | undefined;

  source.split(/\r?\n/).forEach((line, index) => {
    const [word, ...fields] = line.trim().split(/\s+/);
    if (word.length === 0) {
      return;
    }
    const lineNumber = index + 1;
    if (fields.length === 0) {
      throw new InvalidArgumentError('loadEmbeddings', `line ${String(lineNumber)} has no vector values`, line);
    }
    const values = fields.map(Number);
    const invalid = fields.find((_, i) => Number.isNaN(values[i]));
    if (invalid !== undefined) {
      throw new InvalidArgumentError(
        'loadEmbeddings',
        `line ${String(lineNumber)} has a non-numeric value '${invalid}'`,
        invalid,
      );
    }
    dimension ??= values.length;
    if (values.length !== dimension) {
      throw new DimensionMismatchError(
        'loadEmbeddings',
        [dimension],
        [values.length],
        `line ${String(lineNumber)} for '${word}'`,
      );
    }
    embeddings.set(word, values);
  });

  return embeddings;
}
