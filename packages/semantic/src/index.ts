/**
 * @vecta/semantic
 *
 * Tokenization, word embedding lookup and a small semantic search index
 * built on the @vecta/core similarity kernels.
 */

export { tokenize } from './tokenize';
export { embed, embedText, loadEmbeddings, lookup } from './embeddings';
export type { Embeddings } from './embeddings';
export { SemanticIndex } from './semantic-index';
export type { DuplicateLabels } from './semantic-index';
