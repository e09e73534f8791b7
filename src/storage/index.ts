/**
 * Storage layer exports.
 */

// Types
export type { Chunk, Candidate, CandidateSource, RankedContext, CorpusRecord } from './types.js';

// Lexical index
export { LexicalIndex, tokenize, DEFAULT_BM25_PARAMS } from './lexical-index.js';
export type { BM25Params } from './lexical-index.js';

// Vector index
export {
  VectorIndexClient,
  createQdrantClient,
  toBackendError,
  DEFAULT_SCORE_THRESHOLD,
} from './vector-index-client.js';
export type {
  VectorIndex,
  VectorStoreApi,
  VectorHit,
  VectorSearchRequest,
  VectorIndexClientOptions,
  QdrantConnectionOptions,
} from './vector-index-client.js';
