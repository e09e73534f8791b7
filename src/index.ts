/**
 * docs-hybrid-rag
 *
 * Hybrid BM25 + vector retrieval with cross-encoder reranking over a crawled
 * documentation corpus.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Corpus snapshot
export { readCorpus, streamCorpus } from './parser/corpus-reader.js';

// Models
export { Embedder } from './models/embedder.js';
export type { QueryEmbedder, EmbedResult } from './models/embedder.js';
export { CrossEncoder } from './models/cross-encoder.js';
export type { RerankModel, ScoringPair } from './models/cross-encoder.js';
export { getModel, getAllModelIds, MODEL_REGISTRY } from './models/model-registry.js';
export type { ModelConfig, ModelStats } from './models/model-registry.js';

// Retrieval
export * from './retrieval/index.js';

// HTTP surface
export { createApp, startServer } from './server/server.js';

// Errors
export * from './utils/errors.js';
