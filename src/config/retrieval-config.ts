/**
 * Runtime configuration for the retrieval engine.
 */

import type { BM25Params } from '../storage/lexical-index.js';

/**
 * Complete runtime configuration.
 */
export interface RetrievalConfig {
  // Vector store
  vectorStore: {
    /** Qdrant REST endpoint */
    url: string;
    /** Qdrant API key (cloud deployments) */
    apiKey?: string;
    /** Collection the indexer uploads to */
    collection: string;
    /** Minimum cosine similarity for a vector hit */
    scoreThreshold: number;
    /** Deadline for one vector search, ms */
    timeoutMs: number;
    /** Vector dimension of the collection */
    dimension: number;
  };

  // Lexical corpus
  /** Path to the JSONL corpus snapshot */
  corpusPath: string;
  bm25: BM25Params;

  // Models
  /** Model registry id for query embeddings */
  embeddingModel: string;
  /** Model registry id for the cross-encoder */
  rerankerModel: string;
  /** Deadline for one batched rerank call, ms */
  rerankTimeoutMs: number;

  // Retrieval
  /** Retrieval breadth when the caller gives no k */
  defaultK: number;
  /** Final context size, independent of k */
  topN: number;
  /** Characters of text in the fusion dedup key */
  dedupPrefixLength: number;
  /** Floor on the fused set cap, max(2k, minFusedSize) */
  minFusedSize: number;
  /** Serve lexical-only results when the vector branch fails */
  degradeOnVectorFailure: boolean;

  // Server
  port: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RetrievalConfig = {
  vectorStore: {
    url: 'http://localhost:6333',
    collection: 'capillary_docs',
    scoreThreshold: 0.15,
    timeoutMs: 5000,
    dimension: 384,
  },

  corpusPath: 'data/index/bm25_corpus.jsonl',
  bm25: { k1: 1.5, b: 0.75 },

  embeddingModel: 'minilm-l6',
  rerankerModel: 'ms-marco-minilm-l6',
  rerankTimeoutMs: 10000,

  defaultK: 8,
  topN: 6,
  dedupPrefixLength: 64,
  minFusedSize: 10,
  degradeOnVectorFailure: true,

  port: 8000,
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<RetrievalConfig> = {}): RetrievalConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values. Non-finite numbers (NaN from a malformed
 * environment variable) fail every range check.
 */
export function validateConfig(config: RetrievalConfig): string[] {
  const errors: string[] = [];
  const { vectorStore, bm25 } = config;

  if (!inRange(vectorStore.scoreThreshold, -1, 1)) {
    errors.push('vectorStore.scoreThreshold must be between -1 and 1');
  }
  if (!isPositiveInteger(vectorStore.dimension)) {
    errors.push('vectorStore.dimension must be a positive integer');
  }
  if (!inRange(vectorStore.timeoutMs, 1, Infinity)) {
    errors.push('vectorStore.timeoutMs must be a positive number');
  }
  if (!inRange(bm25.k1, 0, Infinity)) {
    errors.push('bm25.k1 must be a non-negative number');
  }
  if (!inRange(bm25.b, 0, 1)) {
    errors.push('bm25.b must be between 0 and 1');
  }
  if (!inRange(config.rerankTimeoutMs, 1, Infinity)) {
    errors.push('rerankTimeoutMs must be a positive number');
  }
  if (!isPositiveInteger(config.defaultK)) {
    errors.push('defaultK must be a positive integer');
  }
  if (!isPositiveInteger(config.topN)) {
    errors.push('topN must be a positive integer');
  }
  if (!isPositiveInteger(config.dedupPrefixLength)) {
    errors.push('dedupPrefixLength must be a positive integer');
  }
  if (!isPositiveInteger(config.minFusedSize)) {
    errors.push('minFusedSize must be a positive integer');
  }
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer between 0 and 65535');
  }

  return errors;
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}
