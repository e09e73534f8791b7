/**
 * k-nearest-neighbor search against the Qdrant collection the indexer fills.
 *
 * The store applies the similarity floor itself (`score_threshold`); hits below
 * it are filtered here as well so they can never reach fusion.
 *
 * ## Error mapping
 *
 * | Store outcome        | Code                       |
 * |----------------------|----------------------------|
 * | HTTP 404             | `COLLECTION_NOT_FOUND`     |
 * | HTTP 401 / 403       | `AUTH_FAILED`              |
 * | other HTTP status    | `VECTOR_SEARCH_FAILED`     |
 * | no response          | `VECTOR_STORE_UNREACHABLE` |
 * | deadline exceeded    | `VECTOR_SEARCH_TIMEOUT`    |
 *
 * @module storage/vector-index-client
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import type { Candidate } from './types.js';
import { assertPositiveInteger } from './lexical-index.js';
import { RetrievalBackendError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('vector-index');

/** Minimum cosine similarity for a hit to count as a candidate. */
export const DEFAULT_SCORE_THRESHOLD = 0.15;

/** A scored point as returned by the store. */
export interface VectorHit {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  with_payload: boolean;
  score_threshold: number;
}

/**
 * The slice of the Qdrant REST client this module calls.
 * Tests supply an in-process implementation.
 */
export interface VectorStoreApi {
  search(collectionName: string, request: VectorSearchRequest): Promise<VectorHit[]>;
}

/** Query side of the dense retrieval source. */
export interface VectorIndex {
  search(queryVector: readonly number[], k: number): Promise<Candidate[]>;
}

export interface VectorIndexClientOptions {
  collection: string;
  scoreThreshold?: number;
  /** Deadline for a single search, in ms. 0 disables it. */
  timeoutMs?: number;
  /** Expected query-vector length; unchecked when omitted. */
  dimension?: number;
}

export interface QdrantConnectionOptions {
  url: string;
  apiKey?: string;
}

export function createQdrantClient(options: QdrantConnectionOptions): QdrantClient {
  return new QdrantClient({ url: options.url, apiKey: options.apiKey });
}

function payloadString(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Translate a store failure into a RetrievalBackendError.
 */
export function toBackendError(error: unknown, collection: string): RetrievalBackendError {
  if (error instanceof RetrievalBackendError) return error;

  const status = httpStatusOf(error);
  if (status === 404) {
    return new RetrievalBackendError(`Collection not found: ${collection}`, 'COLLECTION_NOT_FOUND', error);
  }
  if (status === 401 || status === 403) {
    return new RetrievalBackendError('Vector store rejected credentials', 'AUTH_FAILED', error);
  }
  if (status !== undefined) {
    return new RetrievalBackendError(
      `Vector search failed with status ${status}`,
      'VECTOR_SEARCH_FAILED',
      error,
    );
  }
  return new RetrievalBackendError('Vector store unreachable', 'VECTOR_STORE_UNREACHABLE', error);
}

export class VectorIndexClient implements VectorIndex {
  private readonly collection: string;
  private readonly scoreThreshold: number;
  private readonly timeoutMs: number;
  private readonly dimension?: number;

  constructor(
    private readonly api: VectorStoreApi,
    options: VectorIndexClientOptions,
  ) {
    this.collection = options.collection;
    this.scoreThreshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.dimension = options.dimension;
  }

  /**
   * Top-k neighbors at or above the similarity floor, best first.
   * Hits without a `text` payload are kept with empty text.
   */
  async search(queryVector: readonly number[], k: number): Promise<Candidate[]> {
    assertPositiveInteger(k, 'k');

    if (this.dimension !== undefined && queryVector.length !== this.dimension) {
      throw new RetrievalBackendError(
        `Query vector has ${queryVector.length} dimensions, collection expects ${this.dimension}`,
        'DIMENSION_MISMATCH',
      );
    }

    let hits: VectorHit[];
    try {
      hits = await withTimeout(
        this.api.search(this.collection, {
          vector: [...queryVector],
          limit: k,
          with_payload: true,
          score_threshold: this.scoreThreshold,
        }),
        this.timeoutMs,
        () =>
          new RetrievalBackendError(
            `Vector search exceeded ${this.timeoutMs}ms`,
            'VECTOR_SEARCH_TIMEOUT',
          ),
      );
    } catch (error) {
      throw toBackendError(error, this.collection);
    }

    const candidates: Candidate[] = [];
    for (const hit of hits) {
      if (!Number.isFinite(hit.score)) {
        throw new RetrievalBackendError(`Vector hit ${hit.id} has a non-finite score`, 'INVALID_SCORE');
      }
      if (hit.score < this.scoreThreshold) continue;

      const payload = hit.payload ?? {};
      const text = payload.text;
      candidates.push({
        id: String(hit.id),
        text: typeof text === 'string' ? text : '',
        url: payloadString(payload, 'url'),
        title: payloadString(payload, 'title'),
        score: hit.score,
        source: 'vector',
      });
    }

    log.debug(`Vector search returned ${candidates.length} hits`, {
      collection: this.collection,
      requested: k,
    });

    return candidates.slice(0, k);
  }
}
