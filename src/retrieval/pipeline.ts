/**
 * Hybrid retrieval pipeline.
 *
 * Pipeline: validate → [embed → vector search, lexical search] → fuse → rerank → citations
 *
 * The vector branch and the lexical search run concurrently; fusion waits for
 * both complete result sets, and reranking sees the whole fused set before
 * truncating. Backend failures are handled here and never escape as anything
 * but a RetrievalError:
 * - vector branch fails, some lexical score is positive → lexical-only (`degraded: ['vector']`)
 * - rerank model fails → source-score ordering (`degraded: ['rerank']`)
 */

import type { Candidate, RankedContext } from '../storage/types.js';
import type { LexicalIndex } from '../storage/lexical-index.js';
import type { VectorIndex } from '../storage/vector-index-client.js';
import type { QueryEmbedder } from '../models/embedder.js';
import { tokenize } from '../storage/lexical-index.js';
import { mergeCandidates, DEFAULT_MIN_FUSED_SIZE, DEFAULT_PREFIX_LENGTH } from './candidate-fusion.js';
import { Reranker, fallbackRank, DEFAULT_TOP_N } from './reranker.js';
import { RetrievalError, isRerankModelError, wrapError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retrieval-pipeline');

export const DEFAULT_K = 8;

/** A stage that failed and was worked around. */
export type DegradedStage = 'vector' | 'rerank';

export interface RetrievalResponse {
  /** Final contexts, best first. Order is citation order. */
  contexts: RankedContext[];
  /** Distinct non-empty URLs of the contexts, in context order */
  urls: string[];
  /** Stages that failed and were worked around */
  degraded: DegradedStage[];
  /** Size of the fused candidate set */
  totalConsidered: number;
  /** Time taken in milliseconds */
  durationMs: number;
}

/**
 * Long-lived collaborators shared by every request.
 */
export interface PipelineContext {
  lexicalIndex: LexicalIndex;
  vectorIndex: VectorIndex;
  embedder: QueryEmbedder;
  reranker: Reranker;
  options?: PipelineOptions;
}

export interface PipelineOptions {
  /** Final context size. Default: 6 */
  topN?: number;
  /** Characters of text in the fusion dedup key. Default: 64 */
  dedupPrefixLength?: number;
  /** Floor on the fused set cap. Default: 10 */
  minFusedSize?: number;
  /** Serve lexical-only results when the vector branch fails. Default: true */
  degradeOnVectorFailure?: boolean;
}

/**
 * Distinct non-empty URLs in first-seen order.
 */
export function collectUrls(contexts: readonly RankedContext[]): string[] {
  const urls: string[] = [];
  const seen = new Set<string>();
  for (const context of contexts) {
    if (!context.url || seen.has(context.url)) continue;
    seen.add(context.url);
    urls.push(context.url);
  }
  return urls;
}

type VectorOutcome = { ok: true; candidates: Candidate[] } | { ok: false; error: unknown };

export class RetrievalPipeline {
  private readonly topN: number;
  private readonly dedupPrefixLength: number;
  private readonly minFusedSize: number;
  private readonly degradeOnVectorFailure: boolean;

  constructor(private readonly context: PipelineContext) {
    const options = context.options ?? {};
    this.topN = options.topN ?? DEFAULT_TOP_N;
    this.dedupPrefixLength = options.dedupPrefixLength ?? DEFAULT_PREFIX_LENGTH;
    this.minFusedSize = options.minFusedSize ?? DEFAULT_MIN_FUSED_SIZE;
    this.degradeOnVectorFailure = options.degradeOnVectorFailure ?? true;
  }

  /** Number of chunks behind the lexical index. */
  get corpusSize(): number {
    return this.context.lexicalIndex.size;
  }

  /**
   * Retrieve the ranked contexts for a query.
   *
   * @param k - Retrieval breadth per source before fusion; the final context
   *   size is fixed by `topN`
   * @throws RetrievalError for invalid input, or when the vector branch fails
   *   and no query term matched the corpus
   */
  async retrieve(query: string, k: number = DEFAULT_K): Promise<RetrievalResponse> {
    const startTime = Date.now();

    if (typeof query !== 'string' || !query.trim()) {
      throw new RetrievalError('query must be a non-empty string', 'INVALID_QUERY');
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new RetrievalError(`k must be a positive integer, got ${k}`, 'INVALID_K');
    }

    const { lexicalIndex, reranker } = this.context;
    const degraded: DegradedStage[] = [];

    // 1. Vector branch (embedding + store query) in flight while lexical search runs
    const vectorPromise = this.searchVector(query, k);
    const lexical = lexicalIndex.search(tokenize(query), k);
    const vectorOutcome = await vectorPromise;

    // 2. Degrade or fail on vector errors
    let vector: Candidate[] = [];
    if (vectorOutcome.ok) {
      vector = vectorOutcome.candidates;
    } else if (this.degradeOnVectorFailure && lexical.some((c) => c.score > 0)) {
      const cause = wrapError(vectorOutcome.error);
      log.warn('Vector search unavailable, falling back to lexical-only', {
        code: cause.code,
        error: cause.message,
      });
      degraded.push('vector');
    } else {
      throw new RetrievalError('Vector retrieval failed', 'RETRIEVAL_FAILED', vectorOutcome.error);
    }

    // 3. Fuse
    const merged = mergeCandidates(vector, lexical, k, {
      prefixLength: this.dedupPrefixLength,
      minSize: this.minFusedSize,
    });

    // 4. Rerank (fallback to source scores when the model fails)
    let contexts: RankedContext[];
    try {
      contexts = await reranker.rerank(query, merged, this.topN);
    } catch (error) {
      if (!isRerankModelError(error)) {
        throw new RetrievalError('Reranking failed', 'RETRIEVAL_FAILED', error);
      }
      log.warn('Rerank model unavailable, ordering by source score', {
        code: error.code,
        error: error.message,
      });
      degraded.push('rerank');
      contexts = fallbackRank(merged, this.topN);
    }

    const durationMs = Date.now() - startTime;
    log.debug(`Retrieved ${contexts.length} contexts in ${durationMs}ms`, {
      vector: vector.length,
      lexical: lexical.length,
      fused: merged.length,
    });

    return {
      contexts,
      urls: collectUrls(contexts),
      degraded,
      totalConsidered: merged.length,
      durationMs,
    };
  }

  private async searchVector(query: string, k: number): Promise<VectorOutcome> {
    try {
      const embedding = await this.context.embedder.embedQuery(query);
      const candidates = await this.context.vectorIndex.search(embedding, k);
      return { ok: true, candidates };
    } catch (error) {
      return { ok: false, error };
    }
  }
}
