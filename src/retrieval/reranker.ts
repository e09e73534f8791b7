/**
 * Final precision pass: cross-encoder scoring of the fused candidate set.
 *
 * All pairs of one request are scored in a single batched model call.
 * Output is sorted by descending rerank score (stable, so ties keep input
 * order) and truncated to topN.
 */

import type { Candidate, RankedContext } from '../storage/types.js';
import type { RerankModel } from '../models/cross-encoder.js';
import { RerankModelError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reranker');

export const DEFAULT_TOP_N = 6;

export interface RerankerOptions {
  /** Deadline for the batched model call, in ms. 0 disables it. */
  timeoutMs?: number;
}

/**
 * Order candidates by their source score when the model is unavailable.
 * Scores from different sources are compared as-is.
 */
export function fallbackRank(candidates: readonly Candidate[], topN: number): RankedContext[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
    .slice(0, topN)
    .map(({ candidate }) => ({ ...candidate, rerankScore: null }));
}

export class Reranker {
  private readonly timeoutMs: number;

  constructor(
    private readonly model: RerankModel,
    options: RerankerOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Score every candidate against the query and keep the best topN.
   *
   * @throws RerankModelError when the model call fails, times out, or returns
   *   a score list that does not line up with the candidates
   */
  async rerank(
    query: string,
    candidates: readonly Candidate[],
    topN: number = DEFAULT_TOP_N,
  ): Promise<RankedContext[]> {
    if (candidates.length === 0) return [];

    const start = performance.now();
    const pairs = candidates.map((c) => [query, c.text] as const);

    let scores: number[];
    try {
      scores = await withTimeout(
        this.model.score(pairs),
        this.timeoutMs,
        () => new RerankModelError(`Rerank exceeded ${this.timeoutMs}ms`, 'RERANK_TIMEOUT'),
      );
    } catch (error) {
      if (error instanceof RerankModelError) throw error;
      throw new RerankModelError('Rerank model call failed', 'RERANK_FAILED', error);
    }

    if (scores.length !== candidates.length) {
      throw new RerankModelError(
        `Rerank model returned ${scores.length} scores for ${candidates.length} pairs`,
        'SCORE_COUNT_MISMATCH',
      );
    }
    if (!scores.every(Number.isFinite)) {
      throw new RerankModelError('Rerank model returned a non-finite score', 'INVALID_SCORE');
    }

    const ranked = candidates
      .map((candidate, index) => ({ candidate, score: scores[index], index }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, topN)
      .map(({ candidate, score }) => ({ ...candidate, rerankScore: score }));

    log.debug(`Reranked ${candidates.length} candidates in ${(performance.now() - start).toFixed(0)}ms`);
    return ranked;
  }
}
