import { Router } from 'express';
import type { RetrievalPipeline, RetrievalResponse } from '../../retrieval/pipeline.js';
import { RetrievalError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware/async-handler.js';

export interface RetrieveBody {
  query: string;
  k?: number;
}

/**
 * Validate a request body against `{ query: string, k?: number }`.
 */
export function parseRetrieveBody(body: unknown): RetrieveBody {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RetrievalError('Request body must be a JSON object', 'INVALID_BODY');
  }
  const query = 'query' in body ? body.query : undefined;
  if (typeof query !== 'string' || !query.trim()) {
    throw new RetrievalError('query is required', 'INVALID_QUERY');
  }

  const k = 'k' in body ? body.k : undefined;
  if (k === undefined || k === null) {
    return { query };
  }
  if (typeof k !== 'number' || !Number.isInteger(k) || k < 1) {
    throw new RetrievalError('k must be a positive integer', 'INVALID_K');
  }
  return { query, k };
}

/**
 * Wire shape: absent url/title are explicit nulls.
 */
export function serializeResponse(response: RetrievalResponse) {
  return {
    contexts: response.contexts.map((c) => ({
      id: c.id,
      text: c.text,
      url: c.url ?? null,
      title: c.title ?? null,
      score: c.score,
      rerankScore: c.rerankScore,
      source: c.source,
    })),
    urls: response.urls,
    degraded: response.degraded,
    totalConsidered: response.totalConsidered,
    durationMs: response.durationMs,
  };
}

export function createRetrieveRouter(pipeline: RetrievalPipeline, defaultK: number): Router {
  const router = Router();

  /**
   * POST /api/retrieve: ranked contexts and citation URLs for a query.
   */
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const { query, k = defaultK } = parseRetrieveBody(req.body);
      const response = await pipeline.retrieve(query, k);
      res.json(serializeResponse(response));
    }),
  );

  return router;
}
