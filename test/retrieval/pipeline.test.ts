/**
 * Tests for the hybrid retrieval pipeline with in-process collaborators.
 */

import { describe, it, expect, vi } from 'vitest';
import { RetrievalPipeline, collectUrls, DEFAULT_K, type PipelineOptions } from '../../src/retrieval/pipeline.js';
import { Reranker } from '../../src/retrieval/reranker.js';
import { LexicalIndex, tokenize } from '../../src/storage/lexical-index.js';
import type { VectorIndex } from '../../src/storage/vector-index-client.js';
import type { QueryEmbedder } from '../../src/models/embedder.js';
import type { RerankModel, ScoringPair } from '../../src/models/cross-encoder.js';
import type { Candidate, Chunk, RankedContext } from '../../src/storage/types.js';
import { RetrievalBackendError, RetrievalError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

const REFUNDS = 'https://docs.example.com/refunds';
const BILLING = 'https://docs.example.com/billing';
const SHIPPING = 'https://docs.example.com/shipping';
const ACCOUNT = 'https://docs.example.com/account';

const REFUND_TEXT =
  'To get a refund open Billing and choose Request refund for the order you want returned';

const corpus: Chunk[] = [
  { id: '0', text: REFUND_TEXT, url: REFUNDS, title: 'Refunds' },
  { id: '1', text: 'Shipping times vary by region and carrier', url: SHIPPING },
  { id: '2', text: 'Account deletion removes all data permanently', url: ACCOUNT },
  { id: '3', text: 'Refund requests get a reply within five business days', url: REFUNDS },
];

const vectorHits: Candidate[] = [
  { id: '0', text: REFUND_TEXT, url: REFUNDS, title: 'Refunds', score: 0.8, source: 'vector' },
  { id: '17', text: 'Billing settings let you manage invoices', url: BILLING, score: 0.5, source: 'vector' },
];

/** Scores a pair by how many distinct query tokens occur in the text. */
const overlapModel: RerankModel = {
  score: async (pairs: readonly ScoringPair[]) =>
    pairs.map(([query, text]) => {
      const queryTokens = new Set(tokenize(query));
      return [...new Set(tokenize(text))].filter((t) => queryTokens.has(t)).length;
    }),
};

interface Setup {
  vectorIndex?: VectorIndex;
  embedder?: QueryEmbedder;
  rerankModel?: RerankModel;
  options?: PipelineOptions;
}

function createPipeline(setup: Setup = {}) {
  const embedQuery = vi.fn(async (_query: string) => [1, 0]);
  const search = vi.fn(async (_vector: readonly number[], _k: number) => vectorHits);
  const pipeline = new RetrievalPipeline({
    lexicalIndex: LexicalIndex.load(corpus),
    vectorIndex: setup.vectorIndex ?? { search },
    embedder: setup.embedder ?? { embedQuery },
    reranker: new Reranker(setup.rerankModel ?? overlapModel),
    options: setup.options,
  });
  return { pipeline, embedQuery, search };
}

const QUERY = 'How do I get a refund';

describe('RetrievalPipeline', () => {
  it('defaults k to 8', () => {
    expect(DEFAULT_K).toBe(8);
  });

  it('reports the corpus size', () => {
    expect(createPipeline().pipeline.corpusSize).toBe(4);
  });

  describe('retrieve', () => {
    it('fuses, reranks and cites the refund page once', async () => {
      const { pipeline, embedQuery, search } = createPipeline();

      const response = await pipeline.retrieve(QUERY);

      expect(embedQuery).toHaveBeenCalledWith(QUERY);
      expect(search).toHaveBeenCalledWith([1, 0], 8);

      // Fused: vector copy of 0, 17, then lexical 3, 1, 2 (lexical 0 is a duplicate)
      expect(response.totalConsidered).toBe(5);
      expect(response.contexts.map((c) => c.id)).toEqual(['0', '3', '17', '1', '2']);
      expect(response.contexts.map((c) => c.rerankScore)).toEqual([3, 2, 0, 0, 0]);
      expect(response.contexts[0]).toMatchObject({ source: 'vector', score: 0.8, title: 'Refunds' });
      expect(response.urls).toEqual([REFUNDS, BILLING, SHIPPING, ACCOUNT]);
      expect(response.degraded).toEqual([]);
      expect(response.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('passes an explicit k to both sources', async () => {
      const { pipeline, search } = createPipeline();

      const response = await pipeline.retrieve(QUERY, 1);

      expect(search).toHaveBeenCalledWith([1, 0], 1);
      // Lexical top-1 is chunk 0, a duplicate of the first vector hit
      expect(response.contexts.map((c) => c.id)).toEqual(['0', '17']);
    });

    it('limits the contexts to topN', async () => {
      const { pipeline } = createPipeline({ options: { topN: 2 } });
      const response = await pipeline.retrieve(QUERY);
      expect(response.contexts.map((c) => c.id)).toEqual(['0', '3']);
      expect(response.urls).toEqual([REFUNDS]);
    });

    it('uses lexical results alone when the vector store fails', async () => {
      const failing: VectorIndex = {
        search: () => Promise.reject(new RetrievalBackendError('down', 'VECTOR_STORE_UNREACHABLE')),
      };
      const { pipeline } = createPipeline({ vectorIndex: failing });

      const response = await pipeline.retrieve(QUERY);

      expect(response.degraded).toEqual(['vector']);
      expect(response.contexts.map((c) => c.id)).toEqual(['0', '3', '1', '2']);
      expect(response.contexts.every((c) => c.source === 'lexical')).toBe(true);
      expect(response.urls).toEqual([REFUNDS, SHIPPING, ACCOUNT]);
    });

    it('uses lexical results alone when query embedding fails', async () => {
      const embedder: QueryEmbedder = {
        embedQuery: () => Promise.reject(new RetrievalBackendError('no model', 'EMBEDDING_FAILED')),
      };
      const { pipeline, search } = createPipeline({ embedder });

      const response = await pipeline.retrieve(QUERY);

      expect(search).not.toHaveBeenCalled();
      expect(response.degraded).toEqual(['vector']);
      expect(response.totalConsidered).toBe(4);
    });

    it('fails when the vector store fails and degradation is disabled', async () => {
      const cause = new RetrievalBackendError('missing', 'COLLECTION_NOT_FOUND');
      const { pipeline } = createPipeline({
        vectorIndex: { search: () => Promise.reject(cause) },
        options: { degradeOnVectorFailure: false },
      });

      const error = await pipeline.retrieve(QUERY).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({ code: 'RETRIEVAL_FAILED', cause });
    });

    it('fails when the vector store fails and no query term appears in the corpus', async () => {
      const cause = new RetrievalBackendError('down', 'VECTOR_STORE_UNREACHABLE');
      const { pipeline } = createPipeline({ vectorIndex: { search: () => Promise.reject(cause) } });

      const error = await pipeline.retrieve('warranty claim').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({ code: 'RETRIEVAL_FAILED', cause });
    });

    it('orders by source score when the rerank model fails', async () => {
      const { pipeline } = createPipeline({
        rerankModel: { score: () => Promise.reject(new Error('session lost')) },
      });

      const response = await pipeline.retrieve(QUERY);

      expect(response.degraded).toEqual(['rerank']);
      // Lexical BM25 of chunk 3 (about 1.42) outranks the cosine scores
      expect(response.contexts.map((c) => c.id)).toEqual(['3', '0', '17', '1', '2']);
      expect(response.contexts.every((c) => c.rerankScore === null)).toBe(true);
    });

    it('reports both stages when vector and rerank fail', async () => {
      const { pipeline } = createPipeline({
        vectorIndex: { search: () => Promise.reject(new Error('ECONNREFUSED')) },
        rerankModel: { score: async () => [] },
      });

      const response = await pipeline.retrieve(QUERY);

      expect(response.degraded).toEqual(['vector', 'rerank']);
      expect(response.contexts.map((c) => c.id)).toEqual(['0', '3', '1', '2']);
    });

    it('returns only lexical candidates when no vector hit clears the floor', async () => {
      const { pipeline } = createPipeline({ vectorIndex: { search: async () => [] } });

      const response = await pipeline.retrieve(QUERY);

      expect(response.degraded).toEqual([]);
      expect(response.totalConsidered).toBe(4);
    });

    it('rejects a blank query before calling any backend', async () => {
      const { pipeline, embedQuery } = createPipeline();

      await expect(pipeline.retrieve('   ')).rejects.toMatchObject({ code: 'INVALID_QUERY' });
      expect(embedQuery).not.toHaveBeenCalled();
    });

    it('rejects a non-positive k', async () => {
      const { pipeline } = createPipeline();
      await expect(pipeline.retrieve(QUERY, 0)).rejects.toMatchObject({ code: 'INVALID_K' });
      await expect(pipeline.retrieve(QUERY, 2.5)).rejects.toMatchObject({ code: 'INVALID_K' });
    });
  });
});

describe('collectUrls', () => {
  function ranked(url?: string): RankedContext {
    return { id: 'x', text: 't', url, score: 0, source: 'lexical', rerankScore: null };
  }

  it('keeps first-seen order without duplicates or empty urls', () => {
    expect(collectUrls([ranked('b'), ranked(), ranked('a'), ranked(''), ranked('b')])).toEqual([
      'b',
      'a',
    ]);
  });
});
