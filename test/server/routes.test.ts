/**
 * Integration tests for the retrieval API routes.
 *
 * Uses a real Express app over an in-process pipeline.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../../src/server/server.js';
import { RetrievalPipeline, type PipelineOptions } from '../../src/retrieval/pipeline.js';
import { Reranker } from '../../src/retrieval/reranker.js';
import { LexicalIndex, tokenize } from '../../src/storage/lexical-index.js';
import type { VectorIndex } from '../../src/storage/vector-index-client.js';
import type { Candidate } from '../../src/storage/types.js';
import { RetrievalBackendError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

let server: Server;
let baseUrl: string;
let vectorSearch: Mock<(vector: readonly number[], k: number) => Promise<Candidate[]>>;

function buildPipeline(options: PipelineOptions = {}): RetrievalPipeline {
  const vectorIndex: VectorIndex = { search: vectorSearch };
  return new RetrievalPipeline({
    lexicalIndex: LexicalIndex.load([
      { id: '0', text: 'refund policy details', url: 'https://docs.example.com/refunds', title: 'Refunds' },
      { id: '1', text: 'shipping times' },
    ]),
    vectorIndex,
    embedder: { embedQuery: async () => [0.1, 0.2] },
    reranker: new Reranker({
      score: async (pairs) =>
        pairs.map(([query, text]) => {
          const queryTokens = new Set(tokenize(query));
          return tokenize(text).filter((t) => queryTokens.has(t)).length;
        }),
    }),
    options,
  });
}

async function listen(pipeline: RetrievalPipeline, defaultK?: number): Promise<void> {
  const app = createApp(pipeline, { defaultK });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => {
      const addr = server.address();
      if (addr && typeof addr === 'object') {
        baseUrl = `http://localhost:${addr.port}`;
      }
      resolve();
    });
  });
}

function get(path: string): Promise<{ status: number; json: () => Promise<any> }> {
  return globalThis.fetch(`${baseUrl}${path}`).then((res) => ({
    status: res.status,
    json: () => res.json(),
  }));
}

function post(path: string, body: string): Promise<{ status: number; json: () => Promise<any> }> {
  return globalThis
    .fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    })
    .then((res) => ({
      status: res.status,
      json: () => res.json(),
    }));
}

beforeEach(() => {
  vectorSearch = vi.fn<(vector: readonly number[], k: number) => Promise<Candidate[]>>(async () => []);
});

afterEach(async () => {
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
});

describe('GET /api/health', () => {
  it('reports the corpus size', async () => {
    await listen(buildPipeline());

    const res = await get('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', corpusSize: 2 });
  });
});

describe('POST /api/retrieve', () => {
  it('returns ranked contexts and citation urls', async () => {
    await listen(buildPipeline());

    const res = await post('/api/retrieve', JSON.stringify({ query: 'refund policy', k: 4 }));
    const data = await res.json();

    expect(res.status).toBe(200);
    expect(vectorSearch).toHaveBeenCalledWith([0.1, 0.2], 4);
    expect(data.contexts).toHaveLength(2);
    expect(data.contexts[0]).toMatchObject({
      id: '0',
      text: 'refund policy details',
      url: 'https://docs.example.com/refunds',
      title: 'Refunds',
      rerankScore: 2,
      source: 'lexical',
    });
    expect(data.contexts[1]).toEqual({
      id: '1',
      text: 'shipping times',
      url: null,
      title: null,
      score: 0,
      rerankScore: 0,
      source: 'lexical',
    });
    expect(data.urls).toEqual(['https://docs.example.com/refunds']);
    expect(data.degraded).toEqual([]);
    expect(data.totalConsidered).toBe(2);
  });

  it('uses the configured default k', async () => {
    await listen(buildPipeline(), 3);

    await post('/api/retrieve', JSON.stringify({ query: 'refund' }));

    expect(vectorSearch).toHaveBeenCalledWith([0.1, 0.2], 3);
  });

  it('rejects a blank query with 400', async () => {
    await listen(buildPipeline());

    const res = await post('/api/retrieve', JSON.stringify({ query: '  ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'query is required', code: 'INVALID_QUERY' });
  });

  it('rejects an invalid k with 400', async () => {
    await listen(buildPipeline());

    const res = await post('/api/retrieve', JSON.stringify({ query: 'refund', k: 0 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'k must be a positive integer', code: 'INVALID_K' });
  });

  it('rejects a non-object body with 400', async () => {
    await listen(buildPipeline());

    const res = await post('/api/retrieve', JSON.stringify(['refund']));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body must be a JSON object', code: 'INVALID_BODY' });
  });

  it('rejects malformed JSON with 400', async () => {
    await listen(buildPipeline());

    const res = await post('/api/retrieve', '{"query":');
    const data = await res.json();

    expect(res.status).toBe(400);
    expect(data.code).toBeUndefined();
  });

  it('reports a degraded vector stage', async () => {
    vectorSearch.mockRejectedValue(new RetrievalBackendError('down', 'VECTOR_STORE_UNREACHABLE'));
    await listen(buildPipeline());

    const res = await post('/api/retrieve', JSON.stringify({ query: 'refund' }));

    expect(res.status).toBe(200);
    expect((await res.json()).degraded).toEqual(['vector']);
  });

  it('maps an unrecoverable backend failure to 502', async () => {
    vectorSearch.mockRejectedValue(new RetrievalBackendError('down', 'VECTOR_STORE_UNREACHABLE'));
    await listen(buildPipeline({ degradeOnVectorFailure: false }));

    const res = await post('/api/retrieve', JSON.stringify({ query: 'refund' }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: 'Vector retrieval failed', code: 'RETRIEVAL_FAILED' });
  });
});
