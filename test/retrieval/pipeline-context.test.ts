/**
 * Tests for building the process-wide pipeline context.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const models = vi.hoisted(() => ({
  disposeEmbedder: vi.fn(async () => {}),
  pipeline: vi.fn(),
  tokenizerFromPretrained: vi.fn(),
  modelFromPretrained: vi.fn(),
}));

vi.mock('@huggingface/transformers', () => ({
  pipeline: models.pipeline,
  Tensor: class {},
  AutoTokenizer: { from_pretrained: models.tokenizerFromPretrained },
  AutoModelForSequenceClassification: { from_pretrained: models.modelFromPretrained },
}));
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createPipelineContext } from '../../src/retrieval/pipeline-context.js';
import { RetrievalPipeline } from '../../src/retrieval/pipeline.js';
import { DEFAULT_CONFIG, getConfig } from '../../src/config/retrieval-config.js';
import { loadConfig, toRuntimeConfig } from '../../src/config/loader.js';
import type { VectorHit, VectorSearchRequest, VectorStoreApi } from '../../src/storage/vector-index-client.js';
import type { RerankModel } from '../../src/models/cross-encoder.js';
import { ConfigError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

const REFUNDS = 'https://docs.example.com/refunds';

let dir: string;
let corpusPath: string;

const embedder = { embedQuery: async () => [0.6, 0.8] };
const rerankModel: RerankModel = { score: async (pairs) => pairs.map((_, i) => -i) };

function storeReturning(hits: VectorHit[]) {
  const search = vi.fn(async (_collection: string, _request: VectorSearchRequest) => hits);
  const api: VectorStoreApi = { search };
  return { api, search };
}

beforeEach(() => {
  vi.clearAllMocks();
  dir = mkdtempSync(join(tmpdir(), 'docsearch-context-'));
  corpusPath = join(dir, 'bm25_corpus.jsonl');
  writeFileSync(
    corpusPath,
    [
      JSON.stringify({ text: 'refund policy details', metadata: { url: REFUNDS, title: 'Refunds' } }),
      JSON.stringify({ text: 'shipping times', metadata: { source_path: 'data/raw/shipping.md' } }),
    ].join('\n'),
  );
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('createPipelineContext', () => {
  it('builds the lexical index and carries the retrieval options', async () => {
    const { api } = storeReturning([]);
    const context = await createPipelineContext(getConfig({ corpusPath, topN: 4 }), {
      embedder,
      rerankModel,
      vectorStoreApi: api,
    });

    expect(context.lexicalIndex.size).toBe(2);
    expect(context.options).toEqual({
      topN: 4,
      dedupPrefixLength: 64,
      minFusedSize: 10,
      degradeOnVectorFailure: true,
    });
    await context.dispose();
  });

  it('wires the vector store client into a working pipeline', async () => {
    const { api, search } = storeReturning([
      { id: 0, score: 0.91, payload: { text: 'refund policy details', url: REFUNDS, title: 'Refunds' } },
    ]);
    const config = getConfig({
      corpusPath,
      vectorStore: { ...DEFAULT_CONFIG.vectorStore, dimension: 2 },
    });
    const context = await createPipelineContext(config, { embedder, rerankModel, vectorStoreApi: api });

    const response = await new RetrievalPipeline(context).retrieve('refund policy');

    expect(search).toHaveBeenCalledWith('capillary_docs', {
      vector: [0.6, 0.8],
      limit: 8,
      with_payload: true,
      score_threshold: 0.15,
    });
    expect(response.contexts.map((c) => [c.id, c.source])).toEqual([
      ['0', 'vector'],
      ['1', 'lexical'],
    ]);
    expect(response.urls).toEqual([REFUNDS, 'data/raw/shipping.md']);
  });

  it('degrades when the embedding does not match the collection dimension', async () => {
    const { api, search } = storeReturning([]);
    const context = await createPipelineContext(getConfig({ corpusPath }), {
      embedder,
      rerankModel,
      vectorStoreApi: api,
    });

    const response = await new RetrievalPipeline(context).retrieve('refund');

    expect(search).not.toHaveBeenCalled();
    expect(response.degraded).toEqual(['vector']);
  });

  it('rejects invalid configuration', async () => {
    const error = await createPipelineContext(getConfig({ corpusPath, topN: 0 })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'Invalid configuration: topN must be a positive integer',
    });
  });

  it('fails when the corpus snapshot is missing', async () => {
    await expect(
      createPipelineContext(getConfig({ corpusPath: join(dir, 'missing.jsonl') }), { embedder, rerankModel }),
    ).rejects.toMatchObject({ code: 'CORPUS_NOT_FOUND' });
  });

  it('fails for an unknown reranker model', async () => {
    await expect(
      createPipelineContext(getConfig({ corpusPath, rerankerModel: 'minilm-l6' }), { embedder }),
    ).rejects.toMatchObject({ code: 'UNKNOWN_MODEL' });
  });

  it('rejects a malformed numeric environment value before building anything', async () => {
    const config = toRuntimeConfig(
      loadConfig({
        skipUserConfig: true,
        skipProjectConfig: true,
        env: { DOCSEARCH_BM25_K1: 'abc', DOCSEARCH_CORPUS_PATH: corpusPath },
      }),
    );

    const error = await createPipelineContext(config, { embedder, rerankModel }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'Invalid configuration: bm25.k1 must be a non-negative number',
    });
  });

  it('releases the embedder when the cross-encoder fails to load', async () => {
    models.pipeline.mockResolvedValue(Object.assign(vi.fn(), { dispose: models.disposeEmbedder }));
    models.tokenizerFromPretrained.mockResolvedValue(vi.fn());
    models.modelFromPretrained.mockRejectedValue(new Error('weights unavailable'));

    await expect(createPipelineContext(getConfig({ corpusPath }))).rejects.toThrow('weights unavailable');
    expect(models.pipeline).toHaveBeenCalledTimes(1);
    expect(models.disposeEmbedder).toHaveBeenCalledTimes(1);
  });
});
