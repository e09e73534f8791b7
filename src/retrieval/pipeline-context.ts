/**
 * Process-wide retrieval state, built once before serving traffic.
 *
 * Corpus, lexical index, models and the vector-store client are created here
 * and handed to RetrievalPipeline explicitly. Any failure while building is
 * fatal for the process.
 */

import { readCorpus } from '../parser/corpus-reader.js';
import { LexicalIndex } from '../storage/lexical-index.js';
import {
  VectorIndexClient,
  createQdrantClient,
  type VectorIndex,
  type VectorStoreApi,
} from '../storage/vector-index-client.js';
import { Embedder, type QueryEmbedder } from '../models/embedder.js';
import { CrossEncoder, type RerankModel } from '../models/cross-encoder.js';
import { getModel } from '../models/model-registry.js';
import { Reranker } from './reranker.js';
import type { PipelineContext } from './pipeline.js';
import { validateConfig, type RetrievalConfig } from '../config/retrieval-config.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pipeline-context');

/**
 * Prebuilt collaborators that replace the defaults (test doubles, shared clients).
 */
export interface PipelineContextOverrides {
  vectorStoreApi?: VectorStoreApi;
  vectorIndex?: VectorIndex;
  embedder?: QueryEmbedder;
  rerankModel?: RerankModel;
}

export interface ManagedPipelineContext extends PipelineContext {
  /** Release model sessions. */
  dispose(): Promise<void>;
}

/**
 * Build the pipeline context from configuration.
 *
 * @throws ConfigError for invalid configuration
 * @throws IndexUnavailableError when the corpus snapshot cannot back an index
 */
export async function createPipelineContext(
  config: RetrievalConfig,
  overrides: PipelineContextOverrides = {},
): Promise<ManagedPipelineContext> {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const start = Date.now();

  const corpus = await readCorpus(config.corpusPath);
  const lexicalIndex = LexicalIndex.load(corpus, config.bm25);

  const { embedder, rerankModel, disposables } = await loadModels(config, overrides);

  const vectorIndex =
    overrides.vectorIndex ??
    new VectorIndexClient(overrides.vectorStoreApi ?? createQdrantClient(config.vectorStore), {
      collection: config.vectorStore.collection,
      scoreThreshold: config.vectorStore.scoreThreshold,
      timeoutMs: config.vectorStore.timeoutMs,
      dimension: config.vectorStore.dimension,
    });

  log.info(`Pipeline ready in ${Date.now() - start}ms`, {
    chunks: lexicalIndex.size,
    collection: config.vectorStore.collection,
  });

  return {
    lexicalIndex,
    vectorIndex,
    embedder,
    reranker: new Reranker(rerankModel, { timeoutMs: config.rerankTimeoutMs }),
    options: {
      topN: config.topN,
      dedupPrefixLength: config.dedupPrefixLength,
      minFusedSize: config.minFusedSize,
      degradeOnVectorFailure: config.degradeOnVectorFailure,
    },
    dispose: () => disposeAll(disposables),
  };
}

interface Disposable {
  dispose(): Promise<void>;
}

interface LoadedModels {
  embedder: QueryEmbedder;
  rerankModel: RerankModel;
  /** Models loaded here; overrides stay owned by the caller */
  disposables: Disposable[];
}

/**
 * Load the models not supplied as overrides. A failed load releases the
 * sessions already opened before rethrowing.
 */
async function loadModels(
  config: RetrievalConfig,
  overrides: PipelineContextOverrides,
): Promise<LoadedModels> {
  const disposables: Disposable[] = [];
  try {
    let embedder = overrides.embedder;
    if (!embedder) {
      const loaded = new Embedder();
      disposables.push(loaded);
      await loaded.load(getModel(config.embeddingModel, 'embedding'));
      embedder = loaded;
    }

    let rerankModel = overrides.rerankModel;
    if (!rerankModel) {
      const loaded = new CrossEncoder();
      disposables.push(loaded);
      await loaded.load(getModel(config.rerankerModel, 'reranker'));
      rerankModel = loaded;
    }

    return { embedder, rerankModel, disposables };
  } catch (error) {
    await disposeAll(disposables);
    throw error;
  }
}

async function disposeAll(disposables: readonly Disposable[]): Promise<void> {
  for (const d of disposables) {
    await d.dispose();
  }
}
