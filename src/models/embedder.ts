/**
 * Query embedding wrapper around @huggingface/transformers.
 *
 * Loads a feature-extraction pipeline once and exposes embedQuery() for the
 * retrieval pipeline. Applies the model's query prefix where it needs one.
 */

import { pipeline, type FeatureExtractionPipeline } from '@huggingface/transformers';
import type { ModelConfig, ModelStats } from './model-registry.js';
import { RetrievalBackendError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedder');

export interface EmbedResult {
  /** The embedding vector. */
  embedding: number[];
  /** Inference time in ms. */
  inferenceMs: number;
}

/** Embedding collaborator consumed by the retrieval pipeline. */
export interface QueryEmbedder {
  embedQuery(query: string): Promise<number[]>;
}

type FeatureExtractionFactory = (
  task: 'feature-extraction',
  model: string,
  options: { dtype: 'fp32' },
) => Promise<FeatureExtractionPipeline>;

// The generic pipeline() signature is too wide for the compiler to resolve.
const createFeatureExtractor = pipeline as unknown as FeatureExtractionFactory;

export class Embedder implements QueryEmbedder {
  private pipe: FeatureExtractionPipeline | null = null;
  private config: ModelConfig | null = null;

  /**
   * Load a model. Disposes any previously loaded model first.
   */
  async load(config: ModelConfig): Promise<ModelStats> {
    await this.dispose();

    const heapBefore = process.memoryUsage().heapUsed;
    const start = performance.now();

    this.pipe = await createFeatureExtractor('feature-extraction', config.hfId, { dtype: 'fp32' });
    this.config = config;

    const loadTimeMs = performance.now() - start;
    const heapUsedMB = (process.memoryUsage().heapUsed - heapBefore) / (1024 * 1024);

    log.info(`Loaded ${config.id} in ${loadTimeMs.toFixed(0)}ms`);

    return {
      modelId: config.id,
      loadTimeMs,
      heapUsedMB: Math.max(0, heapUsedMB),
    };
  }

  /**
   * Embed a single text with mean pooling and L2 normalization.
   */
  async embed(text: string, isQuery: boolean = false): Promise<EmbedResult> {
    if (!this.pipe || !this.config) {
      throw new Error('No model loaded. Call load() first.');
    }

    const prefixed = this.config.usesPrefix && isQuery ? this.config.queryPrefix + text : text;

    const start = performance.now();
    const output = await this.pipe(prefixed, {
      pooling: 'mean',
      normalize: true,
    });
    const inferenceMs = performance.now() - start;

    const data = output.data;
    const length = Math.min(data.length, this.config.dims);
    const embedding: number[] = [];
    for (let i = 0; i < length; i++) {
      embedding.push(Number(data[i]));
    }

    if (typeof output.dispose === 'function') {
      output.dispose();
    }

    return { embedding, inferenceMs };
  }

  /**
   * Embed a search query. Failures surface as RetrievalBackendError.
   */
  async embedQuery(query: string): Promise<number[]> {
    try {
      const { embedding } = await this.embed(query, true);
      return embedding;
    } catch (error) {
      throw new RetrievalBackendError('Query embedding failed', 'EMBEDDING_FAILED', error);
    }
  }

  /**
   * Dispose the current model to free memory.
   */
  async dispose(): Promise<void> {
    if (this.pipe) {
      await this.pipe.dispose();
      this.pipe = null;
      this.config = null;
    }
  }

  get currentModel(): ModelConfig | null {
    return this.config;
  }
}
