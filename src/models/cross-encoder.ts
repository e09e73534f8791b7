/**
 * Cross-encoder relevance scoring with @huggingface/transformers.
 *
 * Each (query, passage) pair is tokenized as a sentence pair and passed through
 * a sequence-classification head. A single output logit is passed through a
 * sigmoid, so relevance scores lie in (0, 1).
 * All pairs of a request go through the model as one padded batch.
 */

import {
  AutoModelForSequenceClassification,
  AutoTokenizer,
  Tensor,
  type PreTrainedModel,
  type PreTrainedTokenizer,
} from '@huggingface/transformers';
import type { ModelConfig, ModelStats } from './model-registry.js';
import { RerankModelError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cross-encoder');

/** A (query, passage text) pair. */
export type ScoringPair = readonly [query: string, text: string];

/**
 * Rerank-model collaborator: maps a batch of pairs to relevance scores,
 * preserving order.
 */
export interface RerankModel {
  score(pairs: readonly ScoringPair[]): Promise<number[]>;
}

function hasLogits(value: unknown): value is { logits: Tensor } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'logits' in value &&
    value.logits instanceof Tensor
  );
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export class CrossEncoder implements RerankModel {
  private tokenizer: PreTrainedTokenizer | null = null;
  private model: PreTrainedModel | null = null;
  private config: ModelConfig | null = null;

  /**
   * Load tokenizer and model. Disposes any previously loaded model first.
   */
  async load(config: ModelConfig): Promise<ModelStats> {
    await this.dispose();

    const heapBefore = process.memoryUsage().heapUsed;
    const start = performance.now();

    this.tokenizer = await AutoTokenizer.from_pretrained(config.hfId);
    this.model = await AutoModelForSequenceClassification.from_pretrained(config.hfId, {
      dtype: 'fp32',
    });
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

  async score(pairs: readonly ScoringPair[]): Promise<number[]> {
    if (!this.tokenizer || !this.model) {
      throw new RerankModelError('No reranker loaded. Call load() first.', 'NO_MODEL');
    }
    if (pairs.length === 0) return [];

    const queries = pairs.map(([query]) => query);
    const texts = pairs.map(([, text]) => text);

    const features: unknown = this.tokenizer(queries, {
      text_pair: texts,
      padding: true,
      truncation: true,
    });
    const output: unknown = await this.model(features);

    if (!hasLogits(output)) {
      throw new RerankModelError('Reranker output has no logits', 'RERANK_FAILED');
    }

    const { logits } = output;
    const width = logits.dims[logits.dims.length - 1] ?? 1;
    const data = logits.data;
    const scores: number[] = [];
    for (let i = 0; i < pairs.length; i++) {
      const logit = Number(data[i * width]);
      scores.push(width === 1 ? sigmoid(logit) : logit);
    }

    logits.dispose();
    return scores;
  }

  async dispose(): Promise<void> {
    if (this.model) {
      await this.model.dispose();
    }
    this.model = null;
    this.tokenizer = null;
    this.config = null;
  }

  get currentModel(): ModelConfig | null {
    return this.config;
  }
}
