/**
 * Model configurations for the query embedder and the cross-encoder reranker.
 */

import { ConfigError } from '../utils/errors.js';

export type ModelKind = 'embedding' | 'reranker';

export interface ModelConfig {
  /** Short identifier. */
  id: string;
  kind: ModelKind;
  /** HuggingFace model ID (ONNX export). */
  hfId: string;
  /** Embedding dimensions (embedding models only). */
  dims: number;
  /** Context window in tokens. */
  contextTokens: number;
  /** Whether the model uses task prefixes. */
  usesPrefix: boolean;
  /** Prefix for query embedding (if usesPrefix). */
  queryPrefix: string;
  /** Notes about the model. */
  notes: string;
}

export interface ModelStats {
  modelId: string;
  loadTimeMs: number;
  heapUsedMB: number;
}

export const MODEL_REGISTRY: Record<string, ModelConfig> = {
  'minilm-l6': {
    id: 'minilm-l6',
    kind: 'embedding',
    hfId: 'Xenova/all-MiniLM-L6-v2',
    dims: 384,
    contextTokens: 256,
    usesPrefix: false,
    queryPrefix: '',
    notes: 'Same model the indexer embeds chunks with; collection dimension 384.',
  },
  'bge-small': {
    id: 'bge-small',
    kind: 'embedding',
    hfId: 'Xenova/bge-small-en-v1.5',
    dims: 384,
    contextTokens: 512,
    usesPrefix: true,
    queryPrefix: 'Represent this sentence for searching relevant passages: ',
    notes: 'Only valid against a collection indexed with bge-small.',
  },
  'ms-marco-minilm-l6': {
    id: 'ms-marco-minilm-l6',
    kind: 'reranker',
    hfId: 'Xenova/ms-marco-MiniLM-L-6-v2',
    dims: 0,
    contextTokens: 512,
    usesPrefix: false,
    queryPrefix: '',
    notes: 'Cross-encoder with a single relevance logit per pair.',
  },
  'ms-marco-minilm-l12': {
    id: 'ms-marco-minilm-l12',
    kind: 'reranker',
    hfId: 'Xenova/ms-marco-MiniLM-L-12-v2',
    dims: 0,
    contextTokens: 512,
    usesPrefix: false,
    queryPrefix: '',
    notes: 'Slower, slightly more accurate.',
  },
};

export function getModel(id: string, kind?: ModelKind): ModelConfig {
  const config = MODEL_REGISTRY[id];
  if (!config || (kind && config.kind !== kind)) {
    const available = getAllModelIds(kind).join(', ');
    throw new ConfigError(`Unknown ${kind ? `${kind} ` : ''}model: ${id}. Available: ${available}`, 'UNKNOWN_MODEL');
  }
  return config;
}

export function getAllModelIds(kind?: ModelKind): string[] {
  return Object.values(MODEL_REGISTRY)
    .filter((m) => !kind || m.kind === kind)
    .map((m) => m.id);
}
