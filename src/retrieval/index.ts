/**
 * Retrieval system exports.
 */

// Pipeline
export { RetrievalPipeline, collectUrls, DEFAULT_K } from './pipeline.js';
export type {
  RetrievalResponse,
  PipelineContext,
  PipelineOptions,
  DegradedStage,
} from './pipeline.js';

// Process-wide context
export { createPipelineContext } from './pipeline-context.js';
export type { ManagedPipelineContext, PipelineContextOverrides } from './pipeline-context.js';

// Candidate fusion
export { mergeCandidates, dedupKey, fusedLimit } from './candidate-fusion.js';
export type { FusionOptions } from './candidate-fusion.js';

// Reranking
export { Reranker, fallbackRank, DEFAULT_TOP_N } from './reranker.js';
export type { RerankerOptions } from './reranker.js';

// Prompt assembly
export { buildPrompt, formatContext, DEFAULT_INSTRUCTIONS } from './prompt-builder.js';
