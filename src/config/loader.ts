/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (DOCSEARCH_*, plus the indexer's QDRANT_*)
 * 3. Project config file (./docsearch.config.json)
 * 4. User config file (~/.docsearch/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, type RetrievalConfig } from './retrieval-config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  vectorStore?: {
    url?: string;
    apiKey?: string;
    collection?: string;
    scoreThreshold?: number;
    timeoutMs?: number;
    dimension?: number;
  };
  corpus?: {
    path?: string;
  };
  bm25?: {
    k1?: number;
    b?: number;
  };
  models?: {
    embedding?: string;
    reranker?: string;
    rerankTimeoutMs?: number;
  };
  retrieval?: {
    defaultK?: number;
    topN?: number;
    dedupPrefixLength?: number;
    minFusedSize?: number;
    degradeOnVectorFailure?: boolean;
  };
  server?: {
    port?: number;
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  vectorStore: {
    url: DEFAULT_CONFIG.vectorStore.url,
    collection: DEFAULT_CONFIG.vectorStore.collection,
    scoreThreshold: DEFAULT_CONFIG.vectorStore.scoreThreshold,
    timeoutMs: DEFAULT_CONFIG.vectorStore.timeoutMs,
    dimension: DEFAULT_CONFIG.vectorStore.dimension,
  },
  corpus: {
    path: DEFAULT_CONFIG.corpusPath,
  },
  bm25: { ...DEFAULT_CONFIG.bm25 },
  models: {
    embedding: DEFAULT_CONFIG.embeddingModel,
    reranker: DEFAULT_CONFIG.rerankerModel,
    rerankTimeoutMs: DEFAULT_CONFIG.rerankTimeoutMs,
  },
  retrieval: {
    defaultK: DEFAULT_CONFIG.defaultK,
    topN: DEFAULT_CONFIG.topN,
    dedupPrefixLength: DEFAULT_CONFIG.dedupPrefixLength,
    minFusedSize: DEFAULT_CONFIG.minFusedSize,
    degradeOnVectorFailure: DEFAULT_CONFIG.degradeOnVectorFailure,
  },
  server: {
    port: DEFAULT_CONFIG.port,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (!isPlainObject(content)) {
      log.warn(`Ignoring config file ${path}: not a JSON object`);
      return null;
    }
    return content as ExternalConfig;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

function envNumber(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  return Number(raw);
}

/**
 * Load config from environment variables.
 * Variables are prefixed with DOCSEARCH_ and use underscores for nesting.
 * Examples:
 *   DOCSEARCH_VECTOR_STORE_URL=http://qdrant:6333
 *   DOCSEARCH_RETRIEVAL_TOP_N=6
 *   DOCSEARCH_CORPUS_PATH=data/index/bm25_corpus.jsonl
 *
 * The indexer's QDRANT_URL, QDRANT_API_KEY and QDRANT_COLLECTION are honoured
 * when the prefixed form is absent.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ExternalConfig {
  const config: ExternalConfig = {};

  // Vector store
  const url = env.DOCSEARCH_VECTOR_STORE_URL ?? env.QDRANT_URL;
  if (url) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.url = url;
  }
  const apiKey = env.DOCSEARCH_VECTOR_STORE_API_KEY ?? env.QDRANT_API_KEY;
  if (apiKey) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.apiKey = apiKey;
  }
  const collection = env.DOCSEARCH_VECTOR_STORE_COLLECTION ?? env.QDRANT_COLLECTION;
  if (collection) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.collection = collection;
  }
  const scoreThreshold = envNumber('DOCSEARCH_VECTOR_STORE_SCORE_THRESHOLD', env);
  if (scoreThreshold !== undefined) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.scoreThreshold = scoreThreshold;
  }
  const vectorTimeout = envNumber('DOCSEARCH_VECTOR_STORE_TIMEOUT_MS', env);
  if (vectorTimeout !== undefined) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.timeoutMs = vectorTimeout;
  }
  const dimension = envNumber('DOCSEARCH_VECTOR_STORE_DIMENSION', env);
  if (dimension !== undefined) {
    config.vectorStore = config.vectorStore ?? {};
    config.vectorStore.dimension = dimension;
  }

  // Corpus
  if (env.DOCSEARCH_CORPUS_PATH) {
    config.corpus = { path: env.DOCSEARCH_CORPUS_PATH };
  }

  // BM25
  const k1 = envNumber('DOCSEARCH_BM25_K1', env);
  if (k1 !== undefined) {
    config.bm25 = config.bm25 ?? {};
    config.bm25.k1 = k1;
  }
  const b = envNumber('DOCSEARCH_BM25_B', env);
  if (b !== undefined) {
    config.bm25 = config.bm25 ?? {};
    config.bm25.b = b;
  }

  // Models
  if (env.DOCSEARCH_MODELS_EMBEDDING) {
    config.models = config.models ?? {};
    config.models.embedding = env.DOCSEARCH_MODELS_EMBEDDING;
  }
  if (env.DOCSEARCH_MODELS_RERANKER) {
    config.models = config.models ?? {};
    config.models.reranker = env.DOCSEARCH_MODELS_RERANKER;
  }
  const rerankTimeout = envNumber('DOCSEARCH_MODELS_RERANK_TIMEOUT_MS', env);
  if (rerankTimeout !== undefined) {
    config.models = config.models ?? {};
    config.models.rerankTimeoutMs = rerankTimeout;
  }

  // Retrieval
  const defaultK = envNumber('DOCSEARCH_RETRIEVAL_DEFAULT_K', env);
  if (defaultK !== undefined) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.defaultK = defaultK;
  }
  const topN = envNumber('DOCSEARCH_RETRIEVAL_TOP_N', env);
  if (topN !== undefined) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.topN = topN;
  }
  if (env.DOCSEARCH_RETRIEVAL_DEGRADE_ON_VECTOR_FAILURE) {
    config.retrieval = config.retrieval ?? {};
    config.retrieval.degradeOnVectorFailure =
      env.DOCSEARCH_RETRIEVAL_DEGRADE_ON_VECTOR_FAILURE === 'true';
  }

  // Server
  const port = envNumber('DOCSEARCH_SERVER_PORT', env) ?? envNumber('PORT', env);
  if (port !== undefined) {
    config.server = { port };
  }

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 * One level of nesting, which is all ExternalConfig has.
 */
function deepMerge(target: ExternalConfig, source: ExternalConfig): Required<ExternalConfig> {
  return {
    vectorStore: { ...target.vectorStore, ...source.vectorStore },
    corpus: { ...target.corpus, ...source.corpus },
    bm25: { ...target.bm25, ...source.bm25 },
    models: { ...target.models, ...source.models },
    retrieval: { ...target.retrieval, ...source.retrieval },
    server: { ...target.server, ...source.server },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  const threshold = config.vectorStore?.scoreThreshold;
  if (threshold !== undefined && (Number.isNaN(threshold) || threshold < -1 || threshold > 1)) {
    errors.push('vectorStore.scoreThreshold must be between -1 and 1');
  }
  const vectorTimeout = config.vectorStore?.timeoutMs;
  if (vectorTimeout !== undefined && (Number.isNaN(vectorTimeout) || vectorTimeout < 0)) {
    errors.push('vectorStore.timeoutMs must be >= 0 (0 = no timeout)');
  }
  const dimension = config.vectorStore?.dimension;
  if (dimension !== undefined && (!Number.isInteger(dimension) || dimension < 1)) {
    errors.push('vectorStore.dimension must be a positive integer');
  }

  if (config.bm25?.k1 !== undefined && (Number.isNaN(config.bm25.k1) || config.bm25.k1 < 0)) {
    errors.push('bm25.k1 must be >= 0');
  }
  if (
    config.bm25?.b !== undefined &&
    (Number.isNaN(config.bm25.b) || config.bm25.b < 0 || config.bm25.b > 1)
  ) {
    errors.push('bm25.b must be between 0 and 1 (inclusive)');
  }

  const rerankTimeout = config.models?.rerankTimeoutMs;
  if (rerankTimeout !== undefined && (Number.isNaN(rerankTimeout) || rerankTimeout < 0)) {
    errors.push('models.rerankTimeoutMs must be >= 0 (0 = no timeout)');
  }

  for (const field of ['defaultK', 'topN', 'dedupPrefixLength', 'minFusedSize'] as const) {
    const value = config.retrieval?.[field];
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      errors.push(`retrieval.${field} must be a positive integer`);
    }
  }

  const port = config.server?.port;
  if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
    errors.push('server.port must be an integer between 0 and 65535');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config: ExternalConfig = deepMerge(EXTERNAL_DEFAULTS, {});

  // User config file
  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.docsearch/config.json');
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'docsearch.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig(options.env));
  }

  // CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return deepMerge(EXTERNAL_DEFAULTS, config);
}

/**
 * Convert ExternalConfig to RetrievalConfig (the runtime format).
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): RetrievalConfig {
  const { vectorStore, corpus, bm25, models, retrieval, server } = external;

  return {
    vectorStore: {
      url: vectorStore.url ?? DEFAULT_CONFIG.vectorStore.url,
      apiKey: vectorStore.apiKey,
      collection: vectorStore.collection ?? DEFAULT_CONFIG.vectorStore.collection,
      scoreThreshold: vectorStore.scoreThreshold ?? DEFAULT_CONFIG.vectorStore.scoreThreshold,
      timeoutMs: vectorStore.timeoutMs ?? DEFAULT_CONFIG.vectorStore.timeoutMs,
      dimension: vectorStore.dimension ?? DEFAULT_CONFIG.vectorStore.dimension,
    },

    corpusPath: resolvePath(corpus.path ?? DEFAULT_CONFIG.corpusPath),
    bm25: {
      k1: bm25.k1 ?? DEFAULT_CONFIG.bm25.k1,
      b: bm25.b ?? DEFAULT_CONFIG.bm25.b,
    },

    embeddingModel: models.embedding ?? DEFAULT_CONFIG.embeddingModel,
    rerankerModel: models.reranker ?? DEFAULT_CONFIG.rerankerModel,
    rerankTimeoutMs: models.rerankTimeoutMs ?? DEFAULT_CONFIG.rerankTimeoutMs,

    defaultK: retrieval.defaultK ?? DEFAULT_CONFIG.defaultK,
    topN: retrieval.topN ?? DEFAULT_CONFIG.topN,
    dedupPrefixLength: retrieval.dedupPrefixLength ?? DEFAULT_CONFIG.dedupPrefixLength,
    minFusedSize: retrieval.minFusedSize ?? DEFAULT_CONFIG.minFusedSize,
    degradeOnVectorFailure:
      retrieval.degradeOnVectorFailure ?? DEFAULT_CONFIG.degradeOnVectorFailure,

    port: server.port ?? DEFAULT_CONFIG.port,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
