/**
 * Configuration exports.
 */

export {
  DEFAULT_CONFIG,
  getConfig,
  resolvePath,
  validateConfig,
} from './retrieval-config.js';
export type { RetrievalConfig } from './retrieval-config.js';

export {
  loadConfig,
  loadEnvConfig,
  toRuntimeConfig,
  validateExternalConfig,
  EXTERNAL_DEFAULTS,
} from './loader.js';
export type { ExternalConfig, LoadConfigOptions } from './loader.js';
