/**
 * Shared CLI utilities.
 */

import { loadConfig, toRuntimeConfig, type ExternalConfig } from '../config/loader.js';
import type { RetrievalConfig } from '../config/retrieval-config.js';
import { createPipelineContext, type ManagedPipelineContext } from '../retrieval/pipeline-context.js';
import { RetrievalPipeline } from '../retrieval/pipeline.js';

/**
 * Read the value after `flag` as an integer.
 *
 * @returns undefined when the flag is absent
 * @throws Error when the flag has no integer value
 */
export function parseIntFlag(args: readonly string[], flag: string): number | undefined {
  const index = args.indexOf(flag);
  if (index < 0) return undefined;

  const raw = args[index + 1];
  const value = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} requires an integer value`);
  }
  return value;
}

/**
 * Arguments that are neither flags nor values of `valueFlags`.
 */
export function positionalArgs(args: readonly string[], valueFlags: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
    } else if (!arg.startsWith('--')) {
      result.push(arg);
    }
  }
  return result;
}

/**
 * Mask secrets before printing a config.
 */
export function redactConfig(config: Required<ExternalConfig>): Required<ExternalConfig> {
  if (!config.vectorStore.apiKey) return config;
  return { ...config, vectorStore: { ...config.vectorStore, apiKey: '***' } };
}

export interface LoadedPipeline {
  config: RetrievalConfig;
  context: ManagedPipelineContext;
  pipeline: RetrievalPipeline;
}

/**
 * Resolve configuration and build the pipeline the commands run against.
 */
export async function loadPipeline(cliOverrides?: ExternalConfig): Promise<LoadedPipeline> {
  const config = toRuntimeConfig(loadConfig({ cliOverrides }));
  const context = await createPipelineContext(config);
  return { config, context, pipeline: new RetrievalPipeline(context) };
}
