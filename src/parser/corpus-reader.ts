/**
 * Reads the lexical corpus snapshot written by the indexing job.
 *
 * One JSON record per line: `{ "text": ..., "metadata": { url, source_path, title, chunk_id } }`.
 * Uses readline so large snapshots are streamed rather than read whole.
 */

import { createReadStream, existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Chunk } from '../storage/types.js';
import { IndexUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('corpus-reader');

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Convert one parsed snapshot line into a Chunk.
 *
 * Returns null for records whose text is blank (they must not enter the index).
 * Throws on records that are not objects with a string `text`.
 */
export function toChunk(value: unknown, position: number): Chunk | null {
  if (!isRecordObject(value) || typeof value.text !== 'string') {
    throw new IndexUnavailableError(
      `Corpus record ${position + 1} has no text field`,
      'CORPUS_PARSE_FAILED',
    );
  }

  if (!value.text.trim()) return null;

  const metadata = isRecordObject(value.metadata) ? value.metadata : {};
  const sourcePath = optionalString(metadata.source_path);
  const chunkIndex = typeof metadata.chunk_id === 'number' ? metadata.chunk_id : undefined;

  return {
    id: String(position),
    text: value.text,
    url: optionalString(metadata.url) ?? sourcePath,
    title: optionalString(metadata.title),
    sourcePath,
    chunkIndex,
  };
}

/**
 * Stream chunks from a corpus snapshot.
 *
 * Chunk ids are line positions among non-blank lines, matching the point ids
 * the indexer uploads to the vector store.
 */
export async function* streamCorpus(filePath: string): AsyncGenerator<Chunk> {
  if (!existsSync(filePath)) {
    throw new IndexUnavailableError(`Corpus snapshot not found: ${filePath}`, 'CORPUS_NOT_FOUND');
  }

  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  let position = 0;
  let skipped = 0;

  try {
    for await (const line of rl) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new IndexUnavailableError(
          `Corpus record ${position + 1} is not valid JSON`,
          'CORPUS_PARSE_FAILED',
          error,
        );
      }

      const chunk = toChunk(parsed, position);
      position++;

      if (!chunk) {
        skipped++;
        continue;
      }
      yield chunk;
    }
  } finally {
    rl.close();
    stream.destroy();
  }

  if (skipped > 0) {
    log.warn(`Skipped ${skipped} corpus records with empty text`, { filePath });
  }
}

/**
 * Read the whole corpus snapshot. Fails if no usable chunk remains.
 */
export async function readCorpus(filePath: string): Promise<Chunk[]> {
  const chunks: Chunk[] = [];
  for await (const chunk of streamCorpus(filePath)) {
    chunks.push(chunk);
  }

  if (chunks.length === 0) {
    throw new IndexUnavailableError(`Corpus snapshot has no indexable chunks: ${filePath}`, 'CORPUS_EMPTY');
  }

  log.info(`Loaded ${chunks.length} chunks`, { filePath });
  return chunks;
}
