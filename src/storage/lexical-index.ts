/**
 * In-memory BM25 (Okapi) index over the corpus snapshot.
 *
 * Built once at startup; every structure is read-only afterwards, so
 * concurrent searches need no synchronization.
 *
 * score(D, Q) = Σ_{t∈Q} IDF(t) · f(t,D)·(k1+1) / (f(t,D) + k1·(1 − b + b·|D|/avgdl))
 * IDF(t)      = ln((N − n(t) + 0.5) / (n(t) + 0.5) + 1)
 */

import type { Candidate, Chunk } from './types.js';
import { IndexUnavailableError, RetrievalError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('lexical-index');

export interface BM25Params {
  /** Term-frequency saturation */
  k1: number;
  /** Length normalization */
  b: number;
}

export const DEFAULT_BM25_PARAMS: BM25Params = { k1: 1.5, b: 0.75 };

/**
 * Split text on whitespace. No stemming, lowercasing or stopword removal.
 */
export function tokenize(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RetrievalError(`${name} must be a positive integer, got ${value}`, 'INVALID_K');
  }
}

export class LexicalIndex {
  private constructor(
    private readonly corpus: readonly Chunk[],
    private readonly termFrequencies: readonly ReadonlyMap<string, number>[],
    private readonly docLengths: readonly number[],
    private readonly idf: ReadonlyMap<string, number>,
    private readonly avgDocLength: number,
    private readonly params: BM25Params,
  ) {}

  /**
   * Build the index. Throws IndexUnavailableError for an empty corpus or a chunk without text.
   */
  static load(corpus: readonly Chunk[], params: BM25Params = DEFAULT_BM25_PARAMS): LexicalIndex {
    if (corpus.length === 0) {
      throw new IndexUnavailableError('Cannot build a lexical index from an empty corpus', 'CORPUS_EMPTY');
    }

    const start = performance.now();
    const termFrequencies: Map<string, number>[] = [];
    const docLengths: number[] = [];
    const docFrequency = new Map<string, number>();
    let totalLength = 0;

    for (const chunk of corpus) {
      const tokens = tokenize(chunk.text);
      if (tokens.length === 0) {
        throw new IndexUnavailableError(`Chunk ${chunk.id} has no text`, 'INVALID_CHUNK');
      }

      const tf = new Map<string, number>();
      for (const token of tokens) tf.set(token, (tf.get(token) ?? 0) + 1);
      for (const term of tf.keys()) docFrequency.set(term, (docFrequency.get(term) ?? 0) + 1);

      termFrequencies.push(tf);
      docLengths.push(tokens.length);
      totalLength += tokens.length;
    }

    const n = corpus.length;
    const idf = new Map<string, number>();
    for (const [term, df] of docFrequency) {
      idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1));
    }

    log.info(`Indexed ${n} chunks in ${(performance.now() - start).toFixed(0)}ms`, {
      vocabulary: idf.size,
    });

    return new LexicalIndex(
      Object.freeze([...corpus]),
      termFrequencies,
      docLengths,
      idf,
      totalLength / n,
      { ...params },
    );
  }

  /** Number of chunks in the corpus. */
  get size(): number {
    return this.corpus.length;
  }

  /**
   * BM25 score of every document, in corpus order.
   * Repeated query tokens each contribute; an empty query scores zero everywhere.
   */
  getScores(queryTokens: readonly string[]): number[] {
    const { k1, b } = this.params;
    const scores = new Array<number>(this.corpus.length).fill(0);

    for (const term of queryTokens) {
      const idf = this.idf.get(term);
      // Absent terms have f(t,D) = 0 in every document
      if (idf === undefined) continue;

      for (let i = 0; i < this.corpus.length; i++) {
        const f = this.termFrequencies[i].get(term);
        if (!f) continue;
        const norm = k1 * (1 - b + (b * this.docLengths[i]) / this.avgDocLength);
        scores[i] += (idf * (f * (k1 + 1))) / (f + norm);
      }
    }

    return scores;
  }

  /**
   * Top-k chunks by descending BM25 score; ties keep corpus order.
   */
  search(queryTokens: readonly string[], k: number): Candidate[] {
    assertPositiveInteger(k, 'k');

    const scores = this.getScores(queryTokens);
    const order = scores.map((_, i) => i);
    order.sort((a, c) => scores[c] - scores[a] || a - c);

    return order.slice(0, k).map((i) => ({
      ...this.corpus[i],
      score: scores[i],
      source: 'lexical' as const,
    }));
  }
}
