/**
 * Set-based fusion of vector and lexical candidates.
 *
 * Vector results come first, then lexical results. Candidates sharing a text
 * prefix and URL collapse to their first occurrence, whatever their source or
 * score. Scores are left on their source's scale; nothing is normalized or
 * re-ranked here.
 *
 * Overlapping chunk boundaries produce near-duplicates with a long common
 * prefix, hence the prefix key rather than the full text.
 */

import type { Candidate } from '../storage/types.js';
import { assertPositiveInteger } from '../storage/lexical-index.js';

export interface FusionOptions {
  /** Characters of text in the dedup key. Default: 64 */
  prefixLength?: number;
  /** Floor on the merged-set cap. Default: 10 */
  minSize?: number;
}

export const DEFAULT_PREFIX_LENGTH = 64;
export const DEFAULT_MIN_FUSED_SIZE = 10;

/**
 * Dedup key: the first `prefixLength` characters (code points) of the text,
 * paired with the URL. A missing URL is its own key component.
 */
export function dedupKey(candidate: Candidate, prefixLength: number = DEFAULT_PREFIX_LENGTH): string {
  const prefix = Array.from(candidate.text).slice(0, prefixLength).join('');
  return JSON.stringify([prefix, candidate.url ?? null]);
}

/**
 * Upper bound on the merged set: max(2k, minSize).
 */
export function fusedLimit(k: number, minSize: number = DEFAULT_MIN_FUSED_SIZE): number {
  return Math.max(2 * k, minSize);
}

/**
 * Merge, deduplicate and cap candidate lists.
 *
 * Keeps first-occurrence order. Applying it again to its own output returns
 * the same list.
 */
export function mergeCandidates(
  vectorCandidates: readonly Candidate[],
  lexicalCandidates: readonly Candidate[],
  k: number,
  options: FusionOptions = {},
): Candidate[] {
  assertPositiveInteger(k, 'k');

  const { prefixLength = DEFAULT_PREFIX_LENGTH, minSize = DEFAULT_MIN_FUSED_SIZE } = options;
  const limit = fusedLimit(k, minSize);

  const seen = new Set<string>();
  const merged: Candidate[] = [];

  for (const candidate of [...vectorCandidates, ...lexicalCandidates]) {
    const key = dedupKey(candidate, prefixLength);
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(candidate);
    if (merged.length === limit) break;
  }

  return merged;
}
