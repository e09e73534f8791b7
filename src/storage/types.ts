/**
 * Types for the retrieval data model.
 *
 * - **Chunks**: Immutable spans of crawled documentation text
 * - **Candidates**: A chunk found by one retrieval source, with that source's score
 * - **Ranked contexts**: The final, ordered output of the pipeline
 *
 * @module storage/types
 */

/**
 * Which retrieval source produced a candidate.
 *
 * - `vector`: Dense (embedding) nearest-neighbor search
 * - `lexical`: BM25 over the corpus snapshot
 */
export type CandidateSource = 'vector' | 'lexical';

/**
 * A unit of indexed text.
 *
 * Created once by the indexing job; never mutated. The `id` is the chunk's
 * position in the corpus snapshot, which is also the point id the indexer
 * assigns in the vector store.
 */
export interface Chunk {
  /** Opaque provenance identifier */
  readonly id: string;
  /** Chunk text. Non-empty for every indexed chunk. */
  readonly text: string;
  /** Canonical page URL (falls back to the source path) */
  readonly url?: string;
  /** Page title */
  readonly title?: string;
  /** Path of the crawled markdown file the chunk came from */
  readonly sourcePath?: string;
  /** Position of the chunk within its source page */
  readonly chunkIndex?: number;
}

/**
 * A chunk found by one retrieval source for the current request.
 *
 * `score` stays on the source's own scale (cosine similarity or BM25);
 * it is always finite.
 */
export interface Candidate extends Chunk {
  readonly score: number;
  readonly source: CandidateSource;
}

/**
 * A candidate annotated with its rerank score.
 *
 * `rerankScore` is the cross-encoder relevance in (0, 1), or null when the
 * rerank model was unavailable and the contexts were ordered by their source
 * score instead.
 */
export interface RankedContext extends Candidate {
  readonly rerankScore: number | null;
}

/**
 * One record of the corpus snapshot (one JSON object per line).
 */
export interface CorpusRecord {
  text: string;
  metadata?: {
    url?: string | null;
    source_path?: string | null;
    title?: string | null;
    chunk_id?: number | null;
    [key: string]: unknown;
  } | null;
}
