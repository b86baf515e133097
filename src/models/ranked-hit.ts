/**
 * Ranked hits produced by a single retrieval source
 *
 * @module ranked-hit
 */

/**
 * Retrieval source that produced a hit
 */
export type RetrievalSource = 'vector' | 'text';

/**
 * Every retrieval source, in fusion order.
 * Fusion always visits sources in this order so that score summation and
 * payload selection never depend on how a caller keyed its hit lists.
 */
export const RETRIEVAL_SOURCES: readonly RetrievalSource[] = ['vector', 'text'];

/**
 * Document content carried alongside a hit
 *
 * Opaque to fusion: it is passed through untouched into the fused result.
 */
export interface DocumentPayload {
  /** Document text */
  text: string;

  /** Arbitrary metadata stored with the document */
  metadata?: Record<string, unknown>;
}

/**
 * One result from a single retrieval source
 *
 * Lifecycle:
 * 1. Produced by Retriever.retrieve()
 * 2. Consumed by RankFuser.fuse()
 * 3. Discarded after fusion
 */
export interface RankedHit {
  /** Document identifier, unique within its source list */
  documentId: string;

  /**
   * Position in the source list (1-based, contiguous)
   * Used in RRF formula: weight / (C + rank)
   */
  rank: number;

  /** Source component that produced the hit */
  source: RetrievalSource;

  /** Document text and metadata */
  payload: DocumentPayload;

  /**
   * Raw backend score
   * - vector: cosine similarity [-1, 1]
   * - text: bm25 (lower is better)
   * Never used by fusion.
   */
  sourceScore?: number;
}

/**
 * Hit lists keyed by the source that produced them
 */
export type HitsBySource = Partial<Record<RetrievalSource, readonly RankedHit[]>>;
