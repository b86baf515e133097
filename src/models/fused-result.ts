/**
 * Fused result models
 *
 * @module fused-result
 */

import type { DocumentPayload, RetrievalSource } from './ranked-hit.js';

/**
 * Rank of a document in each source that returned it
 * A source that did not return the document has no entry.
 */
export type ContributingRanks = Partial<Record<RetrievalSource, number>>;

/**
 * One document after reciprocal rank fusion
 */
export interface FusedResult {
  /** Document identifier */
  documentId: string;

  /** Document text and metadata */
  payload: DocumentPayload;

  /**
   * Weighted RRF score (>= 0, higher is better)
   * Σ weight[s] / (C + rank_s) over contributing sources
   */
  fusedScore: number;

  /** Per-source ranks that produced the score */
  contributingRanks: ContributingRanks;
}

/**
 * Number of sources that contributed to a fused result
 */
export function countContributingSources(result: FusedResult): number {
  return Object.keys(result.contributingRanks).length;
}
