/**
 * Query parameters for hybrid search
 *
 * @module search-request
 */

import type { RetrievalSource } from './ranked-hit.js';

/**
 * Weight applied to each source's reciprocal rank term
 */
export type SourceWeights = Record<RetrievalSource, number>;

/**
 * A validated, immutable hybrid search request
 *
 * Built by createSearchRequest() with every default applied.
 *
 * Validation rules:
 * - either queryText is non-blank or queryVector is set
 * - k must be an integer >= 1
 * - each weight must be > 0
 * - rankConstant must be an integer > 0
 * - timeoutMs and candidateLimit must be integers >= 1; timeoutMs at most 2^31 - 1
 */
export interface SearchRequest {
  /** Full-text query, also the embedder input when no vector is supplied */
  readonly queryText: string;

  /** Query embedding, supplied by the caller or derived by an embedder */
  readonly queryVector?: readonly number[];

  /**
   * Number of fused results desired
   * Default: 10
   */
  readonly k: number;

  /**
   * Source weights
   * Default: { vector: 1.0, text: 1.0 }
   */
  readonly weights: Readonly<SourceWeights>;

  /**
   * RRF constant C
   * Default: 60
   */
  readonly rankConstant: number;

  /**
   * Continue with the surviving source when exactly one fails
   * Default: true
   */
  readonly degradeOnPartialFailure: boolean;

  /**
   * Independent deadline for each retrieval call
   * Default: 2000
   */
  readonly timeoutMs: number;

  /**
   * Hits requested from each source
   * Default: max(k, 20)
   */
  readonly candidateLimit: number;
}
