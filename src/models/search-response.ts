/**
 * Hybrid search response
 *
 * @module search-response
 */

import type { FusedResult } from './fused-result.js';

/**
 * Outcome of one hybrid search call
 */
export interface SearchResponse {
  /**
   * Fused results, best first
   * Length is min(k, number of distinct documents returned by the sources)
   */
  results: FusedResult[];

  /** Wall-clock time from dispatch to assembled results */
  elapsedTimeMs: number;

  /**
   * True when one source failed and fusion proceeded on the other alone
   */
  degraded: boolean;
}
