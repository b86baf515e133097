/**
 * Result assembly: ordering, tie-breaking and truncation
 *
 * @module result-assembler
 */

import type { FusedResult } from '../models/fused-result.js';
import { countContributingSources } from '../models/fused-result.js';

/**
 * Order fused results best first
 *
 * 1. Higher fused score
 * 2. On equal score, more contributing sources
 * 3. Then smallest document id (code unit order, locale independent)
 */
export function compareFusedResults(a: FusedResult, b: FusedResult): number {
  if (a.fusedScore !== b.fusedScore) {
    return b.fusedScore - a.fusedScore;
  }

  const sourceDiff = countContributingSources(b) - countContributingSources(a);
  if (sourceDiff !== 0) {
    return sourceDiff;
  }

  if (a.documentId < b.documentId) {
    return -1;
  }
  return a.documentId > b.documentId ? 1 : 0;
}

/**
 * ResultAssembler turns fused scores into the final result list
 *
 * The order is a total order over distinct ids, so the output never depends
 * on the order the fused results arrive in.
 */
export class ResultAssembler {
  /**
   * Sort, tie-break and truncate fused results
   *
   * @param fused - Fused results (any order)
   * @param k - Number of results to keep (>= 1)
   * @returns At most k results, best first
   */
  assemble(fused: Iterable<FusedResult>, k: number): FusedResult[] {
    const ordered = [...fused].sort(compareFusedResults);
    return ordered.slice(0, k);
  }
}
