/**
 * Weighted Reciprocal Rank Fusion (RRF)
 *
 * @module rank-fuser
 */

import type { HitsBySource } from '../models/ranked-hit.js';
import { RETRIEVAL_SOURCES } from '../models/ranked-hit.js';
import type { ContributingRanks, FusedResult } from '../models/fused-result.js';
import type { SourceWeights } from '../models/search-request.js';

/**
 * Parameters of one fusion
 */
export interface FusionOptions {
  /** Weight of each source's reciprocal rank term */
  weights: Readonly<SourceWeights>;
  /** RRF constant C (> 0) */
  rankConstant: number;
}

/**
 * Score contributed by one source for a document at a given rank
 *
 * Strictly decreasing in rank for any positive weight and constant.
 */
export function reciprocalRankTerm(rank: number, weight: number, rankConstant: number): number {
  return weight / (rankConstant + rank);
}

/**
 * RankFuser combines ranked hit lists using weighted RRF
 *
 * score(doc) = Σ over sources s that returned doc: weight[s] / (C + rank_s(doc))
 *
 * A source that did not return a document adds nothing for it; there is no
 * sentinel rank for absent documents.
 *
 * Properties:
 * - Candidate set is exactly the union of ids across the given lists
 * - Sources are visited in RETRIEVAL_SOURCES order, so scores and payload
 *   choice never depend on how the caller keyed the lists
 * - A document repeated within one list contributes once, at its best rank
 * - Stateless: identical inputs always produce identical output
 */
export class RankFuser {
  /**
   * Fuse hit lists into per-document scores
   *
   * @param hitsBySource - Hit lists from the sources that answered
   * @param options - Weights and rank constant
   * @returns Fused results keyed by document id, in first-seen order
   */
  fuse(hitsBySource: HitsBySource, options: FusionOptions): Map<string, FusedResult> {
    const { weights, rankConstant } = options;
    const fused = new Map<string, FusedResult>();

    for (const source of RETRIEVAL_SOURCES) {
      const hits = hitsBySource[source];
      if (!hits) {
        continue;
      }

      const weight = weights[source];

      for (const hit of hits) {
        const term = reciprocalRankTerm(hit.rank, weight, rankConstant);
        const existing = fused.get(hit.documentId);

        if (!existing) {
          const contributingRanks: ContributingRanks = {};
          contributingRanks[source] = hit.rank;

          fused.set(hit.documentId, {
            documentId: hit.documentId,
            payload: hit.payload,
            fusedScore: term,
            contributingRanks,
          });
          continue;
        }

        // Already counted for this source
        if (existing.contributingRanks[source] !== undefined) {
          continue;
        }

        existing.fusedScore += term;
        existing.contributingRanks[source] = hit.rank;
      }
    }

    return fused;
  }
}
