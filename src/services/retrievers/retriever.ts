/**
 * Retriever contract
 *
 * Adapter interface to an external ranked-retrieval backend, plus the
 * checks every returned hit list must pass before it reaches fusion.
 */

import type { Result } from '../../lib/result-types.js';
import { ok, err } from '../../lib/result-types.js';
import { RetrievalError } from '../../lib/errors.js';
import type { DocumentPayload, RankedHit, RetrievalSource } from '../../models/ranked-hit.js';

/**
 * Query handed to a retriever
 * The vector retriever reads `vector`; the text retriever reads `text`.
 */
export interface RetrievalQuery {
  text: string;
  vector?: readonly number[];
}

/**
 * Ranked retrieval backend
 *
 * Implementations must:
 * - return hits sorted by the backend's relevance, as contiguous 1-based ranks
 * - return no duplicate document ids and at most k hits
 * - fail with RetrievalError rather than return a partial or unsorted list
 * - honour the abort signal where the backend allows it
 */
export interface Retriever {
  /** Source this retriever produces hits for */
  readonly source: RetrievalSource;

  /**
   * Retrieve the top-k hits for a query
   *
   * @param query - Query payload
   * @param k - Maximum number of hits (>= 1)
   * @param signal - Aborted on deadline or caller cancellation
   */
  retrieve(query: RetrievalQuery, k: number, signal: AbortSignal): Promise<Result<RankedHit[], RetrievalError>>;
}

/**
 * Backend row before ranks are assigned
 */
export interface ScoredDocument {
  documentId: string;
  payload: DocumentPayload;
  score: number;
}

/**
 * Re-express backend rows, already in relevance order, as ranked hits
 *
 * @param source - Source producing the rows
 * @param rows - Rows in descending relevance
 */
export function toRankedHits(source: RetrievalSource, rows: readonly ScoredDocument[]): RankedHit[] {
  return rows.map((row, index) => ({
    documentId: row.documentId,
    rank: index + 1,
    source,
    payload: row.payload,
    sourceScore: row.score,
  }));
}

/**
 * Check a hit list against the ranking contract
 *
 * Ranks must run 1..N in order, ids must be unique and non-empty, every hit
 * must come from the expected source, and N must not exceed k.
 *
 * @param source - Source that was asked
 * @param hits - Hits it returned
 * @param k - Number of hits requested
 * @returns The same hits, or an invalid_response RetrievalError
 */
export function validateHitList(
  source: RetrievalSource,
  hits: readonly RankedHit[],
  k: number
): Result<RankedHit[], RetrievalError> {
  if (hits.length > k) {
    return err(new RetrievalError(source, 'invalid_response', `returned ${hits.length} hits for k=${k}`));
  }

  const seen = new Set<string>();

  for (let i = 0; i < hits.length; i++) {
    const hit = hits[i]!;

    if (hit.source !== source) {
      return err(new RetrievalError(source, 'invalid_response', `hit ${hit.documentId} is labelled ${hit.source}`));
    }

    if (hit.rank !== i + 1) {
      return err(
        new RetrievalError(source, 'invalid_response', `expected rank ${i + 1} at position ${i + 1}, got ${hit.rank}`)
      );
    }

    if (hit.documentId.length === 0) {
      return err(new RetrievalError(source, 'invalid_response', `hit at rank ${hit.rank} has an empty document id`));
    }

    if (seen.has(hit.documentId)) {
      return err(new RetrievalError(source, 'invalid_response', `duplicate document id ${hit.documentId}`));
    }
    seen.add(hit.documentId);
  }

  return ok([...hits]);
}
