/**
 * Constants and default values for hybrid search fusion
 *
 * @module fusion-constants
 */

import type { RetrievalSource } from '../models/ranked-hit.js';

/**
 * Default RRF (Reciprocal Rank Fusion) constant C
 * Prevents division blow-up at rank 1 and flattens the influence of top ranks
 * Standard value from research literature
 */
export const DEFAULT_RANK_CONSTANT = 60;

/**
 * Default weight of each retrieval source
 */
export const DEFAULT_SOURCE_WEIGHT = 1.0;

export const DEFAULT_SOURCE_WEIGHTS: Readonly<Record<RetrievalSource, number>> = {
  vector: DEFAULT_SOURCE_WEIGHT,
  text: DEFAULT_SOURCE_WEIGHT,
};

/**
 * Default number of fused results returned
 */
export const DEFAULT_TOP_K = 10;

/**
 * Default number of hits requested from each source
 * Raised to k when k is larger.
 */
export const DEFAULT_CANDIDATE_LIMIT = 20;

/**
 * Default deadline for each retrieval call in milliseconds
 */
export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 2000;

/**
 * Searches slower than this are logged as slow searches
 */
export const DEFAULT_SLOW_SEARCH_THRESHOLD_MS = 500;

/**
 * Longest deadline a timer can hold (2^31 - 1 ms); larger values would fire at once
 */
export const MAX_RETRIEVAL_TIMEOUT_MS = 2_147_483_647;

/**
 * Score display precision
 */
export const SCORE_DISPLAY_DECIMALS = 6;

/**
 * Default embedding model for the OpenAI embedder
 */
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-ada-002';

/**
 * Default location of the SQLite document store
 */
export const DEFAULT_DATABASE_PATH = '.hybridsearch/index.db';

/**
 * Texts sent to the embedding provider per request during ingestion
 */
export const INGEST_EMBEDDING_BATCH_SIZE = 100;
