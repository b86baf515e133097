/**
 * Query Embedder Interface
 *
 * Turns query text into a vector for the vector retriever. The orchestrator
 * only consults an embedder when a request carries no precomputed vector.
 */

import type { Result } from 'neverthrow';
import type { EmbeddingError } from '../../lib/errors.js';

/**
 * Embedding provider for queries
 */
export interface QueryEmbedder {
	/** Model identifier, for logs and `check` output */
	readonly model: string;

	/**
	 * Embed one query
	 *
	 * @param text - Query text
	 * @param signal - Aborted when the vector source's deadline passes
	 */
	embed(text: string, signal?: AbortSignal): Promise<Result<number[], EmbeddingError>>;
}

/**
 * Embedding provider that can also embed documents in bulk (ingestion)
 */
export interface DocumentEmbedder extends QueryEmbedder {
	/**
	 * Embed several texts, returned in input order
	 */
	embedBatch(texts: string[], signal?: AbortSignal): Promise<Result<number[][], EmbeddingError>>;
}
