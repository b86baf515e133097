/**
 * Error hierarchy for hybrid search
 *
 * Services return these inside neverthrow Results; they are only thrown
 * across the CLI boundary.
 */

import type { RetrievalSource } from '../models/ranked-hit.js';

// ============================================================================
// Base
// ============================================================================

/**
 * Base class for all hybrid search errors
 */
export abstract class HybridSearchError extends Error {
	abstract readonly code: string;
	abstract readonly retryable: boolean;
	readonly timestamp: Date = new Date();

	constructor(message: string, public override cause?: unknown) {
		super(message);
		this.name = this.constructor.name;
		// Ensure prototype chain is correct for instanceof checks
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Invalid request or configuration
 *
 * Fatal and never retried: raised before any retrieval is dispatched.
 */
export class ConfigError extends HybridSearchError {
	readonly code = 'CONFIG_INVALID';
	readonly retryable = false;

	constructor(message: string, public readonly issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
	}
}

// ============================================================================
// Retrieval
// ============================================================================

/**
 * Why a retrieval source failed
 */
export type RetrievalFailureReason =
	| 'timeout'
	| 'unavailable'
	| 'malformed_query'
	| 'invalid_response';

/**
 * Failure of a single retrieval source
 */
export class RetrievalError extends HybridSearchError {
	readonly code = 'RETRIEVAL_FAILED';
	readonly retryable: boolean;

	constructor(
		public readonly source: RetrievalSource,
		public readonly reason: RetrievalFailureReason,
		message: string,
		cause?: unknown
	) {
		super(`${source} retrieval failed (${reason}): ${message}`, cause);
		this.retryable = reason === 'timeout' || reason === 'unavailable';
	}
}

// ============================================================================
// Embedding
// ============================================================================

/**
 * Why the embedding provider failed
 */
export type EmbeddingFailureReason = 'rate_limited' | 'invalid_input' | 'unavailable';

/**
 * Failure of the upstream embedding provider
 */
export class EmbeddingError extends HybridSearchError {
	readonly code = 'EMBEDDING_FAILED';
	readonly retryable: boolean;

	constructor(
		public readonly reason: EmbeddingFailureReason,
		message: string,
		cause?: unknown
	) {
		super(`Embedding failed (${reason}): ${message}`, cause);
		this.retryable = reason !== 'invalid_input';
	}
}

/**
 * A source that failed during one search call
 */
export interface SourceFailure {
	source: RetrievalSource;
	error: RetrievalError | EmbeddingError;
}

/**
 * Every source failed, or one failed while degrade was disabled
 */
export class HybridRetrievalError extends HybridSearchError {
	readonly code = 'HYBRID_RETRIEVAL_FAILED';
	readonly retryable: boolean;

	constructor(public readonly failures: SourceFailure[]) {
		super(
			`Hybrid search failed: ${failures
				.map(({ source, error }) => `${source} (${error.reason})`)
				.join(', ')}`
		);
		this.retryable = failures.every(({ error }) => error.retryable);
	}

	/** Sources named by this error */
	get failedSources(): RetrievalSource[] {
		return this.failures.map(({ source }) => source);
	}
}

/**
 * Caller aborted the search before both sources settled
 */
export class SearchCancelledError extends HybridSearchError {
	readonly code = 'SEARCH_CANCELLED';
	readonly retryable = false;

	constructor() {
		super('Search cancelled by caller');
	}
}

// ============================================================================
// Storage
// ============================================================================

/**
 * SQLite document store failure
 */
export class StoreError extends HybridSearchError {
	readonly code = 'STORE_ERROR';
	readonly retryable = false;
}

/**
 * Any error a hybrid search call can resolve to
 */
export type SearchError = ConfigError | HybridRetrievalError | SearchCancelledError;

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
