/**
 * OpenAI embedding provider
 *
 * Uses the embeddings endpoint of the official `openai` client. Any
 * OpenAI-compatible endpoint works through OPENAI_BASE_URL.
 */

import OpenAI from 'openai';
import { Result, ok, err } from 'neverthrow';
import { tryAsync } from '../../lib/result-types.js';
import { EmbeddingError, errorMessage } from '../../lib/errors.js';
import type { EmbeddingFailureReason } from '../../lib/errors.js';
import { DEFAULT_EMBEDDING_MODEL } from '../../constants/fusion-constants.js';
import type { DocumentEmbedder } from './query-embedder.js';

/**
 * The slice of the OpenAI client this provider calls
 */
export interface EmbeddingsClient {
	embeddings: {
		create(
			body: { model: string; input: string | string[] },
			options?: { signal?: AbortSignal }
		): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
	};
}

export interface OpenAIEmbedderOptions {
	apiKey: string;
	baseURL?: string;
	model?: string;
}

/**
 * Normalize text before embedding
 *
 * Newlines are replaced by spaces; they degrade embedding quality for
 * ada-era models.
 */
export function normalizeEmbeddingInput(text: string): string {
	return text.replace(/\r?\n/g, ' ').trim();
}

/**
 * Map a provider error to an embedding failure reason
 *
 * HTTP errors from the client carry a numeric `status`.
 */
export function classifyProviderError(error: unknown): EmbeddingFailureReason {
	if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
		if (error.status === 429) {
			return 'rate_limited';
		}
		if (error.status === 400 || error.status === 422) {
			return 'invalid_input';
		}
	}
	return 'unavailable';
}

/**
 * OpenAI-backed query and document embedder
 */
export class OpenAIQueryEmbedder implements DocumentEmbedder {
	readonly model: string;

	constructor(
		private readonly client: EmbeddingsClient,
		model: string = DEFAULT_EMBEDDING_MODEL
	) {
		this.model = model;
	}

	async embed(text: string, signal?: AbortSignal): Promise<Result<number[], EmbeddingError>> {
		const batch = await this.embedBatch([text], signal);
		return batch.andThen(([vector]) =>
			vector ? ok(vector) : err(new EmbeddingError('unavailable', 'Provider returned no embedding'))
		);
	}

	async embedBatch(texts: string[], signal?: AbortSignal): Promise<Result<number[][], EmbeddingError>> {
		if (texts.length === 0) {
			return ok([]);
		}

		const input = texts.map(normalizeEmbeddingInput);
		if (input.some((value) => value.length === 0)) {
			return err(new EmbeddingError('invalid_input', 'Cannot embed empty text'));
		}

		const response = await tryAsync(
			() => this.client.embeddings.create({ model: this.model, input }, { signal }),
			(error) => new EmbeddingError(classifyProviderError(error), errorMessage(error), error)
		);
		if (response.isErr()) {
			return err(response.error);
		}

		const { data } = response.value;

		if (data.length !== input.length) {
			return err(
				new EmbeddingError('unavailable', `Expected ${input.length} embeddings, received ${data.length}`)
			);
		}

		const vectors = [...data].sort((a, b) => a.index - b.index).map((entry) => entry.embedding);
		if (vectors.some((vector) => vector.length === 0)) {
			return err(new EmbeddingError('unavailable', 'Provider returned an empty embedding'));
		}

		return ok(vectors);
	}
}

/**
 * Create an embedder over the official OpenAI client
 */
export function createOpenAIEmbedder(options: OpenAIEmbedderOptions): OpenAIQueryEmbedder {
	const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
	return new OpenAIQueryEmbedder(client, options.model);
}
