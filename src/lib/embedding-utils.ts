/**
 * Embedding Utilities
 *
 * Encoding of vector embeddings for SQLite BLOB storage and cosine
 * similarity for the vector retriever.
 */

/**
 * Bytes per stored component (float32)
 */
export const BYTES_PER_COMPONENT = 4;

/**
 * Encode a vector as little-endian float32 values for a SQLite BLOB
 *
 * @example
 * ```typescript
 * const buffer = encodeEmbedding([0.1, 0.2, 0.3]);
 * // buffer.length === 12
 * ```
 */
export function encodeEmbedding(vector: readonly number[]): Buffer {
	const buffer = Buffer.allocUnsafe(vector.length * BYTES_PER_COMPONENT);

	for (let i = 0; i < vector.length; i++) {
		buffer.writeFloatLE(vector[i] ?? 0, i * BYTES_PER_COMPONENT);
	}

	return buffer;
}

/**
 * Decode a SQLite BLOB into a Float32Array
 *
 * @throws Error if the blob length is not a multiple of 4
 */
export function decodeEmbedding(blob: Buffer): Float32Array {
	if (blob.length % BYTES_PER_COMPONENT !== 0) {
		throw new Error(`Invalid embedding size: ${blob.length} bytes is not a whole number of float32 values`);
	}

	const vector = new Float32Array(blob.length / BYTES_PER_COMPONENT);
	for (let i = 0; i < vector.length; i++) {
		vector[i] = blob.readFloatLE(i * BYTES_PER_COMPONENT);
	}

	return vector;
}

/**
 * Compute cosine similarity between two vectors
 *
 * Range: [-1, 1], where 1.0 is identical direction and -1.0 opposite.
 * A zero vector has similarity 0 with everything.
 *
 * @throws Error if vectors have different dimensions
 */
export function cosineSimilarity(
	a: Float32Array | readonly number[],
	b: Float32Array | readonly number[]
): number {
	if (a.length !== b.length) {
		throw new Error(
			`Vectors must have the same dimensions (got ${a.length} and ${b.length})`
		);
	}

	let dotProduct = 0;
	let magnitudeA = 0;
	let magnitudeB = 0;

	for (let i = 0; i < a.length; i++) {
		const aVal = a[i] ?? 0;
		const bVal = b[i] ?? 0;
		dotProduct += aVal * bVal;
		magnitudeA += aVal * aVal;
		magnitudeB += bVal * bVal;
	}

	const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

	if (magnitude === 0) {
		return 0;
	}

	return dotProduct / magnitude;
}

/**
 * Check that every component of an embedding is a finite number
 */
export function isValidEmbedding(vector: readonly number[] | Float32Array): boolean {
	if (vector.length === 0) {
		return false;
	}

	for (let i = 0; i < vector.length; i++) {
		const val = vector[i];
		if (val === undefined || !isFinite(val)) {
			return false;
		}
	}

	return true;
}
