/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result/Either pattern using neverthrow.
 * Every fallible service call in this package returns one of these instead
 * of throwing.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Execute an async function and wrap result in Result type
 *
 * @param fn - Async function to execute
 * @param errorHandler - Function to convert errors to type E
 */
export async function tryAsync<T, E>(
	fn: () => Promise<T>,
	errorHandler: (error: unknown) => E
): Promise<Result<T, E>> {
	try {
		const value = await fn();
		return ok(value);
	} catch (error) {
		return err(errorHandler(error));
	}
}
