/**
 * Deadlines and cancellation for async operations
 */

/**
 * Operation did not settle before its deadline
 */
export class DeadlineExceededError extends Error {
	constructor(public readonly timeoutMs: number) {
		super(`Operation timed out after ${timeoutMs}ms`);
		this.name = 'DeadlineExceededError';
		Object.setPrototypeOf(this, DeadlineExceededError.prototype);
	}
}

/**
 * Operation was aborted through its parent signal
 */
export class OperationAbortedError extends Error {
	constructor() {
		super('Operation aborted');
		this.name = 'OperationAbortedError';
		Object.setPrototypeOf(this, OperationAbortedError.prototype);
	}
}

export interface DeadlineOptions {
	/** Deadline in milliseconds, measured from the call */
	timeoutMs: number;
	/** Parent signal; aborting it aborts the operation */
	signal?: AbortSignal;
}

/**
 * Run an operation under a deadline
 *
 * The operation receives a signal that is aborted when the deadline passes or
 * the parent signal aborts. The returned promise settles as soon as either
 * happens, without waiting for the operation to notice; the timer is always
 * cleared once the promise has settled.
 *
 * @param operation - Work to run, given its own abort signal
 * @param options - Deadline and optional parent signal
 * @returns The operation's value
 * @throws DeadlineExceededError when the deadline passes first
 * @throws OperationAbortedError when the parent signal aborts first
 */
export function withDeadline<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	options: DeadlineOptions
): Promise<T> {
	const { timeoutMs, signal: parent } = options;

	return new Promise<T>((resolve, reject) => {
		if (parent?.aborted) {
			reject(new OperationAbortedError());
			return;
		}

		const controller = new AbortController();
		let settled = false;

		const settle = (finish: () => void): void => {
			if (settled) {
				return;
			}
			settled = true;
			clearTimeout(timer);
			parent?.removeEventListener('abort', onParentAbort);
			finish();
		};

		const onParentAbort = (): void => {
			settle(() => {
				controller.abort();
				reject(new OperationAbortedError());
			});
		};

		const timer = setTimeout(() => {
			settle(() => {
				controller.abort();
				reject(new DeadlineExceededError(timeoutMs));
			});
		}, timeoutMs);

		parent?.addEventListener('abort', onParentAbort, { once: true });

		let pending: Promise<T>;
		try {
			pending = operation(controller.signal);
		} catch (error) {
			settle(() => reject(error));
			return;
		}

		pending.then(
			(value) => settle(() => resolve(value)),
			(error: unknown) => settle(() => reject(error))
		);
	});
}
