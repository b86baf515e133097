/**
 * Per-call lifecycle of a hybrid search
 */

/**
 * Lifecycle phases
 */
export type SearchLifecyclePhase =
	| 'idle'
	| 'dispatched'
	| 'awaiting_sources'
	| 'fusing'
	| 'complete'
	| 'failed';

/**
 * Phases each phase may move to
 */
const ALLOWED_TRANSITIONS: Readonly<Record<SearchLifecyclePhase, readonly SearchLifecyclePhase[]>> = {
	idle: ['dispatched'],
	dispatched: ['awaiting_sources', 'failed'],
	awaiting_sources: ['fusing', 'failed'],
	fusing: ['complete'],
	complete: [],
	failed: [],
};

/**
 * Listener notified after every transition
 */
export type PhaseChangeListener = (phase: SearchLifecyclePhase, previous: SearchLifecyclePhase) => void;

/**
 * Attempted transition not allowed from the current phase
 */
export class IllegalTransitionError extends Error {
	constructor(
		public readonly from: SearchLifecyclePhase,
		public readonly to: SearchLifecyclePhase
	) {
		super(`Illegal search lifecycle transition: ${from} → ${to}`);
		this.name = 'IllegalTransitionError';
		Object.setPrototypeOf(this, IllegalTransitionError.prototype);
	}
}

/**
 * Search lifecycle
 *
 * One instance per search call; complete and failed are terminal.
 */
export class SearchLifecycle {
	private phase: SearchLifecyclePhase = 'idle';

	constructor(private readonly onChange?: PhaseChangeListener) {}

	/**
	 * Move to the next phase
	 *
	 * @throws IllegalTransitionError when the move is not allowed
	 */
	transitionTo(next: SearchLifecyclePhase): void {
		const previous = this.phase;

		if (!ALLOWED_TRANSITIONS[previous].includes(next)) {
			throw new IllegalTransitionError(previous, next);
		}

		this.phase = next;
		this.onChange?.(next, previous);
	}

	/**
	 * Current phase
	 */
	getPhase(): SearchLifecyclePhase {
		return this.phase;
	}

	/**
	 * True once complete or failed
	 */
	isTerminal(): boolean {
		return ALLOWED_TRANSITIONS[this.phase].length === 0;
	}
}
