/**
 * Opaque handle for a scheduled deadline.
 */
export interface DeadlineHandle {
	readonly token: number;
}

/**
 * Deadline timers for in-flight requests.
 *
 * A timer never holds the request it guards. It captures the request's
 * token instead, and the owner compares that token with the entry it
 * currently stores when the timer fires. A request that was resolved,
 * replaced or dropped in the meantime no longer matches, so the firing
 * is a no-op.
 */
export interface DeadlineScheduler {
	/** Allocates the next request token. Tokens are never 0. */
	nextToken(): number;
	/**
	 * Runs `onExpire(token)` once after `timeoutMs`.
	 * @throws RangeError if the timeout is negative or not finite
	 */
	schedule(
		token: number,
		timeoutMs: number,
		onExpire: (token: number) => void,
	): DeadlineHandle;
	/** Cancels a deadline. Safe to call after it fired. */
	cancel(handle: DeadlineHandle): void;
	cancelAll(): void;
	/** Number of deadlines that have neither fired nor been cancelled. */
	activeCount(): number;
}

export function assertTimeout(timeoutMs: number): void {
	if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
		throw new RangeError(
			`Timeout must be a finite, non-negative number of milliseconds, got ${timeoutMs}`,
		);
	}
}

/**
 * Creates a deadline scheduler backed by `setTimeout`.
 *
 * @example Guarding a keyed request
 * ```typescript
 * const deadlines = createDeadlineScheduler();
 * const token = deadlines.nextToken();
 * requests.set(id, { token });
 *
 * deadlines.schedule(token, 5000, (expired) => {
 *   if (requests.get(id)?.token !== expired) return; // already resolved
 *   requests.delete(id);
 *   reportTimeout(id);
 * });
 * ```
 */
export function createDeadlineScheduler(): DeadlineScheduler {
	const timers = new Map<DeadlineHandle, ReturnType<typeof setTimeout>>();
	let lastToken = 0;

	function nextToken(): number {
		lastToken = lastToken >= Number.MAX_SAFE_INTEGER ? 1 : lastToken + 1;
		return lastToken;
	}

	function schedule(
		token: number,
		timeoutMs: number,
		onExpire: (token: number) => void,
	): DeadlineHandle {
		assertTimeout(timeoutMs);

		const handle: DeadlineHandle = { token };
		const timer = setTimeout(() => {
			timers.delete(handle);
			onExpire(token);
		}, timeoutMs);
		timers.set(handle, timer);
		return handle;
	}

	function cancel(handle: DeadlineHandle): void {
		const timer = timers.get(handle);
		if (timer !== undefined) {
			clearTimeout(timer);
			timers.delete(handle);
		}
	}

	function cancelAll(): void {
		for (const timer of timers.values()) {
			clearTimeout(timer);
		}
		timers.clear();
	}

	function activeCount(): number {
		return timers.size;
	}

	return {
		nextToken,
		schedule,
		cancel,
		cancelAll,
		activeCount,
	};
}
