import type { DeadlineHandle, DeadlineScheduler } from "../async";
import {
	type CentralError,
	CentralOperationError,
	normalizeError,
	TimeoutError,
} from "../errors";
import type { CompletionCallback } from "../types";

interface PendingRequest {
	readonly token: number;
	readonly callbacks: CompletionCallback[];
	deadline: DeadlineHandle | null;
}

export type EnqueueResult = "created" | "joined";

/**
 * In-flight requests of one operation family, keyed by peripheral id.
 *
 * Callers asking for the same peripheral share one request: one command to
 * the radio, one deadline, one outcome fanned out to every waiter.
 */
export interface PendingRequests {
	/**
	 * Joins the request for `peripheralId`, or creates it and calls `start`
	 * to issue the radio command. The deadline is armed after `start`
	 * returns, unless `start` already resolved the request.
	 */
	enqueue(
		peripheralId: string,
		timeoutMs: number,
		callback: CompletionCallback,
		start: () => void,
	): EnqueueResult;
	/**
	 * Removes the request and invokes every waiter with `error`.
	 * @returns false if nothing was pending for the id
	 */
	resolve(peripheralId: string, error?: CentralError): boolean;
	/** Resolves every pending request with `error`. */
	failAll(error: CentralError): void;
	/** Drops every request and deadline without invoking anyone. */
	clear(): void;
	has(peripheralId: string): boolean;
	pendingIds(): string[];
	waiterCount(peripheralId: string): number;
}

export interface PendingRequestsOptions {
	/** Operation name used in timeout and radio error messages */
	operation: string;
	deadlines: DeadlineScheduler;
}

export function createPendingRequests(
	options: PendingRequestsOptions,
): PendingRequests {
	const { operation, deadlines } = options;
	const requests = new Map<string, PendingRequest>();

	function fanOut(request: PendingRequest, error?: CentralError): void {
		for (const callback of request.callbacks) {
			try {
				if (error) {
					callback(error);
				} else {
					callback();
				}
			} catch (e) {
				console.error(
					`[ble-central:pending-requests] ${operation} callback threw an error:`,
					e,
				);
			}
		}
	}

	// Removal happens before fan-out: a waiter that asks again for the same
	// peripheral from inside its callback starts a fresh request.
	function settle(
		peripheralId: string,
		request: PendingRequest,
		error?: CentralError,
	): void {
		requests.delete(peripheralId);
		if (request.deadline) {
			deadlines.cancel(request.deadline);
			request.deadline = null;
		}
		fanOut(request, error);
	}

	function enqueue(
		peripheralId: string,
		timeoutMs: number,
		callback: CompletionCallback,
		start: () => void,
	): EnqueueResult {
		const existing = requests.get(peripheralId);
		if (existing) {
			existing.callbacks.push(callback);
			return "joined";
		}

		const request: PendingRequest = {
			token: deadlines.nextToken(),
			callbacks: [callback],
			deadline: null,
		};
		requests.set(peripheralId, request);

		try {
			start();
		} catch (e) {
			if (requests.get(peripheralId) === request) {
				settle(
					peripheralId,
					request,
					new CentralOperationError(operation, normalizeError(e)),
				);
			}
			return "created";
		}

		// The radio may have answered synchronously
		if (requests.get(peripheralId) === request) {
			request.deadline = deadlines.schedule(
				request.token,
				timeoutMs,
				(token) => {
					const current = requests.get(peripheralId);
					if (current?.token !== token) return;
					current.deadline = null;
					settle(peripheralId, current, new TimeoutError(operation, timeoutMs));
				},
			);
		}
		return "created";
	}

	function resolve(peripheralId: string, error?: CentralError): boolean {
		const request = requests.get(peripheralId);
		if (!request) return false;
		settle(peripheralId, request, error);
		return true;
	}

	function failAll(error: CentralError): void {
		// Snapshot: waiters may enqueue new requests while being failed
		const entries = [...requests.entries()];
		for (const [peripheralId, request] of entries) {
			if (requests.get(peripheralId) === request) {
				settle(peripheralId, request, error);
			}
		}
	}

	function clear(): void {
		for (const request of requests.values()) {
			if (request.deadline) {
				deadlines.cancel(request.deadline);
			}
		}
		requests.clear();
	}

	return {
		enqueue,
		resolve,
		failAll,
		clear,
		has: (peripheralId) => requests.has(peripheralId),
		pendingIds: () => [...requests.keys()],
		waiterCount: (peripheralId) =>
			requests.get(peripheralId)?.callbacks.length ?? 0,
	};
}
