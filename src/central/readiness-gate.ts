import { gateErrorFor } from "../errors";
import {
	type CompletionCallback,
	isTransitionalState,
	type ReadinessCallback,
	type ReadinessState,
	type TerminalReadinessState,
} from "../types";

/**
 * Tracks the radio's readiness and resolves callers once it is known.
 */
export interface ReadinessGate {
	getState(): ReadinessState;
	/**
	 * Invokes `callback` with the current state if it is terminal,
	 * otherwise queues it until the state resolves.
	 */
	observeState(callback: ReadinessCallback): void;
	/**
	 * Like `observeState`, but reports the outcome as an error:
	 * `undefined` when powered on, a Bluetooth state error otherwise.
	 */
	ensureReady(callback: CompletionCallback): void;
	/**
	 * Stores a new state. A terminal state drains the queue in
	 * registration order. `publish` runs once the state is stored, before
	 * any queued callback.
	 */
	update(state: ReadinessState, publish?: (state: ReadinessState) => void): void;
	/** Drops every queued callback without invoking it. */
	clear(): void;
	/** Number of callbacks waiting for a terminal state. */
	pendingCount(): number;
}

export function createReadinessGate(
	initialState: ReadinessState = "unknown",
): ReadinessGate {
	let state: ReadinessState = initialState;
	let pending: ReadinessCallback[] = [];

	function invoke(
		callback: ReadinessCallback,
		resolved: TerminalReadinessState,
	): void {
		try {
			callback(resolved);
		} catch (e) {
			console.error("[ble-central:readiness-gate] Callback threw an error:", e);
		}
	}

	function observeState(callback: ReadinessCallback): void {
		if (isTransitionalState(state)) {
			pending.push(callback);
			return;
		}
		invoke(callback, state);
	}

	function ensureReady(callback: CompletionCallback): void {
		observeState((resolved) => {
			const error = gateErrorFor(resolved);
			if (error) {
				callback(error);
			} else {
				callback();
			}
		});
	}

	function update(
		next: ReadinessState,
		publish?: (state: ReadinessState) => void,
	): void {
		state = next;
		publish?.(next);
		if (isTransitionalState(next)) return;

		// Swap before draining so callbacks that re-enter see an empty queue
		const callbacks = pending;
		pending = [];
		for (const callback of callbacks) {
			invoke(callback, next);
		}
	}

	return {
		getState: () => state,
		observeState,
		ensureReady,
		update,
		clear: () => {
			pending = [];
		},
		pendingCount: () => pending.length,
	};
}
