export type EventMap = { [key: string]: unknown };

type Listener<T extends EventMap, K extends keyof T> = (data: T[K]) => void;

type ListenerTable<T extends EventMap> = {
	[K in keyof T]?: Set<Listener<T, K>>;
};

type OnceTable<T extends EventMap> = {
	[K in keyof T]?: Map<Listener<T, K>, Listener<T, K>>;
};

/**
 * A type-safe event emitter that provides compile-time checking for event names and payloads.
 *
 * Centrals use one to publish readiness changes, and test doubles use one to
 * play the radio manager.
 *
 * @example Define typed events and create emitter
 * ```typescript
 * type RadioEvents = {
 *   stateChange: ReadinessState;
 *   connect: { peripheralId: string };
 * };
 *
 * const emitter = createEventEmitter<RadioEvents>();
 *
 * const unsubscribe = emitter.on("connect", ({ peripheralId }) => {
 *   console.log("Connected to", peripheralId);
 * });
 *
 * emitter.emit("connect", { peripheralId: "A1" });
 * unsubscribe();
 * ```
 */
export interface TypedEventEmitter<T extends EventMap> {
	on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
	off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
	removeAllListeners<K extends keyof T>(event?: K): void;
	emit<K extends keyof T>(event: K, data: T[K]): void;
	listenerCount<K extends keyof T>(event: K): number;
}

export function createEventEmitter<T extends EventMap>(): TypedEventEmitter<T> {
	let listeners: ListenerTable<T> = {};
	// original callback -> registered wrapper, per event
	let onceWrappers: OnceTable<T> = {};

	function getListenerSet<K extends keyof T>(event: K): Set<Listener<T, K>> {
		let set = listeners[event];
		if (!set) {
			set = new Set();
			listeners[event] = set;
		}
		return set;
	}

	function getOnceMap<K extends keyof T>(
		event: K,
	): Map<Listener<T, K>, Listener<T, K>> {
		let map = onceWrappers[event];
		if (!map) {
			map = new Map();
			onceWrappers[event] = map;
		}
		return map;
	}

	function on<K extends keyof T>(
		event: K,
		callback: Listener<T, K>,
	): () => void {
		getListenerSet(event).add(callback);
		return () => off(event, callback);
	}

	function once<K extends keyof T>(
		event: K,
		callback: Listener<T, K>,
	): () => void {
		const wrapper: Listener<T, K> = (data) => {
			off(event, callback);
			callback(data);
		};

		getOnceMap(event).set(callback, wrapper);
		getListenerSet(event).add(wrapper);
		return () => off(event, callback);
	}

	function off<K extends keyof T>(event: K, callback: Listener<T, K>): void {
		const set = listeners[event];
		if (!set) return;

		const onceMap = onceWrappers[event];
		const wrapper = onceMap?.get(callback);
		if (wrapper) {
			set.delete(wrapper);
			onceMap?.delete(callback);
		} else {
			set.delete(callback);
		}
	}

	function removeAllListeners<K extends keyof T>(event?: K): void {
		if (event !== undefined) {
			delete listeners[event];
			delete onceWrappers[event];
		} else {
			listeners = {};
			onceWrappers = {};
		}
	}

	function emit<K extends keyof T>(event: K, data: T[K]): void {
		const set = listeners[event];
		if (!set) return;

		// Snapshot so listeners may unsubscribe while being called
		for (const cb of [...set]) {
			try {
				cb(data);
			} catch (err) {
				queueMicrotask(() => {
					console.error(
						"[ble-central:event-emitter] Listener threw an error:",
						err,
					);
				});
			}
		}
	}

	function listenerCount<K extends keyof T>(event: K): number {
		return listeners[event]?.size ?? 0;
	}

	return {
		on,
		once,
		off,
		removeAllListeners,
		emit,
		listenerCount,
	};
}
