import { raceWithAbort, throwIfAborted } from "../errors";
import type { CompletionCallback } from "../types";
import type { Central } from "./central";

export interface AsyncRequestOptions {
	/** Overrides the central's default deadline */
	timeoutMs?: number;
	/**
	 * Stops waiting when aborted. The request itself keeps running inside
	 * the central until the radio answers or its deadline passes.
	 */
	signal?: AbortSignal;
}

async function settleWith(
	register: (callback: CompletionCallback) => void,
	signal?: AbortSignal,
): Promise<void> {
	throwIfAborted(signal);

	const outcome = new Promise<void>((resolve, reject) => {
		register((error) => {
			if (error) {
				reject(error);
			} else {
				resolve();
			}
		});
	});
	return raceWithAbort(outcome, signal);
}

/**
 * Resolves once the radio is powered on.
 *
 * @throws BluetoothUnsupportedError | BluetoothUnauthorizedError | BluetoothPoweredOffError
 * @throws AbortError if the signal is aborted first
 */
export function waitUntilReady(
	central: Central,
	options: Pick<AsyncRequestOptions, "signal"> = {},
): Promise<void> {
	return settleWith((callback) => central.ensureReady(callback), options.signal);
}

/**
 * Promise form of `central.connect()`.
 *
 * @example
 * ```typescript
 * try {
 *   await connectPeripheral(central, id, { timeoutMs: 5000 });
 * } catch (e) {
 *   if (e instanceof TimeoutError) {
 *     // nothing answered within 5s
 *   }
 * }
 * ```
 */
export function connectPeripheral(
	central: Central,
	peripheralId: string,
	options: AsyncRequestOptions = {},
): Promise<void> {
	const { signal, ...requestOptions } = options;
	return settleWith(
		(callback) => central.connect(peripheralId, callback, requestOptions),
		signal,
	);
}

/**
 * Promise form of `central.disconnect()`.
 */
export function disconnectPeripheral(
	central: Central,
	peripheralId: string,
	options: AsyncRequestOptions = {},
): Promise<void> {
	const { signal, ...requestOptions } = options;
	return settleWith(
		(callback) => central.disconnect(peripheralId, callback, requestOptions),
		signal,
	);
}
