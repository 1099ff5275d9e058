import type { ReadinessState } from "../types";

/**
 * Error raised when a deadline elapses before the radio manager reports
 * completion of an operation.
 */
export class TimeoutError extends Error {
	readonly code = 100;

	constructor(
		public readonly operation: string,
		public readonly timeout: number,
	) {
		super(`${operation} timed out after ${timeout}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * The radio manager reported a failure for an operation.
 * The original error is available as `cause`.
 */
export class CentralOperationError extends Error {
	readonly code = 101;

	constructor(
		public readonly operation: string,
		public override readonly cause: Error,
	) {
		super(`${operation} failed: ${cause.message}`);
		this.name = "CentralOperationError";
	}
}

export class BluetoothUnsupportedError extends Error {
	readonly code = 105;

	constructor() {
		super("Bluetooth is not supported on this host");
		this.name = "BluetoothUnsupportedError";
	}
}

export class BluetoothUnauthorizedError extends Error {
	readonly code = 106;

	constructor() {
		super("Bluetooth use is not authorized");
		this.name = "BluetoothUnauthorizedError";
	}
}

export class BluetoothPoweredOffError extends Error {
	readonly code = 107;

	constructor() {
		super("Bluetooth is powered off");
		this.name = "BluetoothPoweredOffError";
	}
}

/**
 * The radio manager reported a failed connection attempt without saying why.
 */
export class ConnectFailedUnknownReasonError extends Error {
	readonly code = 109;

	constructor() {
		super("Failed to connect peripheral: unknown reason");
		this.name = "ConnectFailedUnknownReasonError";
	}
}

/**
 * An active scan was stopped because the radio left the powered-on state.
 */
export class ScanTerminatedError extends Error {
	readonly code = 110;

	constructor(public readonly invalidState: ReadinessState) {
		super(`Scan terminated unexpectedly (state: ${invalidState})`);
		this.name = "ScanTerminatedError";
	}
}

/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends Error {
	constructor(message = "Operation aborted") {
		super(message);
		this.name = "AbortError";
	}
}

/**
 * Thrown synchronously by every operation of a central after `dispose()`.
 */
export class CentralDisposedError extends Error {
	constructor() {
		super("Central has been disposed");
		this.name = "CentralDisposedError";
	}
}

/** Gate failures: the operation never reached the radio manager. */
export type BluetoothStateError =
	| BluetoothUnsupportedError
	| BluetoothUnauthorizedError
	| BluetoothPoweredOffError;

/**
 * Every error a central hands to a completion or scan callback.
 */
export type CentralError =
	| BluetoothStateError
	| TimeoutError
	| CentralOperationError
	| ConnectFailedUnknownReasonError
	| ScanTerminatedError;

export function isCentralError(error: unknown): error is CentralError {
	return (
		error instanceof BluetoothUnsupportedError ||
		error instanceof BluetoothUnauthorizedError ||
		error instanceof BluetoothPoweredOffError ||
		error instanceof TimeoutError ||
		error instanceof CentralOperationError ||
		error instanceof ConnectFailedUnknownReasonError ||
		error instanceof ScanTerminatedError
	);
}

/**
 * Maps a terminal readiness state to the error an operation fails with,
 * or `null` when the radio is usable.
 */
export function gateErrorFor(
	state: ReadinessState,
): BluetoothStateError | null {
	switch (state) {
		case "unsupported":
			return new BluetoothUnsupportedError();
		case "unauthorized":
			return new BluetoothUnauthorizedError();
		case "poweredOff":
			return new BluetoothPoweredOffError();
		default:
			return null;
	}
}

/**
 * Throws an AbortError if the given signal is aborted.
 * Use this at the start of async operations to fail fast on abort.
 */
export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new AbortError(abortMessage(signal));
	}
}

function abortMessage(signal: AbortSignal): string {
	const reason: unknown = signal.reason;
	return reason instanceof Error
		? reason.message
		: typeof reason === "string"
			? reason
			: "Operation aborted";
}

/**
 * Races a promise against an AbortSignal, rejecting with AbortError if aborted.
 *
 * Note: This does NOT cancel the underlying work. A connect request that
 * loses the race keeps its place in the central until its own deadline or
 * a notification from the radio resolves it.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * setTimeout(() => controller.abort(), 5000);
 *
 * await raceWithAbort(waitUntilReady(central), controller.signal);
 * ```
 */
export function raceWithAbort<T>(
	promise: Promise<T>,
	signal?: AbortSignal,
): Promise<T> {
	if (!signal) return promise;

	return new Promise((resolve, reject) => {
		const abortHandler = () => {
			reject(new AbortError(abortMessage(signal)));
		};

		// Check if already aborted
		if (signal.aborted) {
			abortHandler();
			return;
		}

		signal.addEventListener("abort", abortHandler, { once: true });

		promise
			.then(resolve)
			.catch(reject)
			.finally(() => signal.removeEventListener("abort", abortHandler));
	});
}

/**
 * Normalizes any thrown value into an Error instance.
 * Radio managers are free to report failures as strings, codes or objects.
 */
export function normalizeError(e: unknown): Error {
	if (e instanceof Error) {
		return e;
	}

	if (e === null) {
		return new Error("null");
	}

	if (e === undefined) {
		return new Error("undefined");
	}

	if (typeof e === "string") {
		return new Error(e);
	}

	if (typeof e === "object") {
		try {
			return new Error(JSON.stringify(e));
		} catch {
			// Circular reference or other JSON error
			return new Error(String(e));
		}
	}

	return new Error(String(e));
}
