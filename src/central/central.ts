import { createDeadlineScheduler } from "../async";
import { CentralDisposedError, type CentralError } from "../errors";
import { createEventEmitter } from "../state";
import type {
	CentralEvents,
	CentralManager,
	CompletionCallback,
	PeripheralRequestOptions,
	ReadinessCallback,
	ReadinessState,
	ScanCallback,
	ScanOptions,
} from "../types";
import { createConnectCoordinator } from "./connect-coordinator";
import { createDisconnectCoordinator } from "./disconnect-coordinator";
import { attachEventDispatcher } from "./event-dispatcher";
import { createReadinessGate } from "./readiness-gate";
import { createScanCoordinator } from "./scan-coordinator";

/** Default scan duration in milliseconds */
export const DEFAULT_SCAN_TIMEOUT_MS = 10000;

/** Default deadline for connecting a peripheral in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/** Default deadline for disconnecting a peripheral in milliseconds */
export const DEFAULT_DISCONNECT_TIMEOUT_MS = 10000;

export interface CentralTimeouts {
	scanMs?: number;
	connectMs?: number;
	disconnectMs?: number;
}

/**
 * Options for creating a central.
 */
export interface CentralOptions {
	/** The radio manager to drive */
	manager: CentralManager;
	/**
	 * Readiness before the manager reports its first state.
	 * @default 'unknown'
	 */
	initialState?: ReadinessState;
	/**
	 * Default deadlines, overridable per call.
	 * @default 10000 ms each
	 */
	timeouts?: CentralTimeouts;
	/**
	 * When the radio becomes unsupported, unauthorized or powered off,
	 * fail pending connect/disconnect requests with the matching Bluetooth
	 * state error right away. When false they resolve through their own
	 * deadline, or through a late notification from the radio.
	 * @default false
	 */
	failPendingOnStateLoss?: boolean;
}

/**
 * Coordinates scan, connect and disconnect requests against one radio
 * manager.
 *
 * Every operation returns right away and reports through its callback.
 * Each request resolves exactly once, however it ends: radio notification,
 * deadline, or a change in readiness.
 */
export interface Central {
	getState(): ReadinessState;
	/** Calls back once readiness is known (immediately if it already is). */
	observeReadiness(callback: ReadinessCallback): void;
	/** Calls back with `undefined` once powered on, or with the reason it is not. */
	ensureReady(callback: CompletionCallback): void;
	/**
	 * Starts discovery. An active scan is stopped first; its caller gets
	 * `stopped` before this caller gets `started`.
	 */
	scan(callback: ScanCallback, options?: ScanOptions): void;
	stopScan(error?: CentralError): void;
	isScanning(): boolean;
	connect(
		peripheralId: string,
		callback: CompletionCallback,
		options?: PeripheralRequestOptions,
	): void;
	disconnect(
		peripheralId: string,
		callback: CompletionCallback,
		options?: PeripheralRequestOptions,
	): void;
	/** Peripheral ids with a connect attempt in flight. */
	pendingConnections(): string[];
	/** Peripheral ids with a disconnect in flight. */
	pendingDisconnections(): string[];
	/**
	 * Subscribes to readiness and restore-state broadcasts.
	 * `stateChange` listeners run after the new state is stored and before
	 * queued readiness callbacks are resolved.
	 * @returns Unsubscribe function
	 */
	on<K extends keyof CentralEvents>(
		event: K,
		listener: (data: CentralEvents[K]) => void,
	): () => void;
	/**
	 * Detaches from the manager. An active scan is stopped; pending
	 * connect/disconnect requests, their deadlines and callbacks still
	 * waiting for readiness are dropped without being invoked. Promises
	 * from the helpers that wait on them settle only through their signal.
	 * Idempotent.
	 */
	dispose(): void;
}

/**
 * Creates a central bound to a radio manager.
 *
 * @example Scan, then connect to the first match
 * ```typescript
 * const central = createCentral({ manager });
 *
 * central.scan(
 *   (event) => {
 *     if (event.type !== "result") return;
 *     central.stopScan();
 *     central.connect(event.discovery.peripheral.id, (error) => {
 *       if (error) console.warn("connect failed:", error.message);
 *     });
 *   },
 *   { services: ["180d"], timeoutMs: 15000 },
 * );
 * ```
 *
 * @example Fail in-flight requests as soon as the radio goes away
 * ```typescript
 * const central = createCentral({ manager, failPendingOnStateLoss: true });
 * central.on("stateChange", (state) => console.log("radio:", state));
 * ```
 */
export function createCentral(options: CentralOptions): Central {
	const {
		manager,
		initialState = "unknown",
		timeouts = {},
		failPendingOnStateLoss = false,
	} = options;
	const scanTimeoutMs = timeouts.scanMs ?? DEFAULT_SCAN_TIMEOUT_MS;
	const connectTimeoutMs = timeouts.connectMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
	const disconnectTimeoutMs =
		timeouts.disconnectMs ?? DEFAULT_DISCONNECT_TIMEOUT_MS;

	const events = createEventEmitter<CentralEvents>();
	const deadlines = createDeadlineScheduler();
	const gate = createReadinessGate(initialState);
	const scanner = createScanCoordinator({ manager, gate, deadlines });
	const connector = createConnectCoordinator({ manager, gate, deadlines });
	const disconnector = createDisconnectCoordinator({
		manager,
		gate,
		deadlines,
	});
	const detach = attachEventDispatcher({
		manager,
		gate,
		scanner,
		connector,
		disconnector,
		events,
		failPendingOnStateLoss,
	});
	let disposed = false;

	function assertActive(): void {
		if (disposed) {
			throw new CentralDisposedError();
		}
	}

	return {
		getState: () => gate.getState(),

		observeReadiness(callback) {
			assertActive();
			gate.observeState(callback);
		},

		ensureReady(callback) {
			assertActive();
			gate.ensureReady(callback);
		},

		scan(callback, scanOptions = {}) {
			assertActive();
			const { timeoutMs = scanTimeoutMs, ...filter } = scanOptions;
			scanner.scan(timeoutMs, filter, callback);
		},

		stopScan(error) {
			assertActive();
			scanner.stop(error);
		},

		isScanning: () => scanner.isScanning(),

		connect(peripheralId, callback, requestOptions = {}) {
			assertActive();
			connector.connect(
				peripheralId,
				requestOptions.timeoutMs ?? connectTimeoutMs,
				callback,
			);
		},

		disconnect(peripheralId, callback, requestOptions = {}) {
			assertActive();
			disconnector.disconnect(
				peripheralId,
				requestOptions.timeoutMs ?? disconnectTimeoutMs,
				callback,
			);
		},

		pendingConnections: () => connector.pendingIds(),
		pendingDisconnections: () => disconnector.pendingIds(),

		on<K extends keyof CentralEvents>(
			event: K,
			listener: (data: CentralEvents[K]) => void,
		) {
			return events.on(event, listener);
		},

		dispose() {
			if (disposed) return;
			disposed = true;

			detach();
			if (scanner.isScanning()) {
				scanner.stop();
			}
			gate.clear();
			connector.clear();
			disconnector.clear();
			deadlines.cancelAll();
			events.removeAllListeners();
		},
	};
}
