import {
	assertTimeout,
	type DeadlineHandle,
	type DeadlineScheduler,
} from "../async";
import {
	type CentralError,
	CentralOperationError,
	normalizeError,
} from "../errors";
import type {
	CentralManager,
	DiscoveredPeripheral,
	ResolvedScanFilter,
	ScanCallback,
	ScanEvent,
	ScanFilter,
} from "../types";
import { normalizeServiceUuid } from "../utils";
import type { ReadinessGate } from "./readiness-gate";

export const SCAN_OPERATION = "scan peripherals";

interface ScanRequest {
	readonly token: number;
	readonly callback: ScanCallback;
	deadline: DeadlineHandle | null;
}

/**
 * Owns the single discovery slot.
 * A new scan replaces the active one; the replaced caller is told its scan
 * stopped before the new caller hears that its scan started.
 */
export interface ScanCoordinator {
	scan(timeoutMs: number, filter: ScanFilter, callback: ScanCallback): void;
	/**
	 * Halts discovery. The active caller, if any, receives `stopped` with
	 * `error`. The radio is told to stop either way.
	 */
	stop(error?: CentralError): void;
	/**
	 * Forwards a discovery to the active caller.
	 * @returns false when no scan is active and the result was dropped
	 */
	handleDiscovery(discovery: DiscoveredPeripheral): boolean;
	isScanning(): boolean;
}

export interface ScanCoordinatorOptions {
	manager: CentralManager;
	gate: ReadinessGate;
	deadlines: DeadlineScheduler;
}

export function resolveScanFilter(filter: ScanFilter): ResolvedScanFilter {
	return {
		services:
			filter.services && filter.services.length > 0
				? filter.services.map(normalizeServiceUuid)
				: null,
		allowDuplicates: filter.allowDuplicates ?? false,
	};
}

export function createScanCoordinator(
	options: ScanCoordinatorOptions,
): ScanCoordinator {
	const { manager, gate, deadlines } = options;
	let active: ScanRequest | null = null;

	function deliver(callback: ScanCallback, event: ScanEvent): void {
		try {
			callback(event);
		} catch (e) {
			console.error("[ble-central:scan] Callback threw an error:", e);
		}
	}

	function stop(error?: CentralError): void {
		const request = active;
		active = null;
		if (request?.deadline) {
			deadlines.cancel(request.deadline);
			request.deadline = null;
		}

		try {
			manager.stopScan();
		} catch (e) {
			console.error("[ble-central:scan] stopScan threw an error:", e);
		}

		if (request) {
			deliver(request.callback, error ? { type: "stopped", error } : { type: "stopped" });
		}
	}

	function begin(
		timeoutMs: number,
		filter: ResolvedScanFilter,
		callback: ScanCallback,
	): void {
		if (active) {
			stop();
		}

		const request: ScanRequest = {
			token: deadlines.nextToken(),
			callback,
			deadline: null,
		};
		active = request;
		deliver(callback, { type: "started" });
		// The caller may have stopped or replaced the scan from its callback
		if (active !== request) return;

		try {
			manager.startScan(filter);
		} catch (e) {
			stop(new CentralOperationError(SCAN_OPERATION, normalizeError(e)));
			return;
		}

		if (active !== request) return;
		request.deadline = deadlines.schedule(request.token, timeoutMs, (token) => {
			if (active?.token !== token) return;
			active.deadline = null;
			stop();
		});
	}

	function scan(
		timeoutMs: number,
		filter: ScanFilter,
		callback: ScanCallback,
	): void {
		assertTimeout(timeoutMs);
		const resolved = resolveScanFilter(filter);

		gate.ensureReady((error) => {
			if (error) {
				deliver(callback, { type: "stopped", error });
				return;
			}
			begin(timeoutMs, resolved, callback);
		});
	}

	function handleDiscovery(discovery: DiscoveredPeripheral): boolean {
		if (!active) return false;
		deliver(active.callback, { type: "result", discovery });
		return true;
	}

	return {
		scan,
		stop,
		handleDiscovery,
		isScanning: () => active !== null,
	};
}
