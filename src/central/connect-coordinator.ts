import { assertTimeout, type DeadlineScheduler } from "../async";
import {
	type CentralError,
	CentralOperationError,
	ConnectFailedUnknownReasonError,
	normalizeError,
} from "../errors";
import type { CentralManager, CompletionCallback } from "../types";
import { createPendingRequests } from "./pending-requests";
import type { ReadinessGate } from "./readiness-gate";

export const CONNECT_OPERATION = "connect peripheral";

export interface ConnectCoordinator {
	/**
	 * Connects a peripheral. Callers asking for the same peripheral while
	 * an attempt is in flight join it instead of starting another.
	 */
	connect(
		peripheralId: string,
		timeoutMs: number,
		callback: CompletionCallback,
	): void;
	/** @returns false when nobody was waiting for the peripheral */
	handleConnected(peripheralId: string): boolean;
	/** @returns false when nobody was waiting for the peripheral */
	handleConnectFailed(peripheralId: string, error?: unknown): boolean;
	failAll(error: CentralError): void;
	clear(): void;
	isPending(peripheralId: string): boolean;
	pendingIds(): string[];
}

export interface ConnectCoordinatorOptions {
	manager: CentralManager;
	gate: ReadinessGate;
	deadlines: DeadlineScheduler;
}

export function createConnectCoordinator(
	options: ConnectCoordinatorOptions,
): ConnectCoordinator {
	const { manager, gate, deadlines } = options;
	const requests = createPendingRequests({
		operation: CONNECT_OPERATION,
		deadlines,
	});

	function isConnected(peripheralId: string): boolean {
		const [known] = manager.retrievePeripherals([peripheralId]);
		return known?.state === "connected";
	}

	function connect(
		peripheralId: string,
		timeoutMs: number,
		callback: CompletionCallback,
	): void {
		assertTimeout(timeoutMs);

		gate.ensureReady((error) => {
			if (error) {
				callback(error);
				return;
			}

			if (isConnected(peripheralId)) {
				callback();
				return;
			}

			requests.enqueue(peripheralId, timeoutMs, callback, () =>
				manager.connect(peripheralId),
			);
		});
	}

	function handleConnectFailed(peripheralId: string, error?: unknown): boolean {
		if (!requests.has(peripheralId)) return false;
		return requests.resolve(
			peripheralId,
			error === undefined || error === null
				? new ConnectFailedUnknownReasonError()
				: new CentralOperationError(CONNECT_OPERATION, normalizeError(error)),
		);
	}

	return {
		connect,
		handleConnected: (peripheralId) => requests.resolve(peripheralId),
		handleConnectFailed,
		failAll: requests.failAll,
		clear: requests.clear,
		isPending: requests.has,
		pendingIds: requests.pendingIds,
	};
}
