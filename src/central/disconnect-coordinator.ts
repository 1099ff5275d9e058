import { assertTimeout, type DeadlineScheduler } from "../async";
import {
	type CentralError,
	CentralOperationError,
	normalizeError,
} from "../errors";
import type { CentralManager, CompletionCallback } from "../types";
import { createPendingRequests } from "./pending-requests";
import type { ReadinessGate } from "./readiness-gate";

export const DISCONNECT_OPERATION = "disconnect peripheral";

export interface DisconnectCoordinator {
	disconnect(
		peripheralId: string,
		timeoutMs: number,
		callback: CompletionCallback,
	): void;
	/**
	 * Completes the pending disconnect. A radio error is wrapped and handed
	 * to every waiter.
	 * @returns false when nobody was waiting for the peripheral
	 */
	handleDisconnected(peripheralId: string, error?: unknown): boolean;
	failAll(error: CentralError): void;
	clear(): void;
	isPending(peripheralId: string): boolean;
	pendingIds(): string[];
}

export interface DisconnectCoordinatorOptions {
	manager: CentralManager;
	gate: ReadinessGate;
	deadlines: DeadlineScheduler;
}

export function createDisconnectCoordinator(
	options: DisconnectCoordinatorOptions,
): DisconnectCoordinator {
	const { manager, gate, deadlines } = options;
	const requests = createPendingRequests({
		operation: DISCONNECT_OPERATION,
		deadlines,
	});

	// Already down, or on its way down
	function isReleased(peripheralId: string): boolean {
		const [known] = manager.retrievePeripherals([peripheralId]);
		return known?.state === "disconnected" || known?.state === "disconnecting";
	}

	return {
		disconnect(peripheralId, timeoutMs, callback) {
			assertTimeout(timeoutMs);

			gate.ensureReady((error) => {
				if (error) {
					callback(error);
					return;
				}

				if (isReleased(peripheralId)) {
					callback();
					return;
				}

				requests.enqueue(peripheralId, timeoutMs, callback, () =>
					manager.cancelConnection(peripheralId),
				);
			});
		},

		handleDisconnected(peripheralId, error) {
			return requests.resolve(
				peripheralId,
				error === undefined || error === null
					? undefined
					: new CentralOperationError(
							DISCONNECT_OPERATION,
							normalizeError(error),
						),
			);
		},

		failAll: requests.failAll,
		clear: requests.clear,
		isPending: requests.has,
		pendingIds: requests.pendingIds,
	};
}
