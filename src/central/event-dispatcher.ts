import { gateErrorFor, ScanTerminatedError } from "../errors";
import type { TypedEventEmitter } from "../state";
import type {
	CentralEvents,
	CentralManager,
	ReadinessState,
} from "../types";
import type { ConnectCoordinator } from "./connect-coordinator";
import type { DisconnectCoordinator } from "./disconnect-coordinator";
import type { ReadinessGate } from "./readiness-gate";
import type { ScanCoordinator } from "./scan-coordinator";

export interface EventDispatcherOptions {
	manager: CentralManager;
	gate: ReadinessGate;
	scanner: ScanCoordinator;
	connector: ConnectCoordinator;
	disconnector: DisconnectCoordinator;
	/** Where readiness and restore-state broadcasts are published */
	events: TypedEventEmitter<CentralEvents>;
	/**
	 * Fail pending connect/disconnect requests when the radio becomes
	 * unusable instead of leaving them to their deadlines.
	 * @default false
	 */
	failPendingOnStateLoss?: boolean;
}

/**
 * Routes radio notifications to the coordinator that is waiting for them.
 * Notifications nobody waits for are dropped.
 *
 * @returns Function that unsubscribes from the manager
 */
export function attachEventDispatcher(
	options: EventDispatcherOptions,
): () => void {
	const {
		manager,
		gate,
		scanner,
		connector,
		disconnector,
		events,
		failPendingOnStateLoss = false,
	} = options;

	function handleStateChange(state: ReadinessState): void {
		gate.update(state, (stored) => events.emit("stateChange", stored));

		if (state === "poweredOn") return;

		scanner.stop(new ScanTerminatedError(state));

		const gateError = failPendingOnStateLoss ? gateErrorFor(state) : null;
		if (gateError) {
			connector.failAll(gateError);
			disconnector.failAll(gateError);
		}
	}

	const subscriptions = [
		manager.on("stateChange", handleStateChange),
		manager.on("connect", ({ peripheralId }) => {
			connector.handleConnected(peripheralId);
		}),
		manager.on("connectFail", ({ peripheralId, error }) => {
			connector.handleConnectFailed(peripheralId, error);
		}),
		manager.on("disconnect", ({ peripheralId, error }) => {
			disconnector.handleDisconnected(peripheralId, error);
		}),
		manager.on("discover", (discovery) => {
			scanner.handleDiscovery(discovery);
		}),
		manager.on("willRestoreState", (payload) => {
			events.emit("willRestoreState", payload);
		}),
	];

	return () => {
		for (const unsubscribe of subscriptions) {
			unsubscribe();
		}
	};
}
