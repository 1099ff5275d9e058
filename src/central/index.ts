export {
	type Central,
	type CentralOptions,
	type CentralTimeouts,
	createCentral,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_DISCONNECT_TIMEOUT_MS,
	DEFAULT_SCAN_TIMEOUT_MS,
} from "./central";
export {
	type ConnectCoordinator,
	CONNECT_OPERATION,
	createConnectCoordinator,
} from "./connect-coordinator";
export {
	createDisconnectCoordinator,
	DISCONNECT_OPERATION,
	type DisconnectCoordinator,
} from "./disconnect-coordinator";
export {
	attachEventDispatcher,
	type EventDispatcherOptions,
} from "./event-dispatcher";
export {
	createPendingRequests,
	type EnqueueResult,
	type PendingRequests,
} from "./pending-requests";
export {
	type AsyncRequestOptions,
	connectPeripheral,
	disconnectPeripheral,
	waitUntilReady,
} from "./promises";
export { createReadinessGate, type ReadinessGate } from "./readiness-gate";
export {
	createScanCoordinator,
	resolveScanFilter,
	SCAN_OPERATION,
	type ScanCoordinator,
} from "./scan-coordinator";
