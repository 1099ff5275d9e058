/**
 * ble-central - request coordination for a shared Bluetooth LE radio.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { connectPeripheral, createCentral, waitUntilReady } from 'ble-central';
 *
 * const central = createCentral({ manager: myRadioManager });
 *
 * await waitUntilReady(central);
 * await connectPeripheral(central, peripheralId, { timeoutMs: 5000 });
 * ```
 */

// Deadlines
export {
	createDeadlineScheduler,
	type DeadlineHandle,
	type DeadlineScheduler,
} from "./async";
// Central
export {
	type AsyncRequestOptions,
	type Central,
	type CentralOptions,
	type CentralTimeouts,
	connectPeripheral,
	createCentral,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_DISCONNECT_TIMEOUT_MS,
	DEFAULT_SCAN_TIMEOUT_MS,
	disconnectPeripheral,
	waitUntilReady,
} from "./central";
// Errors
export {
	AbortError,
	BluetoothPoweredOffError,
	type BluetoothStateError,
	BluetoothUnauthorizedError,
	BluetoothUnsupportedError,
	CentralDisposedError,
	type CentralError,
	CentralOperationError,
	ConnectFailedUnknownReasonError,
	gateErrorFor,
	isCentralError,
	normalizeError,
	ScanTerminatedError,
	TimeoutError,
} from "./errors";
// Events
export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./state";
// Types
export {
	type AdvertisementData,
	type CentralEvents,
	type CentralManager,
	type CentralManagerEvents,
	type CompletionCallback,
	type DiscoveredPeripheral,
	isTransitionalState,
	type KnownPeripheral,
	type PeripheralRequestOptions,
	type PeripheralState,
	type ReadinessCallback,
	type ReadinessState,
	type ResolvedScanFilter,
	type RestoreStatePayload,
	type ScanCallback,
	type ScanEvent,
	type ScanFilter,
	type ScanOptions,
	type TerminalReadinessState,
} from "./types";
// Utils
export { BLUETOOTH_UUID_BASE, normalizeServiceUuid, toFullUuid } from "./utils";
