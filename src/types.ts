/**
 * @fileoverview Core type definitions for ble-central.
 *
 * ## Null vs Undefined Conventions
 *
 * - **`null`**: Intentionally empty or "not found"
 *   - `gateErrorFor()` returns `null` when the radio is usable
 *   - the scan slot is `null` when no scan is active
 *
 * - **`undefined`**: Not set or optional
 *   - completion callbacks receive `undefined` on success
 *   - radio notifications omit `error` when the radio gave no reason
 */

import type { CentralError } from "./errors";

/**
 * Readiness of the radio, as reported by the manager.
 * - 'unknown' / 'resetting': transitional, the real state is not known yet
 * - 'unsupported': the host has no usable Bluetooth LE radio
 * - 'unauthorized': the application may not use Bluetooth
 * - 'poweredOff': the radio is switched off
 * - 'poweredOn': the radio is ready for scan/connect/disconnect
 */
export type ReadinessState =
	| "unknown"
	| "resetting"
	| "unsupported"
	| "unauthorized"
	| "poweredOff"
	| "poweredOn";

/** The readiness states that resolve callbacks queued on the gate. */
export type TerminalReadinessState = Exclude<
	ReadinessState,
	"unknown" | "resetting"
>;

export function isTransitionalState(
	state: ReadinessState,
): state is "unknown" | "resetting" {
	return state === "unknown" || state === "resetting";
}

/** Link state of a peripheral the manager already knows about. */
export type PeripheralState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "disconnecting";

export interface KnownPeripheral {
	/** Stable identifier of the peripheral (usually a UUID) */
	readonly id: string;
	readonly state: PeripheralState;
	readonly name?: string | undefined;
}

/** Advertisement payload, passed through untouched. */
export type AdvertisementData = Readonly<Record<string, unknown>>;

/** Payload of a restore-state notification, passed through untouched. */
export type RestoreStatePayload = Readonly<Record<string, unknown>>;

export interface DiscoveredPeripheral {
	readonly peripheral: KnownPeripheral;
	readonly advertisementData: AdvertisementData;
	/** Received Signal Strength Indicator in dBm */
	readonly rssi: number;
}

/**
 * Filter for a discovery operation.
 */
export interface ScanFilter {
	/**
	 * Only report peripherals advertising one of these services.
	 * Short UUIDs (e.g. `0x180d` or `"180d"`) are expanded to full UUIDs.
	 */
	services?: (number | string)[];
	/**
	 * Report every advertisement instead of one per peripheral.
	 * @default false
	 */
	allowDuplicates?: boolean;
}

/** A scan filter after service UUIDs have been expanded. */
export interface ResolvedScanFilter {
	services: string[] | null;
	allowDuplicates: boolean;
}

/**
 * Events delivered to a scan callback.
 * Exactly one `started` precedes any `result`; `stopped` is always last.
 */
export type ScanEvent =
	| { type: "started" }
	| { type: "result"; discovery: DiscoveredPeripheral }
	| { type: "stopped"; error?: CentralError | undefined };

export type ScanCallback = (event: ScanEvent) => void;

/** Receives `undefined` on success. */
export type CompletionCallback = (error?: CentralError) => void;

export type ReadinessCallback = (state: TerminalReadinessState) => void;

/**
 * Notifications the radio manager delivers, keyed by event name.
 */
export type CentralManagerEvents = {
	stateChange: ReadinessState;
	connect: { peripheralId: string };
	disconnect: { peripheralId: string; error?: unknown };
	connectFail: { peripheralId: string; error?: unknown };
	discover: DiscoveredPeripheral;
	willRestoreState: RestoreStatePayload;
};

/**
 * The radio manager a central drives.
 * Implement this interface to plug in a Bluetooth backend
 * (a native binding, a platform bridge, or an in-memory fake for tests).
 *
 * @remarks
 * Commands are fire-and-forget: every outcome comes back as a notification
 * through `on()`. A manager may never answer a command; the central's
 * deadlines cover that case.
 *
 * @example Backed by a typed emitter
 * ```typescript
 * const events = createEventEmitter<CentralManagerEvents>();
 * const manager: CentralManager = {
 *   startScan: (filter) => native.scan(filter.services),
 *   stopScan: () => native.stopScan(),
 *   connect: (id) => native.connect(id),
 *   cancelConnection: (id) => native.disconnect(id),
 *   retrievePeripherals: (ids) => native.known(ids),
 *   on: (event, listener) => events.on(event, listener),
 * };
 * ```
 */
export interface CentralManager {
	startScan(filter: ResolvedScanFilter): void;
	stopScan(): void;
	connect(peripheralId: string): void;
	cancelConnection(peripheralId: string): void;
	/**
	 * Looks up peripherals the manager already knows.
	 * Unknown identifiers are left out of the result.
	 */
	retrievePeripherals(peripheralIds: string[]): KnownPeripheral[];
	/**
	 * Subscribes to a manager notification.
	 * @returns Unsubscribe function
	 */
	on<K extends keyof CentralManagerEvents>(
		event: K,
		listener: (data: CentralManagerEvents[K]) => void,
	): () => void;
}

/**
 * Broadcast events a central publishes to the rest of the application.
 */
export type CentralEvents = {
	stateChange: ReadinessState;
	willRestoreState: RestoreStatePayload;
};

/** Per-call options for connect and disconnect. */
export interface PeripheralRequestOptions {
	/** Overrides the central's default deadline for this request */
	timeoutMs?: number;
}

/** Per-call options for scan. */
export interface ScanOptions extends ScanFilter {
	/**
	 * How long the scan runs before it stops on its own.
	 * Overrides the central's default.
	 */
	timeoutMs?: number;
}
