/**
 * End-to-end central scenarios
 *
 * Drives a central through the flows an application goes through against a
 * single shared radio: cold start, concurrent connects, late notifications
 * and the radio going away mid-session.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCentral } from "../../central";
import {
	BluetoothPoweredOffError,
	BluetoothUnsupportedError,
	ScanTerminatedError,
	TimeoutError,
} from "../../errors";
import type { ScanEvent } from "../../types";
import { createFakeCentralManager } from "../helpers/fake-central-manager";

describe("central scenarios", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("two callers connecting the same peripheral share one command", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager, initialState: "poweredOn" });
		const a = vi.fn();
		const b = vi.fn();

		central.connect("X", a);
		central.connect("X", b);
		manager.emitConnect("X");

		expect(manager.commands).toEqual(["connect:X"]);
		expect(a).toHaveBeenCalledWith();
		expect(b).toHaveBeenCalledWith();
		expect(central.pendingConnections()).toEqual([]);
	});

	it("drops a connected notification that arrives after the deadline", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager, initialState: "poweredOn" });
		const callback = vi.fn();

		central.connect("X", callback, { timeoutMs: 1000 });
		vi.advanceTimersByTime(1000);
		manager.emitConnect("X");

		expect(callback).toHaveBeenCalledTimes(1);
		const error = callback.mock.calls[0]?.[0];
		expect(error).toBeInstanceOf(TimeoutError);
		expect(error.message).toBe("connect peripheral timed out after 1000ms");
	});

	it("fails a scan on an unsupported host without touching the radio", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager });
		const received: ScanEvent[] = [];

		central.scan((event) => received.push(event));
		manager.emitState("unsupported");

		expect(received).toHaveLength(1);
		const stopped = received[0];
		expect(stopped?.type).toBe("stopped");
		expect(stopped?.type === "stopped" && stopped.error).toBeInstanceOf(
			BluetoothUnsupportedError,
		);
		expect(manager.startScan).not.toHaveBeenCalled();
	});

	it("refuses work while powered off without issuing commands", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager, initialState: "poweredOff" });
		const onReady = vi.fn();
		const onConnect = vi.fn();

		central.ensureReady(onReady);
		central.connect("X", onConnect);

		expect(onReady.mock.calls[0]?.[0]).toBeInstanceOf(BluetoothPoweredOffError);
		expect(onConnect.mock.calls[0]?.[0]).toBeInstanceOf(
			BluetoothPoweredOffError,
		);
		expect(manager.commands).toEqual([]);
	});

	it("runs a cold-start session from discovery to disconnect", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager });
		const received: ScanEvent[] = [];
		const onConnect = vi.fn();
		const onDisconnect = vi.fn();

		central.scan((event) => received.push(event), {
			services: [0x180d],
			timeoutMs: 5000,
		});
		expect(manager.commands).toEqual([]);

		manager.emitState("poweredOn");
		const discovery = manager.emitDiscover("HR1", -48);
		central.stopScan();

		expect(received).toEqual([
			{ type: "started" },
			{ type: "result", discovery },
			{ type: "stopped" },
		]);

		central.connect("HR1", onConnect);
		manager.emitConnect("HR1");
		manager.setPeripheral("HR1", "connected");

		central.disconnect("HR1", onDisconnect);
		manager.emitDisconnect("HR1");

		expect(onConnect).toHaveBeenCalledWith();
		expect(onDisconnect).toHaveBeenCalledWith();
		expect(manager.commands).toEqual([
			"startScan:0000180d-0000-1000-8000-00805f9b34fb",
			"stopScan",
			"connect:HR1",
			"cancelConnection:HR1",
		]);
		expect(vi.getTimerCount()).toBe(0);
	});

	it("ends the scan when the radio turns off mid-session", () => {
		const manager = createFakeCentralManager();
		const central = createCentral({ manager, initialState: "poweredOn" });
		const received: ScanEvent[] = [];
		const states: string[] = [];
		central.on("stateChange", (state) => states.push(state));

		central.scan((event) => received.push(event));
		manager.emitState("poweredOff");
		manager.emitDiscover("HR1");

		expect(received).toHaveLength(2);
		const stopped = received[1];
		expect(stopped?.type === "stopped" && stopped.error).toBeInstanceOf(
			ScanTerminatedError,
		);
		expect(central.isScanning()).toBe(false);
		expect(states).toEqual(["poweredOff"]);
		expect(manager.commands).toEqual(["startScan:*", "stopScan"]);
	});

	it("skips the command for a peripheral that is already connected", () => {
		const manager = createFakeCentralManager();
		manager.setPeripheral("X", "connected");
		const central = createCentral({ manager, initialState: "poweredOn" });
		const callback = vi.fn();

		central.connect("X", callback);

		expect(callback).toHaveBeenCalledWith();
		expect(manager.commands).toEqual([]);
	});
});
