import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeCentralManager } from "../__tests__/helpers/fake-central-manager";
import { createDeadlineScheduler } from "../async";
import {
	BluetoothPoweredOffError,
	CentralOperationError,
	ConnectFailedUnknownReasonError,
	TimeoutError,
} from "../errors";
import type { ReadinessState } from "../types";
import { createConnectCoordinator } from "./connect-coordinator";
import { createReadinessGate } from "./readiness-gate";

function setup(state: ReadinessState = "poweredOn") {
	const manager = createFakeCentralManager();
	const gate = createReadinessGate(state);
	const deadlines = createDeadlineScheduler();
	const connector = createConnectCoordinator({ manager, gate, deadlines });
	return { manager, gate, deadlines, connector };
}

describe("createConnectCoordinator", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("issues one connect command for concurrent callers and resolves them all", () => {
		const { manager, connector } = setup();
		const a = vi.fn();
		const b = vi.fn();

		connector.connect("A1", 5000, a);
		connector.connect("A1", 5000, b);

		expect(manager.connect).toHaveBeenCalledTimes(1);
		expect(manager.connect).toHaveBeenCalledWith("A1");

		expect(connector.handleConnected("A1")).toBe(true);
		expect(a).toHaveBeenCalledWith();
		expect(b).toHaveBeenCalledWith();
		expect(connector.isPending("A1")).toBe(false);
	});

	it("succeeds immediately when the peripheral is already connected", () => {
		const { manager, connector } = setup();
		const callback = vi.fn();
		manager.setPeripheral("A1", "connected");

		connector.connect("A1", 5000, callback);

		expect(callback).toHaveBeenCalledWith();
		expect(manager.connect).not.toHaveBeenCalled();
		expect(connector.pendingIds()).toEqual([]);
	});

	it("connects a known peripheral that is not connected", () => {
		const { manager, connector } = setup();
		manager.setPeripheral("A1", "disconnected");

		connector.connect("A1", 5000, vi.fn());

		expect(manager.retrievePeripherals).toHaveBeenCalledWith(["A1"]);
		expect(manager.connect).toHaveBeenCalledWith("A1");
	});

	it("fails with the gate error without touching the radio", () => {
		const { manager, connector } = setup("poweredOff");
		const callback = vi.fn();

		connector.connect("A1", 5000, callback);

		expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(
			BluetoothPoweredOffError,
		);
		expect(manager.retrievePeripherals).not.toHaveBeenCalled();
		expect(manager.commands).toEqual([]);
	});

	it("times out with the connect operation name", () => {
		const { connector } = setup();
		const callback = vi.fn();

		connector.connect("A1", 1000, callback);
		vi.advanceTimersByTime(1000);

		const error = callback.mock.calls[0]?.[0];
		expect(error).toBeInstanceOf(TimeoutError);
		expect(error.operation).toBe("connect peripheral");
	});

	it("drops a success notification that arrives after the timeout", () => {
		const { connector } = setup();
		const callback = vi.fn();

		connector.connect("A1", 1000, callback);
		vi.advanceTimersByTime(1000);

		expect(connector.handleConnected("A1")).toBe(false);
		expect(callback).toHaveBeenCalledTimes(1);
	});

	it("a success before the deadline is never followed by a timeout", () => {
		const { deadlines, connector } = setup();
		const callback = vi.fn();

		connector.connect("A1", 1000, callback);
		connector.handleConnected("A1");
		vi.advanceTimersByTime(5000);

		expect(callback).toHaveBeenCalledTimes(1);
		expect(callback).toHaveBeenCalledWith();
		expect(deadlines.activeCount()).toBe(0);
	});

	describe("handleConnectFailed", () => {
		it("wraps the radio error", () => {
			const { connector } = setup();
			const callback = vi.fn();

			connector.connect("A1", 5000, callback);
			connector.handleConnectFailed("A1", new Error("link lost"));

			const error = callback.mock.calls[0]?.[0];
			expect(error).toBeInstanceOf(CentralOperationError);
			expect(error.operation).toBe("connect peripheral");
			expect(error.cause.message).toBe("link lost");
		});

		it("reports an unknown reason when the radio gives none", () => {
			const { connector } = setup();
			const callback = vi.fn();

			connector.connect("A1", 5000, callback);
			connector.handleConnectFailed("A1");

			expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(
				ConnectFailedUnknownReasonError,
			);
		});

		it("drops failures nobody is waiting for", () => {
			const { connector } = setup();
			expect(connector.handleConnectFailed("A1", "ignored")).toBe(false);
		});

		it("leaves the coordinator usable for the same peripheral", () => {
			const { manager, connector } = setup();
			const retry = vi.fn();

			connector.connect("A1", 5000, vi.fn());
			connector.handleConnectFailed("A1");
			connector.connect("A1", 5000, retry);
			connector.handleConnected("A1");

			expect(manager.connect).toHaveBeenCalledTimes(2);
			expect(retry).toHaveBeenCalledWith();
		});
	});
});
