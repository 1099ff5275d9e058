import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeCentralManager } from "../__tests__/helpers/fake-central-manager";
import { createDeadlineScheduler } from "../async";
import {
	BluetoothUnauthorizedError,
	CentralOperationError,
	TimeoutError,
} from "../errors";
import type { ReadinessState } from "../types";
import { createDisconnectCoordinator } from "./disconnect-coordinator";
import { createReadinessGate } from "./readiness-gate";

function setup(state: ReadinessState = "poweredOn") {
	const manager = createFakeCentralManager();
	const gate = createReadinessGate(state);
	const deadlines = createDeadlineScheduler();
	const disconnector = createDisconnectCoordinator({
		manager,
		gate,
		deadlines,
	});
	return { manager, gate, deadlines, disconnector };
}

describe("createDisconnectCoordinator", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("cancels the connection once for concurrent callers", () => {
		const { manager, disconnector } = setup();
		manager.setPeripheral("A1", "connected");
		const a = vi.fn();
		const b = vi.fn();

		disconnector.disconnect("A1", 5000, a);
		disconnector.disconnect("A1", 5000, b);
		disconnector.handleDisconnected("A1");

		expect(manager.commands).toEqual(["cancelConnection:A1"]);
		expect(a).toHaveBeenCalledWith();
		expect(b).toHaveBeenCalledWith();
	});

	it.each(["disconnected", "disconnecting"] as const)(
		"succeeds immediately when the peripheral is %s",
		(state) => {
			const { manager, disconnector } = setup();
			manager.setPeripheral("A1", state);
			const callback = vi.fn();

			disconnector.disconnect("A1", 5000, callback);

			expect(callback).toHaveBeenCalledWith();
			expect(manager.cancelConnection).not.toHaveBeenCalled();
		},
	);

	it("fails with the gate error", () => {
		const { manager, disconnector } = setup("unauthorized");
		const callback = vi.fn();

		disconnector.disconnect("A1", 5000, callback);

		expect(callback.mock.calls[0]?.[0]).toBeInstanceOf(
			BluetoothUnauthorizedError,
		);
		expect(manager.commands).toEqual([]);
	});

	it("wraps a radio error on completion", () => {
		const { manager, disconnector } = setup();
		manager.setPeripheral("A1", "connected");
		const callback = vi.fn();

		disconnector.disconnect("A1", 5000, callback);
		disconnector.handleDisconnected("A1", "peer terminated");

		const error = callback.mock.calls[0]?.[0];
		expect(error).toBeInstanceOf(CentralOperationError);
		expect(error.message).toBe(
			"disconnect peripheral failed: peer terminated",
		);
	});

	it("times out with the disconnect operation name", () => {
		const { manager, disconnector } = setup();
		manager.setPeripheral("A1", "connected");
		const callback = vi.fn();

		disconnector.disconnect("A1", 2000, callback);
		vi.advanceTimersByTime(2000);

		const error = callback.mock.calls[0]?.[0];
		expect(error).toBeInstanceOf(TimeoutError);
		expect(error.message).toBe("disconnect peripheral timed out after 2000ms");
		expect(disconnector.isPending("A1")).toBe(false);
	});

	it("drops completions nobody is waiting for", () => {
		const { disconnector } = setup();
		expect(disconnector.handleDisconnected("A1")).toBe(false);
	});
});
