import { VMC_COMMANDS } from "@vmc-link/device-protocol-vmc";
import { MemoryTransport } from "@vmc-link/device-transport-memory";
import { SimulatedVmcTransport } from "@vmc-link/device-transport-simulator";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { VendingEngine } from "../src/engine.js";
import {
	commandsOf,
	deliveryEcho,
	FAST_CONFIG,
	statusReply,
} from "./helpers.js";

const DELIVER = VMC_COMMANDS.DELIVER;
const STATUS = VMC_COMMANDS.QUERY_STATUS;

describe("VendingEngine.dispenseWater", () => {
	let transport: MemoryTransport;
	let engine: VendingEngine;

	beforeEach(async () => {
		transport = new MemoryTransport();
		engine = new VendingEngine(transport, { config: FAST_CONFIG });
		await engine.connect();
	});

	it("delivers then polls once when the board reports success", async () => {
		transport.queueResponse(deliveryEcho(3)).queueResponse(statusReply(0x01));

		const result = await engine.dispenseWater(3);

		expect(result.success).toBe(true);
		expect(result.slot).toBe(3);
		expect(result.errorMessage).toBeUndefined();
		expect(result.elapsedMs).toBeGreaterThan(0);
		expect(commandsOf(transport.sentFrames)).toEqual([DELIVER, STATUS]);
		expect(Object.isFrozen(result)).toBe(true);
	});

	it("reports a motor fault with its code", async () => {
		transport.queueResponse(deliveryEcho(3)).queueResponse(statusReply(0x02));

		const result = await engine.dispenseWater(3);

		expect(result).toMatchObject({
			success: false,
			slot: 3,
			errorCode: 2,
			failureKind: "hardware",
			errorMessage: "Motor failure in slot 3",
		});
		expect(result.errorMessage?.toLowerCase()).toContain("motor");
	});

	it("reports an optical sensor fault", async () => {
		transport.queueResponse(deliveryEcho(12)).queueResponse(statusReply(0x03));

		const result = await engine.dispenseWater(12);
		expect(result.errorCode).toBe(3);
		expect(result.errorMessage).toBe("Optical sensor failure in slot 12");
	});

	it("reports an unknown fault code", async () => {
		transport.queueResponse(deliveryEcho(3)).queueResponse(statusReply(0x09));

		const result = await engine.dispenseWater(3);
		expect(result.errorCode).toBe(9);
		expect(result.errorMessage).toBe("Unknown fault 0x09 in slot 3");
	});

	it("never polls when the delivery command gets no reply", async () => {
		transport.queueSilence();

		const result = await engine.dispenseWater(3);

		expect(result.success).toBe(false);
		expect(result.failureKind).toBe("communication");
		expect(result.errorMessage).toBe(
			"Failed to send delivery command: No response within 50ms",
		);
		expect(commandsOf(transport.sentFrames)).toEqual([DELIVER]);
	});

	it("does not retry a refused delivery", async () => {
		const send = vi.spyOn(transport, "send");
		transport.failNextSend();

		const result = await engine.dispenseWater(3);

		expect(result.errorMessage).toBe(
			"Failed to send delivery command: send failed",
		);
		expect(send).toHaveBeenCalledTimes(1);
	});

	it("reports the disconnected state", async () => {
		await engine.disconnect();

		const result = await engine.dispenseWater(3);
		expect(result.errorMessage).toBe(
			"Failed to send delivery command: Not connected to VMC",
		);
	});

	it("rejects an invalid slot before any I/O", async () => {
		const result = await engine.dispenseWater(0);

		expect(result).toMatchObject({
			success: false,
			slot: 0,
			failureKind: "argument",
			errorMessage: "Slot must be an integer between 1 and 255 (got 0)",
		});
		expect(transport.sentFrames).toHaveLength(0);
	});

	it("keeps polling through silent and garbled status replies", async () => {
		const garbled = statusReply(0x01);
		garbled[garbled.length - 1] = (garbled[garbled.length - 1] ?? 0) ^ 0xff;
		transport
			.queueResponse(deliveryEcho(3))
			.queueSilence()
			.queueResponse(garbled)
			.queueResponse(statusReply(0x01));

		const result = await engine.dispenseWater(3);

		expect(result.success).toBe(true);
		expect(commandsOf(transport.sentFrames)).toEqual([
			DELIVER,
			STATUS,
			STATUS,
			STATUS,
		]);
	});

	it("times out after maxPollAttempts polls without an outcome", async () => {
		transport.queueResponse(deliveryEcho(3));

		const result = await engine.dispenseWater(3);

		expect(result.success).toBe(false);
		expect(result.failureKind).toBe("timeout");
		expect(result.errorMessage).toBe(
			`Dispensing operation timed out after ${result.elapsedMs}ms`,
		);
		expect(commandsOf(transport.sentFrames)).toEqual([
			DELIVER,
			STATUS,
			STATUS,
			STATUS,
		]);
	});

	it("is cancelled before the delivery with an aborted signal", async () => {
		const result = await engine.dispenseWater(3, { signal: AbortSignal.abort() });

		expect(result).toMatchObject({
			success: false,
			failureKind: "cancelled",
			errorMessage: "Dispense cancelled",
		});
		expect(transport.sentFrames).toHaveLength(0);
	});

	it("stops polling once cancelled mid-poll", async () => {
		transport.queueResponse(deliveryEcho(3));
		const controller = new AbortController();
		setTimeout(() => controller.abort(), 20);

		const result = await engine.dispenseWater(3, { signal: controller.signal });

		expect(result.failureKind).toBe("cancelled");
		expect(result.errorMessage).toBe("Dispense cancelled");
		expect(commandsOf(transport.sentFrames)).toEqual([DELIVER, STATUS]);
	});
});

describe("VendingEngine.dispenseWater against the simulator", () => {
	let board: SimulatedVmcTransport;
	let engine: VendingEngine;

	beforeEach(async () => {
		board = new SimulatedVmcTransport();
		engine = new VendingEngine(board, {
			config: { commandTimeoutMs: 30, pollIntervalMs: 2, maxPollAttempts: 5 },
		});
		await engine.connect();
	});

	it("waits out a busy board", async () => {
		board.setBusyPolls(2);

		const result = await engine.dispenseWater(5);

		expect(result.success).toBe(true);
		expect(board.deliveries).toEqual([{ slot: 5, quantity: 1 }]);
		expect(board.received.map((f) => f.command)).toEqual([
			DELIVER,
			STATUS,
			STATUS,
			STATUS,
		]);
	});

	it("holds the line until the dispense finishes", async () => {
		const slow = new VendingEngine(board, {
			config: { commandTimeoutMs: 30, pollIntervalMs: 40, maxPollAttempts: 2 },
		});
		const dispensing = slow.dispenseWater(5);
		await new Promise((resolve) => setTimeout(resolve, 10));

		const deviceId = await slow.getDeviceId();
		const result = await dispensing;

		expect(deviceId).toEqual({ ok: true, value: "VMC-SIM-0000001" });
		expect(result.success).toBe(true);
		expect(board.received.map((f) => f.command)).toEqual([
			DELIVER,
			STATUS,
			VMC_COMMANDS.GET_DEVICE_ID,
		]);
	});

	it("runs concurrent dispenses one after the other", async () => {
		board.setBusyPolls(1);

		const [first, second] = await Promise.all([
			engine.dispenseWater(1),
			engine.dispenseWater(2),
		]);

		expect(first).toMatchObject({ success: true, slot: 1 });
		expect(second).toMatchObject({ success: true, slot: 2 });
		expect(
			board.received.map((f) => `${f.command.toString(16)}:${f.payload[0]}`),
		).toEqual(["41:1", "e1:1", "e1:1", "41:2", "e1:2", "e1:2"]);
	});

	it("frees the line when a dispense is cancelled mid-poll", async () => {
		const slow = new VendingEngine(board, {
			config: { commandTimeoutMs: 30, pollIntervalMs: 40, maxPollAttempts: 2 },
		});
		const controller = new AbortController();
		const dispensing = slow.dispenseWater(5, { signal: controller.signal });
		const deviceId = slow.getDeviceId();
		await new Promise((resolve) => setTimeout(resolve, 10));
		controller.abort();

		expect(await dispensing).toMatchObject({
			success: false,
			failureKind: "cancelled",
			errorMessage: "Dispense cancelled",
		});
		expect(await deviceId).toEqual({ ok: true, value: "VMC-SIM-0000001" });
		expect(board.received.map((f) => f.command)).toEqual([
			DELIVER,
			VMC_COMMANDS.GET_DEVICE_ID,
		]);
	});

	it("gives up a dispense cancelled while waiting for the line", async () => {
		const controller = new AbortController();
		const first = engine.dispenseWater(1);
		const second = engine.dispenseWater(2, { signal: controller.signal });
		controller.abort();

		expect(await second).toMatchObject({
			success: false,
			failureKind: "cancelled",
		});
		expect(await first).toMatchObject({ success: true, slot: 1 });
		expect(board.deliveries).toEqual([{ slot: 1, quantity: 1 }]);
	});

	it("reports a persistent fault on every attempt", async () => {
		board.injectFault(4, "motor", { persistent: true });

		const first = await engine.dispenseWater(4);
		await engine.clearFaults();
		const second = await engine.dispenseWater(4);

		expect(first.errorCode).toBe(2);
		expect(second.errorCode).toBe(2);
		expect(board.faultClears).toBe(1);
	});
});
