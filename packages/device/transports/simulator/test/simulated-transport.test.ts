import { DEFAULT_SERIAL_CONFIG } from "@vmc-link/device";
import {
	decodeFrame,
	decodeResponse,
	encodeFrame,
	FrameHeader,
	PAYMENT_METHODS,
	type SharedCodeMode,
	VmcCommandBuilder,
	type VmcResponse,
} from "@vmc-link/device-protocol-vmc";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SimulatedVmcTransport } from "../src/simulated-transport.js";

const TIMEOUT = 20;

describe("SimulatedVmcTransport", () => {
	let board: SimulatedVmcTransport;

	async function exchange(
		frame: Uint8Array,
		mode?: SharedCodeMode,
	): Promise<VmcResponse | null> {
		expect(await board.send(frame)).toBe(true);
		const reply = await board.receive(TIMEOUT);
		return reply === null ? null : decodeResponse(decodeFrame(reply), mode);
	}

	beforeEach(async () => {
		board = new SimulatedVmcTransport({ deviceId: "VMC-TEST-000042" });
		await board.connect(DEFAULT_SERIAL_CONFIG);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("reports its device id", async () => {
		expect(await exchange(VmcCommandBuilder.getDeviceId())).toEqual({
			kind: "device-id",
			deviceId: "VMC-TEST-000042",
		});
	});

	it("pads a short device id to 15 characters", async () => {
		board = new SimulatedVmcTransport({ deviceId: "SIM1" });
		await board.connect(DEFAULT_SERIAL_CONFIG);

		expect(await exchange(VmcCommandBuilder.getDeviceId())).toEqual({
			kind: "device-id",
			deviceId: "SIM1           ",
		});
	});

	it("echoes a delivery and then reports success", async () => {
		expect(await exchange(VmcCommandBuilder.deliver(3))).toEqual({
			kind: "delivery",
			slot: 3,
			quantity: 1,
		});
		expect(await exchange(VmcCommandBuilder.queryStatus(3))).toEqual({
			kind: "status",
			success: true,
		});
		expect(board.deliveries).toEqual([{ slot: 3, quantity: 1 }]);
	});

	it("stays quiet for the configured number of busy polls", async () => {
		board.setBusyPolls(2);
		await exchange(VmcCommandBuilder.deliver(5));

		expect(await exchange(VmcCommandBuilder.queryStatus(5))).toBeNull();
		expect(await exchange(VmcCommandBuilder.queryStatus(5))).toBeNull();
		expect(await exchange(VmcCommandBuilder.queryStatus(5))).toEqual({
			kind: "status",
			success: true,
		});
	});

	it("reports injected motor and optical faults", async () => {
		board.injectFault(1, "motor").injectFault(2, "optical").injectFault(4, 0x09);

		await exchange(VmcCommandBuilder.deliver(1));
		expect(await exchange(VmcCommandBuilder.queryStatus(1))).toEqual({
			kind: "status",
			success: false,
			errorCode: 0x02,
		});
		await exchange(VmcCommandBuilder.deliver(2));
		expect(await exchange(VmcCommandBuilder.queryStatus(2))).toEqual({
			kind: "status",
			success: false,
			errorCode: 0x03,
		});
		await exchange(VmcCommandBuilder.deliver(4));
		expect(await exchange(VmcCommandBuilder.queryStatus(4))).toEqual({
			kind: "status",
			success: false,
			errorCode: 0x09,
		});
	});

	it("clears transient faults on REMOVE_FAULT but keeps persistent ones", async () => {
		board.injectFault(1, "motor").injectFault(2, "motor", { persistent: true });

		expect(await exchange(VmcCommandBuilder.removeFault())).toEqual({
			kind: "simple",
			success: true,
		});
		expect(board.faultClears).toBe(1);

		await exchange(VmcCommandBuilder.deliver(1));
		expect(await exchange(VmcCommandBuilder.queryStatus(1))).toEqual({
			kind: "status",
			success: true,
		});
		await exchange(VmcCommandBuilder.deliver(2));
		expect(await exchange(VmcCommandBuilder.queryStatus(2))).toEqual({
			kind: "status",
			success: false,
			errorCode: 0x02,
		});
	});

	it("answers the balance query with the configured credit", async () => {
		board.setBalance(1000);
		expect(await exchange(VmcCommandBuilder.queryBalance(), "balance")).toEqual({
			kind: "balance",
			amount: 1000,
		});
	});

	it("debits the balance and refuses overdrafts", async () => {
		board.setBalance(500);

		expect(await exchange(VmcCommandBuilder.debitInstruction(200))).toEqual({
			kind: "simple",
			success: true,
		});
		expect(board.balance).toBe(300);
		expect(await exchange(VmcCommandBuilder.debitInstruction(301))).toEqual({
			kind: "simple",
			success: false,
		});
		expect(board.balance).toBe(300);
	});

	it("records payment instructions", async () => {
		expect(
			await exchange(
				VmcCommandBuilder.paymentInstruction(250, PAYMENT_METHODS.CASHLESS, 7),
			),
		).toEqual({ kind: "payment", success: true });
		expect(board.payments).toEqual([
			{ amountCents: 250, method: PAYMENT_METHODS.CASHLESS, slot: 7 },
		]);
	});

	it("answers coin change and age checks from its settings", async () => {
		board.setCanRefund(false).setAgeVerified(true);

		expect(await exchange(VmcCommandBuilder.queryCoinChangeStatus())).toEqual({
			kind: "coin-change-status",
			canRefund: false,
		});
		expect(await exchange(VmcCommandBuilder.coinChange())).toEqual({
			kind: "simple",
			success: false,
		});
		expect(await exchange(VmcCommandBuilder.ageRecognition(18))).toEqual({
			kind: "simple",
			success: true,
		});
		expect(board.lastRequiredAge).toBe(18);
		expect(await exchange(VmcCommandBuilder.queryAgeVerification())).toEqual({
			kind: "age-verification",
			verified: true,
		});
	});

	it("never answers in silent mode", async () => {
		board.setSilent(true);
		expect(await exchange(VmcCommandBuilder.getDeviceId())).toBeNull();
		expect(board.received).toHaveLength(1);
	});

	it("corrupts the checksum of the next reply only", async () => {
		board.corruptNextResponses();

		await board.send(VmcCommandBuilder.getDeviceId());
		const corrupt = await board.receive(TIMEOUT);
		expect(corrupt).not.toBeNull();
		expect(() => decodeFrame(corrupt ?? new Uint8Array(0))).toThrow(
			/Checksum mismatch/,
		);

		expect((await exchange(VmcCommandBuilder.getDeviceId()))?.kind).toBe(
			"device-id",
		);
	});

	it("drops malformed and device-originated frames", async () => {
		const bad = VmcCommandBuilder.getDeviceId();
		bad[bad.length - 1] = 0x00;

		expect(await board.send(bad)).toBe(true);
		expect(await board.send(encodeFrame(FrameHeader.DEVICE, 0x31, [0xad]))).toBe(
			true,
		);
		expect(board.rejectedFrames).toBe(2);
		expect(board.received).toHaveLength(0);
	});

	it("leaves a late reply buffered until clearBuffers()", async () => {
		vi.useFakeTimers();
		board = new SimulatedVmcTransport({ responseDelayMs: 100 });
		await board.connect(DEFAULT_SERIAL_CONFIG);
		await board.send(VmcCommandBuilder.getDeviceId());

		const first = board.receive(50);
		await vi.advanceTimersByTimeAsync(50);
		expect(await first).toBeNull();

		await board.clearBuffers();
		const second = board.receive(100);
		await vi.advanceTimersByTimeAsync(100);
		expect(await second).toBeNull();
	});

	it("refuses frames while disconnected", async () => {
		await board.disconnect();
		expect(await board.send(VmcCommandBuilder.getDeviceId())).toBe(false);
	});

	it("offers replies to data listeners", async () => {
		const listener = vi.fn();
		board.onData(listener);

		await exchange(VmcCommandBuilder.getDeviceId());
		expect(listener).toHaveBeenCalledTimes(1);
	});
});
