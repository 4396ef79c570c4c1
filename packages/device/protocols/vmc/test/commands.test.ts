import { ArgumentError } from "@vmc-link/device";
import { describe, expect, it } from "vitest";
import * as Commands from "../src/commands.js";
import { PAYMENT_METHODS, VMC_COMMANDS } from "../src/constants.js";
import { decodeFrame } from "../src/frame.js";

function payloadOf(frame: Uint8Array): number[] {
	return Array.from(decodeFrame(frame).payload);
}

function commandOf(frame: Uint8Array): number {
	return decodeFrame(frame).command;
}

describe("command builders", () => {
	it("getDeviceId sends the 0xAD marker", () => {
		const frame = Commands.getDeviceId();
		expect(commandOf(frame)).toBe(VMC_COMMANDS.GET_DEVICE_ID);
		expect(payloadOf(frame)).toEqual([0xad]);
	});

	it("deliver sends slot and quantity", () => {
		expect(payloadOf(Commands.deliver(3))).toEqual([3, 1]);
		expect(payloadOf(Commands.deliver(255, 2))).toEqual([255, 2]);
		expect(commandOf(Commands.deliver(1))).toBe(0x41);
	});

	it("removeFault, coinChange and cashlessCancel broadcast 0xFF", () => {
		expect(commandOf(Commands.removeFault())).toBe(0xa2);
		expect(payloadOf(Commands.removeFault())).toEqual([0xff]);
		expect(commandOf(Commands.coinChange())).toBe(0xb1);
		expect(payloadOf(Commands.coinChange())).toEqual([0xff]);
		expect(commandOf(Commands.cashlessCancel())).toBe(0xb2);
		expect(payloadOf(Commands.cashlessCancel())).toEqual([0xff]);
	});

	it("queryStatus and queryBalance share 0xE1 with different payloads", () => {
		const status = Commands.queryStatus(7, 1);
		const balance = Commands.queryBalance();
		expect(commandOf(status)).toBe(0xe1);
		expect(commandOf(balance)).toBe(0xe1);
		expect(payloadOf(status)).toEqual([7, 1]);
		expect(payloadOf(balance)).toEqual([0, 0, 0, 0]);
	});

	it("paymentInstruction packs amount LE32, method and slot", () => {
		const frame = Commands.paymentInstruction(1000, PAYMENT_METHODS.COIN, 5);
		expect(commandOf(frame)).toBe(0x11);
		expect(payloadOf(frame)).toEqual([0xe8, 0x03, 0x00, 0x00, 0x01, 0x05]);
	});

	it("paymentInstruction accepts a zero amount", () => {
		const frame = Commands.paymentInstruction(0, PAYMENT_METHODS.CANCEL, 1);
		expect(payloadOf(frame)).toEqual([0, 0, 0, 0, 0, 1]);
	});

	it("debitInstruction carries the amount LE32", () => {
		const frame = Commands.debitInstruction(250);
		expect(commandOf(frame)).toBe(0xb3);
		expect(payloadOf(frame)).toEqual([0xfa, 0x00, 0x00, 0x00]);
	});

	it("ageRecognition carries the required age", () => {
		const frame = Commands.ageRecognition(18);
		expect(commandOf(frame)).toBe(0x12);
		expect(payloadOf(frame)).toEqual([18]);
	});

	it("the two parameterless queries send 0x01", () => {
		expect(commandOf(Commands.queryCoinChangeStatus())).toBe(0x07);
		expect(payloadOf(Commands.queryCoinChangeStatus())).toEqual([0x01]);
		expect(commandOf(Commands.queryAgeVerification())).toBe(0x06);
		expect(payloadOf(Commands.queryAgeVerification())).toEqual([0x01]);
	});

	it("every builder produces a frame that decodes back", () => {
		const frames = [
			Commands.getDeviceId(),
			Commands.deliver(12, 3),
			Commands.removeFault(),
			Commands.queryStatus(12, 3),
			Commands.queryBalance(),
			Commands.paymentInstruction(123456, PAYMENT_METHODS.BILL_ACCEPTOR, 44),
			Commands.coinChange(),
			Commands.cashlessCancel(),
			Commands.debitInstruction(99),
			Commands.ageRecognition(21),
			Commands.queryCoinChangeStatus(),
			Commands.queryAgeVerification(),
		];
		for (const frame of frames) {
			const decoded = decodeFrame(frame);
			expect(decoded.header).toBe(0x55);
			expect(decoded.payload.length).toBe(frame.length - 6);
		}
	});
});

describe("argument validation", () => {
	it("rejects slot 0 and slot 256", () => {
		expect(() => Commands.deliver(0)).toThrow(ArgumentError);
		expect(() => Commands.deliver(256)).toThrow(ArgumentError);
	});

	it("rejects fractional slots and bad quantities", () => {
		expect(() => Commands.deliver(1.5)).toThrow(ArgumentError);
		expect(() => Commands.deliver(1, 0)).toThrow(ArgumentError);
		expect(() => Commands.queryStatus(3, 256)).toThrow(ArgumentError);
	});

	it("names the offending argument", () => {
		expect(() => Commands.deliver(0)).toThrow(
			"Slot must be an integer between 1 and 255 (got 0)",
		);
	});

	it("rejects a negative payment amount", () => {
		expect(() =>
			Commands.paymentInstruction(-1, PAYMENT_METHODS.COIN, 1),
		).toThrow(ArgumentError);
	});

	it("rejects amounts beyond 32 bits", () => {
		expect(() => Commands.debitInstruction(0x1_0000_0000)).toThrow(ArgumentError);
		expect(() => Commands.debitInstruction(-5)).toThrow(ArgumentError);
	});

	it("rejects unknown payment methods", () => {
		expect(() => Commands.paymentInstruction(100, 0x09, 1)).toThrow(
			"Unknown payment method: 9",
		);
	});

	it("rejects ages 0 and 100", () => {
		expect(() => Commands.ageRecognition(0)).toThrow(ArgumentError);
		expect(() => Commands.ageRecognition(100)).toThrow(ArgumentError);
		expect(() => Commands.ageRecognition(99)).not.toThrow();
		expect(() => Commands.ageRecognition(1)).not.toThrow();
	});
});
