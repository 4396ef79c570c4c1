import { describe, expect, it } from "vitest";
import { handleDecode, parseMode } from "../src/commands/decode.js";

describe("handleDecode", () => {
	it("decodes a board reply", () => {
		expect(handleDecode("FF 00 AA 41 02 03 01 F1")).toEqual({
			frames: [
				{
					valid: true,
					frame: "FF 00 AA 41 02 03 01 F1",
					direction: "device",
					command: "0x41",
					label: "deliver",
					payload: "03 01",
					response: { kind: "delivery", slot: 3, quantity: 1 },
				},
			],
			discardedBytes: 0,
			trailingBytes: 0,
		});
	});

	it("describes host frames without a response", () => {
		const [frame] = handleDecode("ff0055 3101 ad0c").frames;

		expect(frame).toEqual({
			valid: true,
			frame: "FF 00 55 31 01 AD 0C",
			direction: "host",
			command: "0x31",
			label: "get-device-id",
			payload: "AD",
		});
	});

	it("skips noise and reports an unfinished frame", () => {
		const report = handleDecode("00 11 FF 00 AA E1 01 01 8D FF 00");

		expect(report.frames).toHaveLength(1);
		expect(report.frames[0]).toMatchObject({
			valid: true,
			response: { kind: "status", success: true },
		});
		expect(report.discardedBytes).toBe(2);
		expect(report.trailingBytes).toBe(2);
	});

	it("flags a frame with a bad checksum", () => {
		expect(handleDecode("FF 00 AA 41 02 03 01 00").frames).toEqual([
			{
				valid: false,
				frame: "FF 00 AA 41 02 03 01 00",
				error: "Checksum mismatch: expected 0xF1, got 0x00",
			},
		]);
	});

	it("reads 0xE1 replies by mode", () => {
		const hex = "FF 00 AA E1 04 E8 03 00 00 7A";

		expect(handleDecode(hex, "balance").frames[0]).toMatchObject({
			response: { kind: "balance", amount: 1000 },
		});
		expect(handleDecode(hex).frames[0]).toMatchObject({
			response: { kind: "status", success: true, amount: 1000 },
		});
	});

	it("rejects malformed hex", () => {
		expect(() => handleDecode("FFF")).toThrow(
			'Hex string has an odd number of digits: "FFF"',
		);
	});
});

describe("parseMode", () => {
	it("defaults to status", () => {
		expect(parseMode(undefined)).toBe("status");
		expect(parseMode("balance")).toBe("balance");
	});

	it("rejects other modes", () => {
		expect(() => parseMode("credit")).toThrow(
			'--mode must be "status" or "balance" (got "credit")',
		);
	});
});
