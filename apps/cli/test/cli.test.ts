import { describe, expect, it } from "vitest";
import { runCli, USAGE } from "../src/cli.js";

const FAST = ["--command-timeout", "30", "--poll-interval", "1", "--max-poll-attempts", "4"];
const ENV = { VMC_LOG_LEVEL: "silent" };

async function run(argv: string[]) {
	const out: string[] = [];
	const err: string[] = [];
	const code = await runCli(
		argv,
		{ out: (text) => out.push(text), err: (text) => err.push(text) },
		{ env: ENV },
	);
	return { code, out, err };
}

function json(text: string | undefined): unknown {
	return JSON.parse(text ?? "null");
}

describe("runCli", () => {
	it("prints usage and fails without a command", async () => {
		const { code, out } = await run([]);

		expect(code).toBe(1);
		expect(out).toEqual([USAGE]);
	});

	it("prints usage for help", async () => {
		expect((await run(["help"])).code).toBe(0);
		expect((await run(["simulate", "--help"])).out).toEqual([USAGE]);
	});

	it("encodes a frame as JSON", async () => {
		const { code, out } = await run(["encode", "get-device-id"]);

		expect(code).toBe(0);
		expect(json(out[0])).toEqual({
			command: "get-device-id",
			code: "0x31",
			frame: "FF 00 55 31 01 AD 0C",
		});
	});

	it("joins hex split over several arguments", async () => {
		const { out } = await run(["decode", "FF", "00", "AA", "41", "02", "03", "01", "F1"]);

		expect(json(out[0])).toMatchObject({
			frames: [{ valid: true, label: "deliver" }],
		});
	});

	it("reports errors on stderr", async () => {
		const { code, out, err } = await run(["decode", "F"]);

		expect(code).toBe(1);
		expect(out).toEqual([]);
		expect(err).toEqual(['Error: Hex string has an odd number of digits: "F"']);
	});

	it("rejects unknown commands", async () => {
		expect((await run(["frobnicate"])).err).toEqual([
			"Error: Unknown command: frobnicate",
		]);
	});

	it("exits 0 after a successful simulated dispense", async () => {
		const { code, out } = await run(["simulate", "3", ...FAST]);

		expect(code).toBe(0);
		expect(json(out[0])).toMatchObject({ result: { success: true, slot: 3 } });
	});

	it("exits 1 after a failed simulated dispense", async () => {
		const { code, out } = await run(["simulate", "3", "--fault", "motor", ...FAST]);

		expect(code).toBe(1);
		expect(json(out[0])).toMatchObject({
			result: { success: false, errorCode: 2 },
		});
	});

	it("surfaces configuration errors", async () => {
		const { code, err } = await run(["simulate", "3", "--baud-rate", "300"]);

		expect(code).toBe(1);
		expect(err).toEqual([
			"Error: Invalid serial config: baudRate: Number must be greater than or equal to 9600",
		]);
	});

	it("runs the fountain on a faulty first lane", async () => {
		const { code, out } = await run([
			"fountain",
			"1",
			"--fault",
			"motor",
			"--fault-slot",
			"1",
			...FAST,
		]);

		expect(code).toBe(0);
		expect(json(out[0])).toMatchObject({ results: [{ success: true, slot: 2 }] });
	});
});
