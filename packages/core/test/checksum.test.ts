import { describe, expect, it } from "vitest";
import { sum8 } from "../src/checksum.js";

describe("sum8", () => {
	it("sums a single source", () => {
		expect(sum8([0x01, 0x02, 0x03])).toBe(0x06);
	});

	it("wraps at 0xFF", () => {
		expect(sum8([0xff, 0x01])).toBe(0x00);
		expect(sum8([0xff, 0xff])).toBe(0xfe);
	});

	it("sums across several sources", () => {
		// 0x55 + 0x41 + 0x02 + 0x03 + 0x01 = 0x9C
		expect(sum8([0x55, 0x41, 0x02], new Uint8Array([0x03, 0x01]))).toBe(0x9c);
	});

	it("returns zero for empty input", () => {
		expect(sum8()).toBe(0);
		expect(sum8(new Uint8Array([]))).toBe(0);
	});
});
