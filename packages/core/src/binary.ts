/**
 * Endianness for multi-byte values
 * - "le" = little-endian (least significant byte first)
 * - "be" = big-endian (most significant byte first)
 */
export type Endianness = "le" | "be";

/** Largest value an unsigned 32-bit field can carry */
export const UINT32_MAX = 0xffffffff;

/**
 * Decode an unsigned 32-bit integer from a buffer at the given offset
 *
 * @param buffer - The buffer to read from
 * @param offset - Byte offset in the buffer
 * @param endian - Byte order @default "le"
 * @throws Error if fewer than 4 bytes are available at offset
 *
 * @example
 * decodeUint32(new Uint8Array([0xe8, 0x03, 0x00, 0x00]), 0); // 1000
 */
export function decodeUint32(
	buffer: Uint8Array,
	offset = 0,
	endian: Endianness = "le",
): number {
	if (offset < 0 || offset + 4 > buffer.length) {
		throw new Error(
			`Offset ${offset} out of bounds for buffer of length ${buffer.length}`,
		);
	}

	const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
	return view.getUint32(offset, endian === "le");
}

/**
 * Encode an unsigned 32-bit integer into 4 bytes
 *
 * @throws RangeError if value is not an integer in 0..UINT32_MAX
 */
export function encodeUint32(
	value: number,
	endian: Endianness = "le",
): Uint8Array {
	if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
		throw new RangeError(`Value ${value} does not fit in an unsigned 32-bit field`);
	}

	const bytes = new Uint8Array(4);
	new DataView(bytes.buffer).setUint32(0, value, endian === "le");
	return bytes;
}

/** Little-endian shorthand used by every multi-byte field on the VMC wire */
export function decodeUint32LE(buffer: Uint8Array, offset = 0): number {
	return decodeUint32(buffer, offset, "le");
}

export function encodeUint32LE(value: number): Uint8Array {
	return encodeUint32(value, "le");
}

/**
 * Format a single byte as `0xNN`
 */
export function toHexByte(value: number): string {
	return `0x${(value & 0xff).toString(16).padStart(2, "0").toUpperCase()}`;
}

/**
 * Render bytes as space-separated uppercase hex pairs, e.g. `FF 00 55 31`
 */
export function formatHex(bytes: Uint8Array): string {
	return Array.from(bytes, (b) =>
		b.toString(16).padStart(2, "0").toUpperCase(),
	).join(" ");
}

/**
 * Parse a hex string into bytes. Whitespace, `0x` prefixes, `:` and `,`
 * separators are ignored, so `"FF 00 55"`, `"ff0055"` and
 * `"0xFF,0x00,0x55"` all decode to the same three bytes.
 *
 * @throws Error on odd digit counts or non-hex characters
 */
export function parseHex(text: string): Uint8Array {
	const digits = text.replace(/0x/gi, "").replace(/[\s:,]/g, "");
	if (digits.length % 2 !== 0) {
		throw new Error(`Hex string has an odd number of digits: "${text}"`);
	}
	if (!/^[0-9a-fA-F]*$/.test(digits)) {
		throw new Error(`Hex string contains non-hex characters: "${text}"`);
	}

	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}
