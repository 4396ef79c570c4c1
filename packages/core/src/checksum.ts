/**
 * Additive 8-bit checksum: sum of all bytes, truncated to the low byte.
 *
 * Several byte sources can be passed at once so callers can checksum a
 * header and a payload without concatenating them first.
 *
 * @example
 * sum8([0x55, 0x41, 0x02], new Uint8Array([0x03, 0x01])); // 0x9C
 */
export function sum8(...sources: ArrayLike<number>[]): number {
	let sum = 0;
	for (const source of sources) {
		for (let i = 0; i < source.length; i++) {
			sum += source[i] ?? 0;
		}
	}
	return sum & 0xff;
}
