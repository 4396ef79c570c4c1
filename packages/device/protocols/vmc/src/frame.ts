/**
 * VMC frame encoder/decoder
 *
 * Implements the link-layer format shared by every command:
 * [ADDR=0xFF][SEQ=0x00][HEADER][CMD][LEN][DATA...][CHK]
 *
 * Checksum: (HEADER + CMD + LEN + all DATA bytes) & 0xFF.
 * ADDR and SEQ are not part of the sum.
 */

import { formatHex, sum8, toHexByte } from "@vmc-link/core";
import { ArgumentError, ProtocolError } from "@vmc-link/device";
import {
	FRAME_ADDRESS,
	FRAME_SEQUENCE,
	type FrameHeader,
	MAX_PAYLOAD_LENGTH,
	MIN_FRAME_LENGTH,
} from "./constants.js";

/** A decoded frame. Payload is a copy, independent of the wire buffer. */
export interface VmcFrame {
	header: number;
	command: number;
	payload: Uint8Array;
	checksum: number;
}

/** Offset of the LEN byte; the payload starts right after it */
const LENGTH_OFFSET = 4;

/**
 * Calculate the frame checksum for a header, command and payload
 *
 * @returns The checksum byte (0x00-0xFF)
 */
export function calculateFrameChecksum(
	header: number,
	command: number,
	payload: ArrayLike<number>,
): number {
	return sum8([header, command, payload.length], payload);
}

/**
 * Encode a frame for transmission
 *
 * @param header - Direction marker, HOST for everything the host sends
 * @param command - Command code
 * @param payload - Command data (0-255 bytes)
 * @throws ArgumentError if the payload exceeds 255 bytes or holds non-byte values
 */
export function encodeFrame(
	header: FrameHeader,
	command: number,
	payload: ArrayLike<number> = [],
): Uint8Array {
	if (payload.length > MAX_PAYLOAD_LENGTH) {
		throw new ArgumentError(
			`Payload exceeds maximum length of ${MAX_PAYLOAD_LENGTH} bytes (got ${payload.length})`,
		);
	}

	for (let i = 0; i < payload.length; i++) {
		const byte = payload[i];
		if (byte === undefined || !Number.isInteger(byte) || byte < 0 || byte > 0xff) {
			throw new ArgumentError(`Payload byte ${i} is not a byte value: ${byte}`);
		}
	}

	const frame = new Uint8Array(MIN_FRAME_LENGTH + payload.length);
	frame[0] = FRAME_ADDRESS;
	frame[1] = FRAME_SEQUENCE;
	frame[2] = header;
	frame[3] = command;
	frame[LENGTH_OFFSET] = payload.length;
	frame.set(Array.from(payload), LENGTH_OFFSET + 1);
	frame[frame.length - 1] = calculateFrameChecksum(header, command, payload);

	return frame;
}

/**
 * Decode and validate one complete frame
 *
 * @param bytes - Exactly one frame as received from the wire
 * @throws ProtocolError if the frame is short, mis-addressed, its LEN byte
 * disagrees with the bytes present, or the checksum does not match
 */
export function decodeFrame(bytes: Uint8Array): VmcFrame {
	if (bytes.length < MIN_FRAME_LENGTH) {
		throw new ProtocolError(
			`Frame too short: ${bytes.length} bytes (minimum ${MIN_FRAME_LENGTH})`,
		);
	}

	const [address, sequence, header = 0, command = 0, length = 0] = bytes;

	if (address !== FRAME_ADDRESS || sequence !== FRAME_SEQUENCE) {
		throw new ProtocolError(
			`Invalid frame start: ${formatHex(bytes.subarray(0, 2))}`,
		);
	}

	if (bytes.length !== MIN_FRAME_LENGTH + length) {
		throw new ProtocolError(
			`Frame length mismatch: LEN declares ${length} payload bytes, frame carries ${bytes.length - MIN_FRAME_LENGTH}`,
		);
	}

	const payload = bytes.slice(LENGTH_OFFSET + 1, LENGTH_OFFSET + 1 + length);
	const checksum = bytes[bytes.length - 1] ?? 0;
	const expected = calculateFrameChecksum(header, command, payload);

	if (checksum !== expected) {
		throw new ProtocolError(
			`Checksum mismatch: expected ${toHexByte(expected)}, got ${toHexByte(checksum)}`,
		);
	}

	return { header, command, payload, checksum };
}

/**
 * Total length of the frame starting at offset, read from its LEN byte
 *
 * @returns Frame length in bytes, or undefined while the LEN byte has not arrived
 */
export function getFrameLength(
	buffer: Uint8Array,
	offset = 0,
): number | undefined {
	const length = buffer[offset + LENGTH_OFFSET];
	if (length === undefined) {
		return undefined;
	}
	return MIN_FRAME_LENGTH + length;
}

/**
 * Whether a complete frame's trailing byte matches its checksum. Only the
 * bytes are checked, not the header or sentinel.
 */
export function hasValidChecksum(frame: Uint8Array): boolean {
	const [, , header, command] = frame;
	const checksum = frame[frame.length - 1];
	if (header === undefined || command === undefined || frame.length < MIN_FRAME_LENGTH) {
		return false;
	}
	const payload = frame.subarray(LENGTH_OFFSET + 1, frame.length - 1);
	return checksum === calculateFrameChecksum(header, command, payload);
}

/**
 * Index of the next ADDR/SEQ sentinel pair at or after `from`
 *
 * A lone 0xFF in the last position counts as a possible start, since its
 * SEQ byte may still be in flight.
 *
 * @returns Index of the sentinel, or -1 when none is present
 */
export function findFrameStart(buffer: Uint8Array, from = 0): number {
	for (let i = from; i < buffer.length; i++) {
		if (buffer[i] !== FRAME_ADDRESS) {
			continue;
		}
		const next = buffer[i + 1];
		if (next === undefined || next === FRAME_SEQUENCE) {
			return i;
		}
	}
	return -1;
}

/**
 * Render a frame as hex for logs
 */
export function formatFrame(bytes: Uint8Array): string {
	return formatHex(bytes);
}
