/**
 * decode: split hex into frames and decode each one
 */

import { formatHex, parseHex, toHexByte } from "@vmc-link/core";
import { ArgumentError, errorMessage } from "@vmc-link/device";
import {
	commandLabel,
	decodeFrame,
	decodeResponse,
	FrameAssembler,
	FrameHeader,
	type SharedCodeMode,
	type VmcResponse,
} from "@vmc-link/device-protocol-vmc";

export type FrameReport =
	| {
			valid: true;
			frame: string;
			direction: "host" | "device" | "unknown";
			command: string;
			label: string | null;
			payload: string;
			/** Decoded reply, for board frames only */
			response?: VmcResponse;
	  }
	| { valid: false; frame: string; error: string };

export interface DecodeReport {
	frames: FrameReport[];
	/** Noise dropped ahead of frame starts */
	discardedBytes: number;
	/** Bytes of an unfinished frame at the end of the input */
	trailingBytes: number;
}

function direction(header: number): "host" | "device" | "unknown" {
	switch (header) {
		case FrameHeader.HOST:
			return "host";
		case FrameHeader.DEVICE:
			return "device";
		default:
			return "unknown";
	}
}

function reportFrame(bytes: Uint8Array, mode: SharedCodeMode): FrameReport {
	const frame = formatHex(bytes);
	try {
		const decoded = decodeFrame(bytes);
		const side = direction(decoded.header);
		return {
			valid: true,
			frame,
			direction: side,
			command: toHexByte(decoded.command),
			label: commandLabel(decoded.command) ?? null,
			payload: formatHex(decoded.payload),
			...(side === "device" ? { response: decodeResponse(decoded, mode) } : {}),
		};
	} catch (error) {
		return { valid: false, frame, error: errorMessage(error) };
	}
}

export function parseMode(text: string | undefined): SharedCodeMode {
	if (text === undefined || text === "status" || text === "balance") {
		return text ?? "status";
	}
	throw new ArgumentError(`--mode must be "status" or "balance" (got "${text}")`);
}

/**
 * Decode every frame found in a hex string
 *
 * @param hex - Bytes as hex; separators and 0x prefixes are ignored
 * @param mode - Reading of 0xE1 replies
 */
export function handleDecode(hex: string, mode: SharedCodeMode = "status"): DecodeReport {
	const assembler = new FrameAssembler();
	const frames = assembler.push(parseHex(hex)).map((bytes) => reportFrame(bytes, mode));

	return {
		frames,
		discardedBytes: assembler.discardedBytes,
		trailingBytes: assembler.pending,
	};
}
