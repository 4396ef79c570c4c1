import {
	encodeFrame,
	FrameHeader,
	VMC_COMMANDS,
} from "@vmc-link/device-protocol-vmc";
import type { EngineConfig } from "../src/config.js";

export const FAST_CONFIG: EngineConfig = {
	commandTimeoutMs: 50,
	pollIntervalMs: 5,
	maxPollAttempts: 3,
};

/** A board reply frame */
export function reply(command: number, payload: number[] = []): Uint8Array {
	return encodeFrame(FrameHeader.DEVICE, command, payload);
}

export function ascii(text: string): number[] {
	return Array.from(text, (c) => c.charCodeAt(0));
}

export const deliveryEcho = (slot: number) =>
	reply(VMC_COMMANDS.DELIVER, [slot, 1]);

export const statusReply = (code: number) =>
	reply(VMC_COMMANDS.QUERY_STATUS, [code]);

/** Command byte of every recorded host frame */
export function commandsOf(frames: readonly Uint8Array[]): number[] {
	return frames.map((frame) => frame[3] ?? -1);
}
