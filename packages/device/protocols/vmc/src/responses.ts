/**
 * Response decoder: turns a validated board frame into a typed response.
 */

import { decodeUint32LE, toHexByte } from "@vmc-link/core";
import {
	DEVICE_ID_LENGTH,
	STATUS_SUCCESS,
	VMC_COMMANDS,
} from "./constants.js";
import type { VmcFrame } from "./frame.js";

/** Decoded board reply, discriminated on `kind` */
export type VmcResponse =
	| { kind: "device-id"; deviceId: string }
	| { kind: "delivery"; slot: number; quantity: number }
	| { kind: "status"; success: boolean; errorCode?: number; amount?: number }
	| { kind: "balance"; amount: number }
	| { kind: "payment"; success: boolean }
	| { kind: "simple"; success: boolean }
	| { kind: "coin-change-status"; canRefund: boolean }
	| { kind: "age-verification"; verified: boolean }
	| { kind: "error"; message: string };

export type VmcResponseKind = VmcResponse["kind"];

/** Narrow VmcResponse to one variant */
export type ResponseOf<K extends VmcResponseKind> = Extract<
	VmcResponse,
	{ kind: K }
>;

/**
 * How to read a 0xE1 reply. The board answers both the status and the
 * balance query under the same code, so the caller picks.
 */
export type SharedCodeMode = "status" | "balance";

function error(message: string): VmcResponse {
	return { kind: "error", message };
}

function successByte(payload: Uint8Array): boolean {
	return payload[0] === STATUS_SUCCESS;
}

function decodeStatus(payload: Uint8Array): VmcResponse {
	if (payload.length === 1) {
		const status = payload[0] ?? 0;
		return status === STATUS_SUCCESS
			? { kind: "status", success: true }
			: { kind: "status", success: false, errorCode: status };
	}
	if (payload.length === 4) {
		// Payment-completed form: the status reply carries the amount taken
		return { kind: "status", success: true, amount: decodeUint32LE(payload) };
	}
	return error(`Invalid status response length: ${payload.length}`);
}

function decodeBalance(payload: Uint8Array): VmcResponse {
	if (payload.length !== 4) {
		return error(`Invalid balance response length: ${payload.length}`);
	}
	return { kind: "balance", amount: decodeUint32LE(payload) };
}

/**
 * Decode a board reply by its command byte
 *
 * @param frame - A frame that already passed decodeFrame()
 * @param mode - Reading of the shared 0xE1 code @default "status"
 * @returns A response variant; malformed payloads and unknown commands
 * come back as `{ kind: "error" }`
 */
export function decodeResponse(
	frame: VmcFrame,
	mode: SharedCodeMode = "status",
): VmcResponse {
	const { command, payload } = frame;

	switch (command) {
		case VMC_COMMANDS.GET_DEVICE_ID:
			if (payload.length !== DEVICE_ID_LENGTH) {
				return error(`Invalid device ID response length: ${payload.length}`);
			}
			return { kind: "device-id", deviceId: String.fromCharCode(...payload) };

		case VMC_COMMANDS.DELIVER: {
			const [slot, quantity] = payload;
			if (payload.length !== 2 || slot === undefined || quantity === undefined) {
				return error(`Invalid delivery response length: ${payload.length}`);
			}
			return { kind: "delivery", slot, quantity };
		}

		// QUERY_BALANCE shares this code
		case VMC_COMMANDS.QUERY_STATUS:
			return mode === "balance" ? decodeBalance(payload) : decodeStatus(payload);

		case VMC_COMMANDS.PAYMENT_INSTRUCTION:
			return { kind: "payment", success: successByte(payload) };

		case VMC_COMMANDS.REMOVE_FAULT:
		case VMC_COMMANDS.COIN_CHANGE:
		case VMC_COMMANDS.CASHLESS_CANCEL:
		case VMC_COMMANDS.DEBIT_INSTRUCTION:
		case VMC_COMMANDS.AGE_RECOGNITION:
			return { kind: "simple", success: successByte(payload) };

		case VMC_COMMANDS.QUERY_COIN_CHANGE_STATUS:
			if (payload.length !== 1) {
				return error(
					`Invalid coin change status response length: ${payload.length}`,
				);
			}
			return { kind: "coin-change-status", canRefund: payload[0] === 0x00 };

		case VMC_COMMANDS.QUERY_AGE_VERIFICATION:
			if (payload.length !== 1) {
				return error(
					`Invalid age verification response length: ${payload.length}`,
				);
			}
			return { kind: "age-verification", verified: payload[0] === 0x01 };

		default:
			return error(`unknown command response: ${toHexByte(command)}`);
	}
}
