/**
 * Command catalog: one builder per VMC command.
 *
 * Builders validate their arguments and throw ArgumentError before anything
 * reaches the wire. Every builder returns a complete host frame.
 */

import { encodeUint32LE, UINT32_MAX } from "@vmc-link/core";
import { ArgumentError } from "@vmc-link/device";
import {
	BROADCAST,
	DEVICE_ID_MARKER,
	FrameHeader,
	PAYMENT_METHODS,
	QUERY_MARKER,
	VMC_COMMANDS,
} from "./constants.js";
import { encodeFrame } from "./frame.js";

const PAYMENT_METHOD_CODES: ReadonlySet<number> = new Set(
	Object.values(PAYMENT_METHODS),
);

function requireInteger(name: string, value: number, min: number, max: number): void {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new ArgumentError(
			`${name} must be an integer between ${min} and ${max} (got ${value})`,
		);
	}
}

/** Slot numbers address a cargo lane, 1-255 */
export function validateSlot(slot: number): void {
	requireInteger("Slot", slot, 1, 0xff);
}

export function validateQuantity(quantity: number): void {
	requireInteger("Quantity", quantity, 1, 0xff);
}

/** Amounts are integer cents carried in an unsigned 32-bit field */
export function validateAmount(amountCents: number): void {
	requireInteger("Amount", amountCents, 0, UINT32_MAX);
}

/** Required age lies strictly between 0 and 100 */
export function validateAge(requiredAge: number): void {
	requireInteger("Required age", requiredAge, 1, 99);
}

function host(command: number, payload: ArrayLike<number>): Uint8Array {
	return encodeFrame(FrameHeader.HOST, command, payload);
}

export function getDeviceId(): Uint8Array {
	return host(VMC_COMMANDS.GET_DEVICE_ID, [DEVICE_ID_MARKER]);
}

/**
 * Trigger a delivery from a cargo lane
 *
 * @param slot - Cargo lane, 1-255
 * @param quantity - Units to deliver, normally 1
 */
export function deliver(slot: number, quantity = 1): Uint8Array {
	validateSlot(slot);
	validateQuantity(quantity);
	return host(VMC_COMMANDS.DELIVER, [slot, quantity]);
}

export function removeFault(): Uint8Array {
	return host(VMC_COMMANDS.REMOVE_FAULT, [BROADCAST]);
}

/**
 * Ask how a delivery on a slot went. Shares its code with queryBalance().
 */
export function queryStatus(slot: number, quantity = 1): Uint8Array {
	validateSlot(slot);
	validateQuantity(quantity);
	return host(VMC_COMMANDS.QUERY_STATUS, [slot, quantity]);
}

export function queryBalance(): Uint8Array {
	return host(VMC_COMMANDS.QUERY_BALANCE, [0x00, 0x00, 0x00, 0x00]);
}

/**
 * Payload: [amount LE32][method][slot]
 *
 * @param amountCents - Price in cents
 * @param method - One of PAYMENT_METHODS
 * @param slot - Lane the payment is for
 */
export function paymentInstruction(
	amountCents: number,
	method: number,
	slot: number,
): Uint8Array {
	validateAmount(amountCents);
	if (!PAYMENT_METHOD_CODES.has(method)) {
		throw new ArgumentError(`Unknown payment method: ${method}`);
	}
	validateSlot(slot);
	return host(VMC_COMMANDS.PAYMENT_INSTRUCTION, [
		...encodeUint32LE(amountCents),
		method,
		slot,
	]);
}

export function coinChange(): Uint8Array {
	return host(VMC_COMMANDS.COIN_CHANGE, [BROADCAST]);
}

export function cashlessCancel(): Uint8Array {
	return host(VMC_COMMANDS.CASHLESS_CANCEL, [BROADCAST]);
}

export function debitInstruction(amountCents: number): Uint8Array {
	validateAmount(amountCents);
	return host(VMC_COMMANDS.DEBIT_INSTRUCTION, encodeUint32LE(amountCents));
}

export function ageRecognition(requiredAge: number): Uint8Array {
	validateAge(requiredAge);
	return host(VMC_COMMANDS.AGE_RECOGNITION, [requiredAge]);
}

export function queryCoinChangeStatus(): Uint8Array {
	return host(VMC_COMMANDS.QUERY_COIN_CHANGE_STATUS, [QUERY_MARKER]);
}

export function queryAgeVerification(): Uint8Array {
	return host(VMC_COMMANDS.QUERY_AGE_VERIFICATION, [QUERY_MARKER]);
}
