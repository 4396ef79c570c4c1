import { toHexByte } from "@vmc-link/core";

export type VmcErrorKind =
	| "argument"
	| "connection"
	| "protocol"
	| "timeout"
	| "hardware"
	| "cancelled";

/**
 * Base class for every error raised by the VMC stack.
 * Narrow on `kind` rather than instanceof when errors cross package copies.
 */
export abstract class VmcError extends Error {
	abstract readonly kind: VmcErrorKind;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Invalid slot, amount, age or other argument, rejected before any I/O */
export class ArgumentError extends VmcError {
	readonly kind = "argument";
}

/** No open session with the board */
export class ConnectionError extends VmcError {
	readonly kind = "connection";
}

/** Malformed frame, bad checksum or header, failed send, unexpected reply */
export class ProtocolError extends VmcError {
	readonly kind = "protocol";
}

/** No reply within the command timeout */
export class TimeoutError extends VmcError {
	readonly kind = "timeout";

	constructor(
		readonly timeoutMs: number,
		message = `No response within ${timeoutMs}ms`,
	) {
		super(message);
	}
}

/** Known VMC fault codes */
export const FAULT_CODES = {
	SUCCESS: 0x01,
	MOTOR_FAILURE: 0x02,
	OPTICAL_EYE_FAILURE: 0x03,
} as const;

/**
 * Human-readable description of a fault code reported for a slot.
 */
export function describeFault(errorCode: number, slot: number): string {
	switch (errorCode) {
		case FAULT_CODES.MOTOR_FAILURE:
			return `Motor failure in slot ${slot}`;
		case FAULT_CODES.OPTICAL_EYE_FAILURE:
			return `Optical sensor failure in slot ${slot}`;
		default:
			return `Unknown fault ${toHexByte(errorCode)} in slot ${slot}`;
	}
}

/** The board reported a hardware fault for a slot */
export class HardwareFault extends VmcError {
	readonly kind = "hardware";

	constructor(
		readonly errorCode: number,
		readonly slot: number,
	) {
		super(describeFault(errorCode, slot));
	}
}

/** The caller aborted the operation */
export class CancelledError extends VmcError {
	readonly kind = "cancelled";
}

export function isVmcError(error: unknown): error is VmcError {
	return error instanceof VmcError;
}

/**
 * Message of any thrown value, for logs and displayable results.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
