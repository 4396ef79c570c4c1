/**
 * Why a dispense failed:
 * - `hardware`: the board reported a fault code for the slot
 * - `communication`: the delivery step or the line itself failed
 * - `timeout`: every status poll went by without an outcome
 * - `cancelled`: the caller aborted
 * - `argument`: the slot was rejected before any I/O
 */
export type DispenseFailureKind =
	| "hardware"
	| "communication"
	| "timeout"
	| "cancelled"
	| "argument";

/** Outcome of one dispense. Frozen; produced once per call. */
export interface DispenseResult {
	readonly success: boolean;
	readonly slot: number;
	/** Board fault code, present on hardware failures */
	readonly errorCode?: number;
	/** Displayable message, present on every failure */
	readonly errorMessage?: string;
	readonly failureKind?: DispenseFailureKind;
	readonly elapsedMs: number;
}

export function dispenseSucceeded(
	slot: number,
	elapsedMs: number,
): DispenseResult {
	return Object.freeze({ success: true, slot, elapsedMs });
}

export function dispenseFailed(
	slot: number,
	elapsedMs: number,
	failureKind: DispenseFailureKind,
	errorMessage: string,
	errorCode?: number,
): DispenseResult {
	return Object.freeze({
		success: false,
		slot,
		elapsedMs,
		failureKind,
		errorMessage,
		...(errorCode !== undefined ? { errorCode } : {}),
	});
}
