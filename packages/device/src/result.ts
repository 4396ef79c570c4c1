import type { VmcError } from "./errors.js";

/**
 * Outcome of a single-command primitive. Recoverable failures travel as
 * values so callers at the UI boundary never need try/catch.
 */
export type Result<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: VmcError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function fail<T = never>(error: VmcError): Result<T> {
	return { ok: false, error };
}
