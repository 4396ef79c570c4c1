/**
 * encode: build a host frame from a command name and its arguments
 */

import { formatHex, toHexByte } from "@vmc-link/core";
import { ArgumentError } from "@vmc-link/device";
import { PAYMENT_METHODS, VmcCommandBuilder } from "@vmc-link/device-protocol-vmc";
import { parseInteger, requirePositional } from "../args.js";

export interface EncodeReport {
	command: string;
	code: string;
	frame: string;
}

interface Encoder {
	usage: string;
	encode(args: readonly string[]): Uint8Array;
}

const METHOD_NAMES: ReadonlyMap<string, number> = new Map([
	["cancel", PAYMENT_METHODS.CANCEL],
	["coin", PAYMENT_METHODS.COIN],
	["cashless", PAYMENT_METHODS.CASHLESS],
	["bill", PAYMENT_METHODS.BILL_ACCEPTOR],
]);

function arg(args: readonly string[], index: number, name: string): number {
	return parseInteger(requirePositional(args, index, name), name);
}

function optionalArg(args: readonly string[], index: number, name: string): number | undefined {
	const text = args[index];
	return text === undefined ? undefined : parseInteger(text, name);
}

function paymentMethod(args: readonly string[], index: number): number {
	const text = requirePositional(args, index, "method");
	return METHOD_NAMES.get(text.toLowerCase()) ?? parseInteger(text, "method");
}

export const ENCODERS: ReadonlyMap<string, Encoder> = new Map<string, Encoder>([
	[
		"get-device-id",
		{
			usage: "get-device-id",
			encode: () => VmcCommandBuilder.getDeviceId(),
		},
	],
	[
		"deliver",
		{
			usage: "deliver <slot> [quantity]",
			encode: (args) =>
				VmcCommandBuilder.deliver(arg(args, 0, "slot"), optionalArg(args, 1, "quantity")),
		},
	],
	[
		"remove-fault",
		{
			usage: "remove-fault",
			encode: () => VmcCommandBuilder.removeFault(),
		},
	],
	[
		"query-status",
		{
			usage: "query-status <slot> [quantity]",
			encode: (args) =>
				VmcCommandBuilder.queryStatus(arg(args, 0, "slot"), optionalArg(args, 1, "quantity")),
		},
	],
	[
		"query-balance",
		{
			usage: "query-balance",
			encode: () => VmcCommandBuilder.queryBalance(),
		},
	],
	[
		"payment",
		{
			usage: "payment <amount-cents> <cancel|coin|cashless|bill> <slot>",
			encode: (args) =>
				VmcCommandBuilder.paymentInstruction(
					arg(args, 0, "amount-cents"),
					paymentMethod(args, 1),
					arg(args, 2, "slot"),
				),
		},
	],
	[
		"coin-change",
		{
			usage: "coin-change",
			encode: () => VmcCommandBuilder.coinChange(),
		},
	],
	[
		"cashless-cancel",
		{
			usage: "cashless-cancel",
			encode: () => VmcCommandBuilder.cashlessCancel(),
		},
	],
	[
		"debit",
		{
			usage: "debit <amount-cents>",
			encode: (args) => VmcCommandBuilder.debitInstruction(arg(args, 0, "amount-cents")),
		},
	],
	[
		"age-recognition",
		{
			usage: "age-recognition <age>",
			encode: (args) => VmcCommandBuilder.ageRecognition(arg(args, 0, "age")),
		},
	],
	[
		"query-coin-change-status",
		{
			usage: "query-coin-change-status",
			encode: () => VmcCommandBuilder.queryCoinChangeStatus(),
		},
	],
	[
		"query-age-verification",
		{
			usage: "query-age-verification",
			encode: () => VmcCommandBuilder.queryAgeVerification(),
		},
	],
]);

/**
 * @param name - Command name, e.g. "deliver"
 * @param args - Its arguments as typed
 * @throws ArgumentError for unknown commands and bad arguments
 */
export function handleEncode(name: string, args: readonly string[]): EncodeReport {
	const encoder = ENCODERS.get(name);
	if (!encoder) {
		throw new ArgumentError(
			`Unknown command: ${name} (expected one of ${[...ENCODERS.keys()].join(", ")})`,
		);
	}

	const frame = encoder.encode(args);
	return {
		command: name,
		code: toHexByte(frame[3] ?? 0),
		frame: formatHex(frame),
	};
}
