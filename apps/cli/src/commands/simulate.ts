/**
 * simulate: dispense against the in-process board simulator
 */

import { type Logger, toHexByte } from "@vmc-link/core";
import { ArgumentError, ConnectionError } from "@vmc-link/device";
import { commandLabel } from "@vmc-link/device-protocol-vmc";
import {
	type SimulatedFault,
	SimulatedVmcTransport,
} from "@vmc-link/device-transport-simulator";
import {
	type DispenseResult,
	FaultRecoveryPolicy,
	VendingEngine,
	type VmcConfig,
} from "@vmc-link/engine";
import { parseInteger } from "../args.js";

export interface SimulateOptions {
	slot: number;
	fault?: SimulatedFault;
	/** Keep the fault through REMOVE_FAULT */
	persistent?: boolean;
	/** Status polls the board leaves unanswered */
	busyPolls?: number;
	/** Clear-and-retry rounds after a hardware fault */
	retries?: number;
}

export interface SimulateReport {
	result: DispenseResult;
	attempts: number;
	/** Commands the board received, in order */
	exchanges: string[];
	faultClears: number;
}

/**
 * Parse a fault name or numeric code
 */
export function parseFault(text: string): SimulatedFault {
	if (text === "motor" || text === "optical") {
		return text;
	}
	const code = parseInteger(text, "--fault");
	if (code < 0 || code > 0xff) {
		throw new ArgumentError(`--fault code must fit in a byte (got ${code})`);
	}
	return code;
}

/** Open a simulated board with an engine over it */
export async function openSimulator(
	config: VmcConfig,
	logger: Logger,
	board: SimulatedVmcTransport,
): Promise<VendingEngine> {
	const engine = new VendingEngine(board, { config: config.engine, logger });
	const connected = await engine.connect(config.serial);
	if (!connected.ok) {
		throw new ConnectionError(connected.error.message, { cause: connected.error });
	}
	return engine;
}

export function describeExchanges(board: SimulatedVmcTransport): string[] {
	return board.received.map(
		(frame) => commandLabel(frame.command) ?? toHexByte(frame.command),
	);
}

export async function handleSimulate(
	options: SimulateOptions,
	config: VmcConfig,
	logger: Logger,
): Promise<SimulateReport> {
	const retries = options.retries ?? 0;
	const board = new SimulatedVmcTransport({ busyPolls: options.busyPolls ?? 0 });
	if (options.fault !== undefined) {
		board.injectFault(options.slot, options.fault, {
			persistent: options.persistent ?? false,
		});
	}

	const engine = await openSimulator(config, logger, board);
	try {
		let result: DispenseResult;
		let attempts = 1;
		if (retries > 0) {
			const recovered = await new FaultRecoveryPolicy(engine, {
				maxRetries: retries,
				logger,
			}).dispense(options.slot);
			result = recovered;
			attempts = recovered.attempts;
		} else {
			result = await engine.dispenseWater(options.slot);
		}

		return {
			result,
			attempts,
			exchanges: describeExchanges(board),
			faultClears: board.faultClears,
		};
	} finally {
		await engine.disconnect();
	}
}
