/**
 * fountain: run the fountain controller against the simulator
 */

import type { Logger } from "@vmc-link/core";
import { ArgumentError, ConnectionError } from "@vmc-link/device";
import {
	type SimulatedFault,
	SimulatedVmcTransport,
} from "@vmc-link/device-transport-simulator";
import {
	type DispenseResult,
	FountainController,
	type HealthCheckResult,
	JsonFileLaneStore,
	type LaneStatusReport,
	VendingEngine,
	type VmcConfig,
} from "@vmc-link/engine";

export interface FountainOptions {
	/** Dispenses to run */
	count: number;
	/** Persistent faults keyed by slot */
	faults?: ReadonlyMap<number, SimulatedFault>;
	/** JSON file lane state is loaded from and saved to */
	laneStatePath?: string;
}

export interface FountainReport {
	deviceId: string | null;
	results: DispenseResult[];
	lanes: LaneStatusReport;
	health: HealthCheckResult;
}

export async function handleFountain(
	options: FountainOptions,
	config: VmcConfig,
	logger: Logger,
): Promise<FountainReport> {
	if (!Number.isInteger(options.count) || options.count < 1) {
		throw new ArgumentError(`count must be a positive integer (got ${options.count})`);
	}

	const board = new SimulatedVmcTransport();
	for (const [slot, fault] of options.faults ?? []) {
		board.injectFault(slot, fault, { persistent: true });
	}

	const engine = new VendingEngine(board, { config: config.engine, logger });
	const fountain = new FountainController(engine, {
		config: config.fountain,
		serial: config.serial,
		laneStore:
			options.laneStatePath === undefined
				? undefined
				: new JsonFileLaneStore({ path: options.laneStatePath, logger }),
		logger,
	});

	if (!(await fountain.initialize())) {
		throw new ConnectionError("Simulated fountain failed to initialize");
	}

	try {
		const results: DispenseResult[] = [];
		for (let i = 0; i < options.count; i++) {
			results.push(await fountain.dispense());
		}
		return {
			deviceId: fountain.deviceId,
			results,
			lanes: fountain.laneReport(),
			health: await fountain.healthCheck(),
		};
	} finally {
		await fountain.shutdown();
	}
}
