/**
 * Fountain controller: the high-level entry point for a water fountain.
 *
 * Owns the engine and the lane manager. initialize() opens the line and
 * checks the board answers; dispense() picks a lane, falls back to other
 * lanes on failure and records every outcome.
 */

import { type Logger, silentLogger } from "@vmc-link/core";
import { DEFAULT_SERIAL_CONFIG, type SerialConfig } from "@vmc-link/device";
import {
	DEFAULT_FOUNTAIN_CONFIG,
	type FountainConfig,
	fountainConfigSchema,
	validate,
} from "./config.js";
import type { CommandOptions, VendingEngine } from "./engine.js";
import { LaneManager, type LaneStatusReport, type LaneStore } from "./lanes.js";
import { type DispenseResult, dispenseFailed } from "./results.js";

export const NOT_READY_MESSAGE = "Water fountain not ready. Please try again.";
export const ALL_LANES_UNAVAILABLE_MESSAGE =
	"All water lanes are currently unavailable. Please contact support.";

export interface FountainControllerOptions {
	config?: Partial<FountainConfig>;
	serial?: SerialConfig;
	/** Defaults to a manager over config.lanes */
	laneManager?: LaneManager;
	laneStore?: LaneStore;
	logger?: Logger;
}

export interface HealthCheckResult {
	success: boolean;
	message: string;
	details: string[];
}

export class FountainController {
	readonly config: Readonly<FountainConfig>;
	readonly lanes: LaneManager;

	private readonly engine: VendingEngine;
	private readonly serial: SerialConfig;
	private readonly logger: Logger;
	private initialized = false;
	private deviceIdValue: string | null = null;

	constructor(engine: VendingEngine, options: FountainControllerOptions = {}) {
		this.engine = engine;
		this.config = Object.freeze(
			validate(
				fountainConfigSchema,
				{
					autoClearFaults:
						options.config?.autoClearFaults ??
						DEFAULT_FOUNTAIN_CONFIG.autoClearFaults,
					lanes: options.config?.lanes ?? DEFAULT_FOUNTAIN_CONFIG.lanes,
				},
				"fountain config",
			),
		);
		this.serial = options.serial ?? DEFAULT_SERIAL_CONFIG;
		this.logger = (options.logger ?? silentLogger()).child({
			component: "fountain",
		});
		this.lanes =
			options.laneManager ??
			new LaneManager({
				lanes: this.config.lanes,
				store: options.laneStore,
				logger: options.logger,
			});
	}

	/** Device id read during initialize(), null before */
	get deviceId(): string | null {
		return this.deviceIdValue;
	}

	/**
	 * Connect, confirm the board answers GET_DEVICE_ID and, when configured,
	 * clear latched faults
	 *
	 * @returns false when the board cannot be reached
	 */
	async initialize(): Promise<boolean> {
		this.logger.debug({ config: this.config }, "initializing");

		const connected = await this.engine.connect(this.serial);
		if (!connected.ok) {
			this.logger.error({ err: connected.error }, "failed to connect");
			return false;
		}

		const deviceId = await this.engine.getDeviceId();
		if (!deviceId.ok) {
			this.logger.error({ err: deviceId.error }, "failed to read device id");
			return false;
		}

		this.deviceIdValue = deviceId.value;
		this.initialized = true;
		this.logger.info({ deviceId: deviceId.value }, "connected to fountain");

		if (this.config.autoClearFaults) {
			await this.clearFaults();
		}
		return true;
	}

	async shutdown(): Promise<void> {
		this.initialized = false;
		await this.engine.disconnect();
		this.logger.info("shut down");
	}

	isReady(): boolean {
		return this.initialized && this.engine.isConnected();
	}

	/**
	 * Dispense from the best lane, falling back to up to three other lanes
	 */
	async dispense(options: CommandOptions = {}): Promise<DispenseResult> {
		if (!this.isReady()) {
			this.logger.error("dispense requested before initialize()");
			return dispenseFailed(
				this.lanes.currentLane,
				0,
				"communication",
				NOT_READY_MESSAGE,
			);
		}

		const started = performance.now();
		const primary = this.lanes.getNextLane();

		let result = await this.attempt(primary, options);
		if (result.success || result.failureKind === "cancelled") {
			return result;
		}

		for (const lane of this.lanes.getFallbackLanes(primary)) {
			this.logger.info({ lane, failedLane: result.slot }, "trying fallback lane");
			result = await this.attempt(lane, options);
			if (result.success || result.failureKind === "cancelled") {
				return result;
			}
		}

		this.logger.error({ lane: primary }, "all lanes failed");
		return dispenseFailed(
			primary,
			Math.round(performance.now() - started),
			result.failureKind ?? "communication",
			ALL_LANES_UNAVAILABLE_MESSAGE,
			result.errorCode,
		);
	}

	/** Dispense from one slot, outside lane rotation, for maintenance */
	async testDispenser(slot: number, options: CommandOptions = {}): Promise<DispenseResult> {
		if (!this.isReady()) {
			return dispenseFailed(slot, 0, "communication", NOT_READY_MESSAGE);
		}
		return this.engine.dispenseWater(slot, options);
	}

	async clearFaults(): Promise<boolean> {
		if (!this.isReady()) {
			this.logger.error("cannot clear faults before initialize()");
			return false;
		}
		const result = await this.engine.clearFaults();
		if (result.ok && result.value) {
			this.logger.info("hardware faults cleared");
			return true;
		}
		this.logger.warn(
			{ err: result.ok ? undefined : result.error },
			"failed to clear faults",
		);
		return false;
	}

	/** One-line device status, null before initialize() */
	async deviceStatus(): Promise<string | null> {
		if (!this.isReady()) {
			return null;
		}
		const deviceId = await this.engine.getDeviceId();
		return deviceId.ok
			? `Connected: ${deviceId.value}`
			: `Error: ${deviceId.error.message}`;
	}

	laneReport(): LaneStatusReport {
		return this.lanes.getStatusReport();
	}

	/**
	 * Exercise the board and summarize lane health. Unusable lanes only fail
	 * the check when no lane is usable.
	 */
	async healthCheck(): Promise<HealthCheckResult> {
		if (!this.isReady()) {
			return {
				success: false,
				message: "Controller not initialized",
				details: ["Call initialize() first"],
			};
		}

		const details: string[] = [];
		let passed = true;

		const deviceId = await this.engine.getDeviceId();
		if (deviceId.ok) {
			details.push(`✓ Device ID: ${deviceId.value}`);
		} else {
			details.push(`✗ Device ID failed: ${deviceId.error.message}`);
			passed = false;
		}

		const cleared = await this.engine.clearFaults();
		if (cleared.ok && cleared.value) {
			details.push("✓ Fault clearing: OK");
		} else {
			details.push(
				`✗ Fault clearing failed: ${cleared.ok ? "board refused" : cleared.error.message}`,
			);
			passed = false;
		}

		const report = this.lanes.getStatusReport();
		details.push(`✓ Current Lane: ${report.currentLane}`);
		details.push(`✓ Usable Lanes: ${report.usableLanesCount}/${report.lanes.length}`);
		details.push(`✓ Total Dispenses: ${report.totalDispenses}`);
		if (report.usableLanesCount === 0) {
			passed = false;
		}

		return {
			success: passed,
			message: passed ? "All systems operational" : "Some issues detected",
			details,
		};
	}

	private async attempt(lane: number, options: CommandOptions): Promise<DispenseResult> {
		this.logger.info({ lane }, "dispensing");
		const result = await this.engine.dispenseWater(lane, options);

		if (result.success) {
			this.lanes.recordSuccess(lane, result.elapsedMs);
		} else if (result.failureKind !== "cancelled") {
			this.lanes.recordFailure(lane, result.errorCode, result.errorMessage);
		}
		return result;
	}
}
