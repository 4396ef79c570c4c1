/**
 * Lane manager: picks the lane to dispense from.
 *
 * Tracks per-lane status and counters, rotates lanes every
 * LOAD_BALANCE_THRESHOLD successes so one lane does not empty early, and
 * offers fallback lanes when the current one fails.
 */

import { type Logger, silentLogger } from "@vmc-link/core";
import { FAULT_CODES } from "@vmc-link/device";
import { slotsInRow } from "./slots.js";

export type LaneStatus = "active" | "empty" | "failed" | "disabled";

/** Consecutive failures after which a lane is taken out of rotation */
export const MAX_CONSECUTIVE_FAILURES = 3;

/** Successful dispenses between load-balancing lane switches */
export const LOAD_BALANCE_THRESHOLD = 10;

/** Fallback lanes offered after a failure */
export const MAX_FALLBACK_LANES = 3;

export interface LaneRecord {
	status: LaneStatus;
	/** Consecutive failures; a success resets it */
	failures: number;
	successes: number;
}

export interface LaneSnapshot {
	currentLane: number;
	totalDispenses: number;
	lanes: Record<number, LaneRecord>;
}

/** Where lane state lives between runs */
export interface LaneStore {
	read(): LaneSnapshot | undefined;
	write(snapshot: LaneSnapshot): void;
}

/** Keeps the snapshot in memory; state is lost with the process */
export class MemoryLaneStore implements LaneStore {
	private snapshot: LaneSnapshot | undefined;

	constructor(initial?: LaneSnapshot) {
		this.snapshot = initial ? structuredClone(initial) : undefined;
	}

	read(): LaneSnapshot | undefined {
		return this.snapshot ? structuredClone(this.snapshot) : undefined;
	}

	write(snapshot: LaneSnapshot): void {
		this.snapshot = structuredClone(snapshot);
	}
}

export interface LaneInfo {
	lane: number;
	status: LaneStatus;
	failureCount: number;
	successCount: number;
	isUsable: boolean;
}

export interface LaneStatusReport {
	currentLane: number;
	totalDispenses: number;
	lanes: LaneInfo[];
	usableLanesCount: number;
}

export interface LaneManagerOptions {
	/** Lanes in rotation order. @default the first cabinet row, 1-8 */
	lanes?: readonly number[];
	store?: LaneStore;
	logger?: Logger;
}

function freshRecord(): LaneRecord {
	return { status: "active", failures: 0, successes: 0 };
}

const STATUS_TEXT: Record<LaneStatus, string> = {
	active: "Active",
	empty: "Empty",
	failed: "Failed",
	disabled: "Disabled",
};

export class LaneManager {
	readonly lanes: readonly number[];

	private readonly store: LaneStore;
	private readonly logger: Logger;
	private state: LaneSnapshot;

	constructor(options: LaneManagerOptions = {}) {
		const lanes = options.lanes ?? slotsInRow(1);
		if (lanes.length === 0) {
			throw new RangeError("LaneManager needs at least one lane");
		}
		this.lanes = Object.freeze([...lanes]);
		this.store = options.store ?? new MemoryLaneStore();
		this.logger = (options.logger ?? silentLogger()).child({
			component: "lanes",
		});
		this.state = this.load();
	}

	/** Lane the next dispense starts from, without rotating */
	get currentLane(): number {
		return this.state.currentLane;
	}

	/**
	 * Best lane for the next dispense. Stays on the current lane while it is
	 * usable, except for a load-balancing switch every
	 * LOAD_BALANCE_THRESHOLD successes.
	 */
	getNextLane(): number {
		const current = this.state.currentLane;

		if (this.isLaneUsable(current)) {
			if (this.shouldSwitchForLoadBalancing(current)) {
				const next = this.findNextAvailableLane(current);
				if (next !== current) {
					this.logger.info({ from: current, to: next }, "load-balancing lane switch");
					this.setCurrentLane(next);
					return next;
				}
			}
			return current;
		}

		const next = this.findNextAvailableLane(current);
		if (next !== current) {
			this.logger.info({ from: current, to: next }, "lane not usable, switching");
			this.setCurrentLane(next);
		}
		return next;
	}

	/**
	 * Usable lanes to try after `excludeLane` failed, fewest failures first
	 */
	getFallbackLanes(excludeLane: number): number[] {
		return this.lanes
			.filter((lane) => lane !== excludeLane && this.isLaneUsable(lane))
			.sort((a, b) => this.record(a).failures - this.record(b).failures)
			.slice(0, MAX_FALLBACK_LANES);
	}

	recordSuccess(lane: number, elapsedMs?: number): void {
		const record = this.record(lane);
		record.failures = 0;
		record.successes++;
		record.status = "active";
		this.state.totalDispenses++;
		this.save();
		this.logger.debug(
			{ lane, elapsedMs, successes: record.successes },
			"lane success",
		);
	}

	/**
	 * Count a failure. An optical fault means the lane ran dry; motor and
	 * other faults take the lane out after MAX_CONSECUTIVE_FAILURES.
	 */
	recordFailure(lane: number, errorCode?: number, errorMessage?: string): void {
		const record = this.record(lane);
		record.failures++;
		this.logger.warn(
			{ lane, errorCode, errorMessage, failures: record.failures },
			"lane failure",
		);

		if (errorCode === FAULT_CODES.OPTICAL_EYE_FAILURE) {
			record.status = "empty";
			this.logger.warn({ lane }, "lane marked empty");
		} else if (record.failures >= MAX_CONSECUTIVE_FAILURES) {
			record.status = "failed";
			this.logger.warn({ lane }, "lane disabled after repeated failures");
		}
		this.save();
	}

	isLaneUsable(lane: number): boolean {
		if (!this.lanes.includes(lane)) {
			return false;
		}
		const record = this.record(lane);
		return record.status === "active" && record.failures < MAX_CONSECUTIVE_FAILURES;
	}

	/** Take a lane out of rotation until it is reset */
	disableLane(lane: number): void {
		this.record(lane).status = "disabled";
		this.save();
		this.logger.info({ lane }, "lane disabled");
	}

	/** Return a lane to service, e.g. after a refill */
	resetLane(lane: number): void {
		const record = this.record(lane);
		record.status = "active";
		record.failures = 0;
		this.save();
		this.logger.info({ lane }, "lane reset");
	}

	resetAllLanes(): void {
		this.state = this.initialState();
		this.save();
		this.logger.info("all lanes reset");
	}

	getStatusReport(): LaneStatusReport {
		const lanes = this.lanes.map((lane): LaneInfo => {
			const record = this.record(lane);
			return {
				lane,
				status: record.status,
				failureCount: record.failures,
				successCount: record.successes,
				isUsable: this.isLaneUsable(lane),
			};
		});

		return {
			currentLane: this.state.currentLane,
			totalDispenses: this.state.totalDispenses,
			lanes,
			usableLanesCount: lanes.filter((l) => l.isUsable).length,
		};
	}

	// ── Internals ──────────────────────────────────────────────────────────

	private findNextAvailableLane(startLane: number): number {
		const start = this.lanes.indexOf(startLane);
		for (let step = 1; step <= this.lanes.length; step++) {
			const lane = this.lanes[(start + step) % this.lanes.length];
			if (lane !== undefined && this.isLaneUsable(lane)) {
				return lane;
			}
		}

		this.logger.error({ lane: startLane }, "no usable lanes available");
		return startLane;
	}

	private shouldSwitchForLoadBalancing(lane: number): boolean {
		const { successes } = this.record(lane);
		return successes > 0 && successes % LOAD_BALANCE_THRESHOLD === 0;
	}

	private setCurrentLane(lane: number): void {
		this.state.currentLane = lane;
		this.save();
	}

	private record(lane: number): LaneRecord {
		let record = this.state.lanes[lane];
		if (!record) {
			record = freshRecord();
			this.state.lanes[lane] = record;
		}
		return record;
	}

	private initialState(): LaneSnapshot {
		const lanes: Record<number, LaneRecord> = {};
		for (const lane of this.lanes) {
			lanes[lane] = freshRecord();
		}
		return { currentLane: this.lanes[0] ?? 1, totalDispenses: 0, lanes };
	}

	private load(): LaneSnapshot {
		const stored = this.store.read();
		if (!stored) {
			return this.initialState();
		}
		const state = this.initialState();
		state.totalDispenses = stored.totalDispenses;
		if (this.lanes.includes(stored.currentLane)) {
			state.currentLane = stored.currentLane;
		}
		for (const lane of this.lanes) {
			const record = stored.lanes[lane];
			if (record) {
				state.lanes[lane] = { ...record };
			}
		}
		return state;
	}

	private save(): void {
		this.store.write(this.state);
	}
}

/**
 * Multi-line plain-text report for diagnostics screens and the CLI
 */
export function formatLaneReport(report: LaneStatusReport): string {
	const lines = [
		"=== Lane Status Report ===",
		`Current Lane: ${report.currentLane}`,
		`Total Dispenses: ${report.totalDispenses}`,
		`Usable Lanes: ${report.usableLanesCount}/${report.lanes.length}`,
		"",
		...report.lanes.map(
			(l) =>
				`Lane ${l.lane}: ${STATUS_TEXT[l.status]} | Failures: ${l.failureCount} | Success: ${l.successCount}`,
		),
	];
	return lines.join("\n");
}
