import { type Logger, silentLogger } from "@vmc-link/core";
import type { Result } from "@vmc-link/device";
import type { CommandOptions } from "./engine.js";
import type { DispenseResult } from "./results.js";

/** The slice of the engine the recovery policy drives */
export interface Dispenser {
	dispenseWater(slot: number, options?: CommandOptions): Promise<DispenseResult>;
	clearFaults(options?: CommandOptions): Promise<Result<boolean>>;
}

export interface FaultRecoveryOptions {
	/** Extra attempts after the first failure. @default 1 */
	maxRetries?: number;
	/** Also retry failed deliveries and exhausted polls. @default false */
	retryOnCommunicationError?: boolean;
	logger?: Logger;
}

export interface RecoveredDispenseResult extends DispenseResult {
	/** Dispense attempts made, 1 when the first one settled it */
	readonly attempts: number;
}

/**
 * Clear-faults-then-retry policy composed above the engine.
 *
 * A hardware fault is followed by REMOVE_FAULT and another attempt;
 * communication failures and exhausted polls are retried only when
 * retryOnCommunicationError is set. Cancellations and rejected slots are
 * returned as they are.
 */
export class FaultRecoveryPolicy {
	readonly maxRetries: number;
	readonly retryOnCommunicationError: boolean;

	private readonly dispenser: Dispenser;
	private readonly logger: Logger;

	constructor(dispenser: Dispenser, options: FaultRecoveryOptions = {}) {
		this.dispenser = dispenser;
		this.maxRetries = options.maxRetries ?? 1;
		this.retryOnCommunicationError = options.retryOnCommunicationError ?? false;
		this.logger = (options.logger ?? silentLogger()).child({
			component: "recovery",
		});

		if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
			throw new RangeError(
				`maxRetries must be a non-negative integer (got ${this.maxRetries})`,
			);
		}
	}

	async dispense(
		slot: number,
		options: CommandOptions = {},
	): Promise<RecoveredDispenseResult> {
		let attempts = 0;

		for (;;) {
			attempts++;
			const result = await this.dispenser.dispenseWater(slot, options);
			if (result.success || !this.shouldRetry(result) || attempts > this.maxRetries) {
				return Object.freeze({ ...result, attempts });
			}

			this.logger.info(
				{ slot, attempt: attempts, failureKind: result.failureKind },
				"retrying dispense",
			);

			if (result.failureKind === "hardware") {
				const cleared = await this.dispenser.clearFaults(options);
				if (!cleared.ok || !cleared.value) {
					this.logger.warn({ slot }, "fault clear failed; not retrying");
					return Object.freeze({ ...result, attempts });
				}
			}
		}
	}

	private shouldRetry(result: DispenseResult): boolean {
		switch (result.failureKind) {
			case "hardware":
				return true;
			case "communication":
			case "timeout":
				return this.retryOnCommunicationError;
			default:
				return false;
		}
	}
}
