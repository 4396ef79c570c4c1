/**
 * Emulated VMC board.
 *
 * Every host frame sent through this transport is decoded and answered the
 * way a board would answer it. Deliveries stay "busy" for a configurable
 * number of status polls (the board does not answer while the motor runs),
 * then report success or the fault injected for the slot.
 */

import {
	type DataListener,
	FAULT_CODES,
	ProtocolError,
	type SerialConfig,
	type Transport,
} from "@vmc-link/device";
import {
	decodeFrame,
	decodeUint32LE,
	DEVICE_ID_LENGTH,
	encodeFrame,
	encodeUint32LE,
	FrameHeader,
	PAYMENT_METHODS,
	STATUS_SUCCESS,
	VMC_COMMANDS,
	type VmcFrame,
} from "@vmc-link/device-protocol-vmc";
import type {
	InjectFaultOptions,
	SimulatedDelivery,
	SimulatedFault,
	SimulatedPayment,
	SimulatorOptions,
} from "./types.js";

interface OutboundReply {
	bytes: Uint8Array;
	readyAt: number;
}

interface InjectedFault {
	code: number;
	persistent: boolean;
}

const STATUS_FAILED = 0x00;

function faultCode(fault: SimulatedFault): number {
	switch (fault) {
		case "motor":
			return FAULT_CODES.MOTOR_FAILURE;
		case "optical":
			return FAULT_CODES.OPTICAL_EYE_FAILURE;
		default:
			return fault;
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SimulatedVmcTransport implements Transport {
	readonly name: string;

	/** Every well-formed host frame received, oldest first */
	readonly received: VmcFrame[] = [];
	readonly deliveries: SimulatedDelivery[] = [];
	readonly payments: SimulatedPayment[] = [];
	/** Host frames dropped for a bad checksum, header or length */
	rejectedFrames = 0;
	/** REMOVE_FAULT commands received */
	faultClears = 0;

	private readonly deviceId: string;
	private readonly responseDelayMs: number;
	private busyPolls: number;
	private balanceCents: number;
	private canRefund: boolean;
	private ageVerified: boolean;
	private requiredAge: number | null = null;

	private connected = false;
	private silent = false;
	private corruptRemaining = 0;
	private readonly faults = new Map<number, InjectedFault>();
	/** Busy polls left per slot with a delivery in progress */
	private readonly inProgress = new Map<number, number>();
	private outbound: OutboundReply[] = [];
	private readonly listeners = new Set<DataListener>();

	constructor(options: SimulatorOptions = {}) {
		this.name = options.name ?? "Simulated VMC";
		this.deviceId = (options.deviceId ?? "VMC-SIM-0000001")
			.padEnd(DEVICE_ID_LENGTH, " ")
			.slice(0, DEVICE_ID_LENGTH);
		this.responseDelayMs = options.responseDelayMs ?? 0;
		this.busyPolls = options.busyPolls ?? 0;
		this.balanceCents = options.balanceCents ?? 0;
		this.canRefund = options.canRefund ?? true;
		this.ageVerified = options.ageVerified ?? false;
	}

	// ── Fault injection ────────────────────────────────────────────────────

	injectFault(
		slot: number,
		fault: SimulatedFault,
		options: InjectFaultOptions = {},
	): this {
		this.faults.set(slot, {
			code: faultCode(fault),
			persistent: options.persistent ?? false,
		});
		return this;
	}

	clearFault(slot: number): this {
		this.faults.delete(slot);
		return this;
	}

	/** A silent board receives frames but never answers */
	setSilent(silent: boolean): this {
		this.silent = silent;
		return this;
	}

	/** Flip the checksum of the next `count` replies */
	corruptNextResponses(count = 1): this {
		this.corruptRemaining += count;
		return this;
	}

	setBusyPolls(count: number): this {
		this.busyPolls = count;
		return this;
	}

	setBalance(cents: number): this {
		this.balanceCents = cents;
		return this;
	}

	setCanRefund(canRefund: boolean): this {
		this.canRefund = canRefund;
		return this;
	}

	setAgeVerified(verified: boolean): this {
		this.ageVerified = verified;
		return this;
	}

	get balance(): number {
		return this.balanceCents;
	}

	/** Age requested by the last AGE_RECOGNITION command */
	get lastRequiredAge(): number | null {
		return this.requiredAge;
	}

	// ── Transport ──────────────────────────────────────────────────────────

	async connect(_config: SerialConfig): Promise<boolean> {
		this.connected = true;
		return true;
	}

	async disconnect(): Promise<void> {
		this.connected = false;
		this.outbound = [];
		this.inProgress.clear();
	}

	isConnected(): boolean {
		return this.connected;
	}

	async send(data: Uint8Array): Promise<boolean> {
		if (!this.connected) {
			return false;
		}

		let frame: VmcFrame;
		try {
			frame = decodeFrame(data);
		} catch (error) {
			if (!(error instanceof ProtocolError)) {
				throw error;
			}
			this.rejectedFrames++;
			return true;
		}
		if (frame.header !== FrameHeader.HOST) {
			this.rejectedFrames++;
			return true;
		}

		this.received.push(frame);
		const payload = this.handle(frame);
		if (payload !== null && !this.silent) {
			this.reply(frame.command, payload);
		}
		return true;
	}

	async receive(timeoutMs: number): Promise<Uint8Array | null> {
		const next = this.outbound[0];
		if (!this.connected || next === undefined) {
			await sleep(timeoutMs);
			return null;
		}

		const wait = Math.max(0, next.readyAt - Date.now());
		if (wait > timeoutMs) {
			// Too late for this exchange; the reply stays buffered
			await sleep(timeoutMs);
			return null;
		}
		if (wait > 0) {
			await sleep(wait);
		}

		this.outbound.shift();
		for (const listener of this.listeners) {
			listener(next.bytes.slice());
		}
		return next.bytes;
	}

	onData(listener: DataListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	async clearBuffers(): Promise<void> {
		this.outbound = [];
	}

	// ── Board behaviour ────────────────────────────────────────────────────

	/** @returns Reply payload, or null when the board stays quiet */
	private handle(frame: VmcFrame): number[] | null {
		const { command, payload } = frame;

		switch (command) {
			case VMC_COMMANDS.GET_DEVICE_ID:
				return Array.from(this.deviceId, (c) => c.charCodeAt(0) & 0xff);

			case VMC_COMMANDS.DELIVER: {
				const [slot = 0, quantity = 0] = payload;
				this.deliveries.push({ slot, quantity });
				this.inProgress.set(slot, this.busyPolls);
				return [slot, quantity];
			}

			// QUERY_BALANCE shares this code and always carries four bytes
			case VMC_COMMANDS.QUERY_STATUS:
				if (payload.length === 4) {
					return Array.from(encodeUint32LE(this.balanceCents));
				}
				return this.deliveryStatus(payload[0] ?? 0);

			case VMC_COMMANDS.REMOVE_FAULT:
				this.faultClears++;
				for (const [slot, fault] of this.faults) {
					if (!fault.persistent) {
						this.faults.delete(slot);
					}
				}
				return [STATUS_SUCCESS];

			case VMC_COMMANDS.PAYMENT_INSTRUCTION: {
				if (payload.length < 6) {
					return [STATUS_FAILED];
				}
				const amountCents = decodeUint32LE(payload);
				const method = payload[4] ?? PAYMENT_METHODS.CANCEL;
				const slot = payload[5] ?? 0;
				this.payments.push({ amountCents, method, slot });
				return [STATUS_SUCCESS];
			}

			case VMC_COMMANDS.COIN_CHANGE:
				return [this.canRefund ? STATUS_SUCCESS : STATUS_FAILED];

			case VMC_COMMANDS.CASHLESS_CANCEL:
				return [STATUS_SUCCESS];

			case VMC_COMMANDS.DEBIT_INSTRUCTION: {
				if (payload.length < 4) {
					return [STATUS_FAILED];
				}
				const amount = decodeUint32LE(payload);
				if (amount > this.balanceCents) {
					return [STATUS_FAILED];
				}
				this.balanceCents -= amount;
				return [STATUS_SUCCESS];
			}

			case VMC_COMMANDS.AGE_RECOGNITION:
				this.requiredAge = payload[0] ?? null;
				return [STATUS_SUCCESS];

			case VMC_COMMANDS.QUERY_COIN_CHANGE_STATUS:
				return [this.canRefund ? 0x00 : 0x01];

			case VMC_COMMANDS.QUERY_AGE_VERIFICATION:
				return [this.ageVerified ? 0x01 : 0x00];

			default:
				return null;
		}
	}

	private deliveryStatus(slot: number): number[] | null {
		const busy = this.inProgress.get(slot);
		if (busy !== undefined && busy > 0) {
			this.inProgress.set(slot, busy - 1);
			return null;
		}
		this.inProgress.delete(slot);

		const fault = this.faults.get(slot);
		return [fault ? fault.code : STATUS_SUCCESS];
	}

	private reply(command: number, payload: number[]): void {
		const bytes = encodeFrame(FrameHeader.DEVICE, command, payload);
		if (this.corruptRemaining > 0) {
			this.corruptRemaining--;
			const last = bytes.length - 1;
			bytes[last] = (bytes[last] ?? 0) ^ 0xff;
		}
		this.outbound.push({
			bytes,
			readyAt: Date.now() + this.responseDelayMs,
		});
	}
}
