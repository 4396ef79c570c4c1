/**
 * Vending engine: serialized command execution and the dispense state machine
 *
 * Every exchange is one request frame followed by one reply frame. The
 * protocol carries no transaction ids, so correlation relies on the serial
 * lock (one exchange in flight) and on the reply echoing the request command.
 */

import {
	formatHex,
	type Logger,
	silentLogger,
	toHexByte,
} from "@vmc-link/core";
import {
	CancelledError,
	ConnectionError,
	DEFAULT_SERIAL_CONFIG,
	describeFault,
	errorMessage,
	fail,
	HardwareFault,
	isVmcError,
	ok,
	ProtocolError,
	type Result,
	type SerialConfig,
	TimeoutError,
	type Transport,
	type VmcError,
} from "@vmc-link/device";
import {
	commandLabel,
	decodeFrame,
	decodeResponse,
	FrameHeader,
	type ResponseOf,
	type SharedCodeMode,
	validateSlot,
	VmcCommandBuilder,
	type VmcResponse,
	type VmcResponseKind,
} from "@vmc-link/device-protocol-vmc";
import { type EngineConfig, resolveEngineConfig } from "./config.js";
import {
	type DispenseResult,
	dispenseFailed,
	dispenseSucceeded,
} from "./results.js";
import { SerialLock } from "./serial-lock.js";

export interface CommandOptions {
	signal?: AbortSignal;
}

export interface ExecuteOptions extends CommandOptions {
	/** Reading of a 0xE1 reply. @default "status" */
	mode?: SharedCodeMode;
}

export interface VendingEngineOptions {
	config?: Partial<EngineConfig>;
	logger?: Logger;
}

export interface DeliveryEcho {
	slot: number;
	quantity: number;
}

export interface DeliveryStatus {
	success: true;
	/** Present when the board reports a completed payment amount */
	amount?: number;
}

/** Dispense state machine states */
export type DispenseState =
	| "idle"
	| "sending"
	| "polling"
	| "succeeded"
	| "failed"
	| "timed-out";

/** Sends one request frame and resolves with its decoded reply */
type Exchanger = (
	frame: Uint8Array,
	options: ExecuteOptions,
) => Promise<VmcResponse>;

/** Byte offset of CMD within a frame */
const COMMAND_OFFSET = 3;

function isKind<K extends VmcResponseKind>(
	response: VmcResponse,
	kind: K,
): response is ResponseOf<K> {
	return response.kind === kind;
}

function expectKind<K extends VmcResponseKind>(
	response: VmcResponse,
	kind: K,
): ResponseOf<K> {
	if (isKind(response, kind)) {
		return response;
	}
	throw new ProtocolError(`Expected ${kind} response, got ${response.kind}`);
}

function toVmcError(error: unknown): VmcError {
	if (isVmcError(error)) {
		return error;
	}
	return new ProtocolError(errorMessage(error), { cause: error });
}

/**
 * Sleep, waking early when the signal aborts
 *
 * @returns false when interrupted by the signal
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) {
		return Promise.resolve(false);
	}
	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export class VendingEngine {
	readonly config: EngineConfig;

	private readonly transport: Transport;
	private readonly logger: Logger;
	private readonly lock = new SerialLock();

	/**
	 * @throws ArgumentError if the config is out of range
	 */
	constructor(transport: Transport, options: VendingEngineOptions = {}) {
		this.transport = transport;
		this.config = resolveEngineConfig(options.config);
		this.logger = (options.logger ?? silentLogger()).child({
			component: "engine",
			transport: transport.name,
		});
	}

	// ── Connection ─────────────────────────────────────────────────────────

	async connect(
		config: SerialConfig = DEFAULT_SERIAL_CONFIG,
	): Promise<Result<void>> {
		try {
			const connected = await this.transport.connect(config);
			if (!connected) {
				this.logger.error({ devicePath: config.devicePath }, "connect failed");
				return fail(
					new ConnectionError(
						`Failed to open ${config.devicePath ?? this.transport.name}`,
					),
				);
			}
		} catch (error) {
			this.logger.error({ err: error }, "connect threw");
			return fail(
				new ConnectionError(`Failed to connect: ${errorMessage(error)}`, {
					cause: error,
				}),
			);
		}
		this.logger.info({ baudRate: config.baudRate }, "connected");
		return ok(undefined);
	}

	async disconnect(): Promise<void> {
		await this.lock.runExclusive(() => this.transport.disconnect());
		this.logger.info("disconnected");
	}

	isConnected(): boolean {
		return this.transport.isConnected();
	}

	// ── Single exchange ────────────────────────────────────────────────────

	/**
	 * Send one frame and wait for its reply, holding the serial lock
	 *
	 * A signal that fires while the exchange is in flight does not interrupt
	 * it: the reply (or its timeout) is consumed first so the line stays in
	 * step, then the call rejects with CancelledError.
	 *
	 * @throws ConnectionError | ProtocolError | TimeoutError | CancelledError
	 */
	async executeCommand(
		frame: Uint8Array,
		options: ExecuteOptions = {},
	): Promise<VmcResponse> {
		const { signal, mode = "status" } = options;
		return this.settle(
			() => this.lock.runExclusive(() => this.exchange(frame, mode), signal),
			signal,
		);
	}

	private readonly sharedLine: Exchanger = (frame, options) =>
		this.executeCommand(frame, options);

	/** For callers already holding the serial lock */
	private readonly heldLine: Exchanger = (frame, options) =>
		this.settle(
			() => this.exchange(frame, options.mode ?? "status"),
			options.signal,
		);

	private async settle(
		pending: () => Promise<VmcResponse>,
		signal?: AbortSignal,
	): Promise<VmcResponse> {
		let response: VmcResponse;
		try {
			response = await pending();
		} catch (error) {
			if (signal?.aborted && !(error instanceof CancelledError)) {
				throw new CancelledError("Command cancelled", { cause: error });
			}
			throw toVmcError(error);
		}

		if (signal?.aborted) {
			throw new CancelledError("Command cancelled");
		}
		return response;
	}

	private async exchange(
		frame: Uint8Array,
		mode: SharedCodeMode,
	): Promise<VmcResponse> {
		if (!this.transport.isConnected()) {
			throw new ConnectionError("Not connected to VMC");
		}

		const command = frame[COMMAND_OFFSET];
		if (command === undefined) {
			throw new ProtocolError(`Request frame too short: ${frame.length} bytes`);
		}
		const label = commandLabel(command) ?? toHexByte(command);

		// Anything already buffered answers an earlier, abandoned request
		try {
			await this.transport.clearBuffers();
		} catch (error) {
			throw new ProtocolError("Failed to clear stale input", { cause: error });
		}

		this.logger.trace({ command: label, frame: formatHex(frame) }, "tx");

		let sent: boolean;
		try {
			sent = await this.transport.send(frame);
		} catch (error) {
			throw new ProtocolError("send failed", { cause: error });
		}
		if (!sent) {
			throw new ProtocolError("send failed");
		}

		const reply = await this.receiveReply();
		if (reply === null) {
			this.logger.warn(
				{ command: label, timeoutMs: this.config.commandTimeoutMs },
				"no response",
			);
			throw new TimeoutError(this.config.commandTimeoutMs);
		}

		this.logger.trace({ command: label, frame: formatHex(reply) }, "rx");

		const decoded = decodeFrame(reply);
		if (decoded.header !== FrameHeader.DEVICE) {
			throw new ProtocolError(
				`Unexpected frame header ${toHexByte(decoded.header)}`,
			);
		}
		if (decoded.command !== command) {
			throw new ProtocolError(
				`Response command ${toHexByte(decoded.command)} does not match request ${toHexByte(command)}`,
			);
		}

		const response = decodeResponse(decoded, mode);
		if (response.kind === "error") {
			throw new ProtocolError(response.message);
		}
		return response;
	}

	/** receive(), also bounded by an engine-side timer */
	private async receiveReply(): Promise<Uint8Array | null> {
		const timeoutMs = this.config.commandTimeoutMs;
		let timer: ReturnType<typeof setTimeout> | undefined;
		const expiry = new Promise<null>((resolve) => {
			timer = setTimeout(() => resolve(null), timeoutMs);
		});

		try {
			return await Promise.race([this.transport.receive(timeoutMs), expiry]);
		} finally {
			clearTimeout(timer);
		}
	}

	// ── Primitives ─────────────────────────────────────────────────────────

	private async run<T>(
		name: string,
		build: () => Uint8Array,
		interpret: (response: VmcResponse) => T,
		options: ExecuteOptions = {},
		line: Exchanger = this.sharedLine,
	): Promise<Result<T>> {
		try {
			const response = await line(build(), options);
			return ok(interpret(response));
		} catch (error) {
			const vmcError = toVmcError(error);
			this.logger.warn(
				{ operation: name, kind: vmcError.kind, err: vmcError },
				`${name} failed`,
			);
			return fail(vmcError);
		}
	}

	getDeviceId(options?: CommandOptions): Promise<Result<string>> {
		return this.run(
			"getDeviceId",
			() => VmcCommandBuilder.getDeviceId(),
			(r) => expectKind(r, "device-id").deviceId,
			options,
		);
	}

	sendDeliveryCommand(
		slot: number,
		quantity = 1,
		options?: CommandOptions,
	): Promise<Result<DeliveryEcho>> {
		return this.deliver(slot, quantity, options, this.sharedLine);
	}

	private deliver(
		slot: number,
		quantity: number,
		options: CommandOptions | undefined,
		line: Exchanger,
	): Promise<Result<DeliveryEcho>> {
		return this.run(
			"sendDeliveryCommand",
			() => VmcCommandBuilder.deliver(slot, quantity),
			(r) => {
				const echo = expectKind(r, "delivery");
				if (echo.slot !== slot || echo.quantity !== quantity) {
					throw new ProtocolError(
						`Delivery echo mismatch: sent slot ${slot} x${quantity}, got slot ${echo.slot} x${echo.quantity}`,
					);
				}
				return { slot: echo.slot, quantity: echo.quantity };
			},
			options,
			line,
		);
	}

	/**
	 * Ask how a delivery went. A fault byte comes back as a HardwareFault
	 * failure carrying the code and slot.
	 */
	queryDeliveryStatus(
		slot: number,
		quantity = 1,
		options?: CommandOptions,
	): Promise<Result<DeliveryStatus>> {
		return this.pollStatus(slot, quantity, options, this.sharedLine);
	}

	private pollStatus(
		slot: number,
		quantity: number,
		options: CommandOptions | undefined,
		line: Exchanger,
	): Promise<Result<DeliveryStatus>> {
		return this.run(
			"queryDeliveryStatus",
			() => VmcCommandBuilder.queryStatus(slot, quantity),
			(r) => {
				const status = expectKind(r, "status");
				if (!status.success) {
					throw new HardwareFault(status.errorCode ?? 0, slot);
				}
				return status.amount === undefined
					? { success: true }
					: { success: true, amount: status.amount };
			},
			{ ...options, mode: "status" },
			line,
		);
	}

	clearFaults(options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"clearFaults",
			() => VmcCommandBuilder.removeFault(),
			(r) => expectKind(r, "simple").success,
			options,
		);
	}

	/** Credit held by the board, in cents */
	queryBalance(options?: CommandOptions): Promise<Result<number>> {
		return this.run(
			"queryBalance",
			() => VmcCommandBuilder.queryBalance(),
			(r) => expectKind(r, "balance").amount,
			{ ...options, mode: "balance" },
		);
	}

	requestPayment(
		amountCents: number,
		method: number,
		slot: number,
		options?: CommandOptions,
	): Promise<Result<boolean>> {
		return this.run(
			"requestPayment",
			() => VmcCommandBuilder.paymentInstruction(amountCents, method, slot),
			(r) => expectKind(r, "payment").success,
			options,
		);
	}

	refundCoins(options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"refundCoins",
			() => VmcCommandBuilder.coinChange(),
			(r) => expectKind(r, "simple").success,
			options,
		);
	}

	cancelCashless(options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"cancelCashless",
			() => VmcCommandBuilder.cashlessCancel(),
			(r) => expectKind(r, "simple").success,
			options,
		);
	}

	debit(amountCents: number, options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"debit",
			() => VmcCommandBuilder.debitInstruction(amountCents),
			(r) => expectKind(r, "simple").success,
			options,
		);
	}

	requestAgeVerification(
		requiredAge: number,
		options?: CommandOptions,
	): Promise<Result<boolean>> {
		return this.run(
			"requestAgeVerification",
			() => VmcCommandBuilder.ageRecognition(requiredAge),
			(r) => expectKind(r, "simple").success,
			options,
		);
	}

	/** @returns Whether the coin mechanism can pay change */
	queryCoinChangeStatus(options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"queryCoinChangeStatus",
			() => VmcCommandBuilder.queryCoinChangeStatus(),
			(r) => expectKind(r, "coin-change-status").canRefund,
			options,
		);
	}

	queryAgeVerification(options?: CommandOptions): Promise<Result<boolean>> {
		return this.run(
			"queryAgeVerification",
			() => VmcCommandBuilder.queryAgeVerification(),
			(r) => expectKind(r, "age-verification").verified,
			options,
		);
	}

	// ── Dispense ───────────────────────────────────────────────────────────

	/**
	 * Deliver one unit from a slot and poll until the board reports the outcome
	 *
	 * idle → sending → polling → succeeded | failed | timed-out
	 *
	 * The serial lock is held from the delivery command to the last poll, so
	 * concurrent dispenses and single commands wait for this one to finish.
	 * Never throws: every failure comes back as a DispenseResult with a
	 * displayable message. The delivery step is not retried.
	 */
	async dispenseWater(
		slot: number,
		options: CommandOptions = {},
	): Promise<DispenseResult> {
		const { signal } = options;
		const started = performance.now();
		const elapsed = () => Math.round(performance.now() - started);
		const log = this.logger.child({ slot });
		let state: DispenseState = "idle";
		const enter = (next: DispenseState) => {
			log.debug({ from: state, to: next }, "dispense state");
			state = next;
		};
		const cancelled = () => {
			enter("failed");
			return dispenseFailed(slot, elapsed(), "cancelled", "Dispense cancelled");
		};

		try {
			validateSlot(slot);
		} catch (error) {
			enter("failed");
			return dispenseFailed(slot, elapsed(), "argument", errorMessage(error));
		}

		const dispense = async (): Promise<DispenseResult> => {
			enter("sending");
			const delivery = await this.deliver(slot, 1, { signal }, this.heldLine);
			if (!delivery.ok) {
				if (delivery.error.kind === "cancelled") {
					return cancelled();
				}
				enter("failed");
				log.error({ err: delivery.error }, "delivery command failed");
				return dispenseFailed(
					slot,
					elapsed(),
					"communication",
					`Failed to send delivery command: ${delivery.error.message}`,
				);
			}

			enter("polling");
			for (let attempt = 1; attempt <= this.config.maxPollAttempts; attempt++) {
				if (!(await sleep(this.config.pollIntervalMs, signal))) {
					return cancelled();
				}

				const status = await this.pollStatus(slot, 1, { signal }, this.heldLine);
				if (status.ok) {
					enter("succeeded");
					const elapsedMs = elapsed();
					log.info({ elapsedMs, attempts: attempt }, "dispense succeeded");
					return dispenseSucceeded(slot, elapsedMs);
				}

				const { error } = status;
				switch (error.kind) {
					case "hardware": {
						const errorCode =
							error instanceof HardwareFault ? error.errorCode : 0;
						enter("failed");
						log.warn({ errorCode }, "hardware fault");
						return dispenseFailed(
							slot,
							elapsed(),
							"hardware",
							describeFault(errorCode, slot),
							errorCode,
						);
					}
					case "cancelled":
						return cancelled();
					case "connection":
					case "argument":
						enter("failed");
						log.error({ err: error }, "status poll failed");
						return dispenseFailed(
							slot,
							elapsed(),
							"communication",
							`Failed to query delivery status: ${error.message}`,
						);
					case "timeout":
					case "protocol":
						log.debug({ attempt, kind: error.kind }, "poll without outcome");
						break;
				}
			}

			enter("timed-out");
			const elapsedMs = elapsed();
			log.warn({ elapsedMs }, "dispense timed out");
			return dispenseFailed(
				slot,
				elapsedMs,
				"timeout",
				`Dispensing operation timed out after ${elapsedMs}ms`,
			);
		};

		try {
			return await this.lock.runExclusive(dispense, signal);
		} catch (error) {
			if (error instanceof CancelledError) {
				return cancelled();
			}
			enter("failed");
			log.error({ err: error }, "dispense aborted");
			return dispenseFailed(slot, elapsed(), "communication", errorMessage(error));
		}
	}
}
