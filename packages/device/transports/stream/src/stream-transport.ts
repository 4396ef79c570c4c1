/**
 * Transport over any Node duplex stream.
 * Inbound bytes are reassembled into frames by length; raw chunks are also
 * offered to onData() observers as they arrive.
 */

import type { Duplex } from "node:stream";
import { formatHex, type Logger, silentLogger } from "@vmc-link/core";
import {
	type DataListener,
	errorMessage,
	type SerialConfig,
	type Transport,
} from "@vmc-link/device";
import { FrameAssembler } from "@vmc-link/device-protocol-vmc";
import type {
	StreamHealth,
	StreamOpener,
	StreamTransportOptions,
} from "./types.js";

interface PendingReceive {
	resolve: (frame: Uint8Array | null) => void;
	timer: ReturnType<typeof setTimeout>;
}

function emptyHealth(): StreamHealth {
	return {
		framesSent: 0,
		framesReceived: 0,
		bytesDiscarded: 0,
		timeouts: 0,
		sendErrors: 0,
	};
}

function toBytes(chunk: unknown): Uint8Array {
	if (chunk instanceof Uint8Array) {
		return new Uint8Array(chunk);
	}
	return new Uint8Array(Buffer.from(String(chunk), "latin1"));
}

export class StreamTransport implements Transport {
	readonly name: string;

	private readonly open: StreamOpener;
	private readonly logger: Logger;
	private readonly assembler = new FrameAssembler();
	private readonly listeners = new Set<DataListener>();
	private stream: Duplex | null = null;
	private frames: Uint8Array[] = [];
	private waiters: PendingReceive[] = [];
	private health: StreamHealth = emptyHealth();

	constructor(options: StreamTransportOptions) {
		this.open = options.open;
		this.name = options.name ?? "Stream";
		this.logger = (options.logger ?? silentLogger()).child({
			transport: this.name,
		});
	}

	async connect(config: SerialConfig): Promise<boolean> {
		if (this.stream) {
			await this.disconnect();
		}

		let stream: Duplex;
		try {
			stream = await this.open(config);
		} catch (error) {
			this.health.lastError = errorMessage(error);
			this.logger.error(
				{ err: error, devicePath: config.devicePath },
				"failed to open stream",
			);
			return false;
		}

		stream.on("data", this.handleData);
		stream.on("error", this.handleError);
		stream.once("close", this.handleClose);
		this.stream = stream;
		this.assembler.reset();
		this.frames = [];

		this.logger.info(
			{ devicePath: config.devicePath, baudRate: config.baudRate },
			"stream connected",
		);
		return true;
	}

	async disconnect(): Promise<void> {
		const stream = this.stream;
		if (!stream) {
			return;
		}
		this.detach(stream);
		stream.destroy();
		this.logger.info("stream disconnected");
	}

	isConnected(): boolean {
		return this.stream !== null && !this.stream.destroyed;
	}

	async send(data: Uint8Array): Promise<boolean> {
		const stream = this.stream;
		if (!stream || stream.destroyed) {
			this.health.sendErrors++;
			return false;
		}

		return new Promise((resolve) => {
			const written = stream.write(data, (error) => {
				if (error) {
					this.health.sendErrors++;
					this.health.lastError = error.message;
					this.logger.warn({ err: error }, "write failed");
					resolve(false);
					return;
				}
				this.health.framesSent++;
				this.logger.trace({ frame: formatHex(data) }, "tx");
				resolve(true);
			});
			if (!written) {
				this.logger.debug("write buffered; stream above high water mark");
			}
		});
	}

	async receive(timeoutMs: number): Promise<Uint8Array | null> {
		const queued = this.frames.shift();
		if (queued) {
			return queued;
		}
		if (!this.isConnected()) {
			return null;
		}

		return new Promise((resolve) => {
			const waiter: PendingReceive = {
				resolve,
				timer: setTimeout(() => {
					this.waiters = this.waiters.filter((w) => w !== waiter);
					this.health.timeouts++;
					resolve(null);
				}, timeoutMs),
			};
			this.waiters.push(waiter);
		});
	}

	onData(listener: DataListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	async clearBuffers(): Promise<void> {
		const dropped =
			this.frames.reduce((n, frame) => n + frame.length, 0) +
			this.assembler.pending;
		this.frames = [];
		this.assembler.clear();
		if (dropped > 0) {
			this.logger.debug({ dropped }, "cleared inbound buffer");
		}
	}

	getHealth(): StreamHealth {
		return {
			...this.health,
			bytesDiscarded: this.health.bytesDiscarded + this.assembler.discardedBytes,
		};
	}

	resetHealth(): void {
		this.health = emptyHealth();
		this.assembler.reset();
	}

	// ── Stream events ──────────────────────────────────────────────────────

	private readonly handleData = (chunk: unknown): void => {
		const bytes = toBytes(chunk);

		for (const listener of this.listeners) {
			listener(bytes);
		}

		for (const frame of this.assembler.push(bytes)) {
			this.health.framesReceived++;
			this.logger.trace({ frame: formatHex(frame) }, "rx");

			const waiter = this.waiters.shift();
			if (waiter) {
				clearTimeout(waiter.timer);
				waiter.resolve(frame);
			} else {
				this.frames.push(frame);
			}
		}
	};

	private readonly handleError = (error: Error): void => {
		this.health.lastError = error.message;
		this.logger.error({ err: error }, "stream error");
	};

	private readonly handleClose = (): void => {
		if (this.stream) {
			this.detach(this.stream);
			this.logger.warn("stream closed by peer");
		}
	};

	private detach(stream: Duplex): void {
		// The error listener stays so a late error is logged, not thrown
		stream.off("data", this.handleData);
		stream.off("close", this.handleClose);
		this.stream = null;
		this.health.bytesDiscarded += this.assembler.discardedBytes;
		this.assembler.reset();

		for (const waiter of this.waiters) {
			clearTimeout(waiter.timer);
			waiter.resolve(null);
		}
		this.waiters = [];
	}
}
