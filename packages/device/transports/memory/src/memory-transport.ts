/**
 * In-memory transport double.
 *
 * Replies are scripted up front: each receive() consumes the next queued
 * entry. A queued silence, or an empty queue, behaves like a board that
 * never answers and resolves null after the caller's timeout.
 */

import type {
	DataListener,
	SerialConfig,
	Transport,
} from "@vmc-link/device";

type ScriptedReply = { kind: "frame"; bytes: Uint8Array } | { kind: "silence" };

export interface MemoryTransportOptions {
	/** @default "Memory" */
	name?: string;
	/** Value connect() resolves with. @default true */
	connectResult?: boolean;
}

export class MemoryTransport implements Transport {
	readonly name: string;

	/** Copies of every frame accepted by send(), oldest first */
	readonly sentFrames: Uint8Array[] = [];

	/** Config passed to the last successful connect() */
	lastConfig: SerialConfig | null = null;

	/** Number of clearBuffers() calls */
	clearCount = 0;

	private connected = false;
	private connectResult: boolean;
	private replies: ScriptedReply[] = [];
	private sendFailures = 0;
	private listeners = new Set<DataListener>();

	constructor(options: MemoryTransportOptions = {}) {
		this.name = options.name ?? "Memory";
		this.connectResult = options.connectResult ?? true;
	}

	// ── Scripting ──────────────────────────────────────────────────────────

	/** Queue the next frame receive() will hand back */
	queueResponse(bytes: ArrayLike<number>): this {
		this.replies.push({ kind: "frame", bytes: Uint8Array.from(bytes) });
		return this;
	}

	/** Queue one receive() that times out */
	queueSilence(): this {
		this.replies.push({ kind: "silence" });
		return this;
	}

	/** Make the next `count` send() calls resolve false */
	failNextSend(count = 1): this {
		this.sendFailures += count;
		return this;
	}

	/** Change what future connect() calls resolve with */
	setConnectResult(result: boolean): this {
		this.connectResult = result;
		return this;
	}

	/** Scripted replies not consumed yet */
	get pendingReplies(): number {
		return this.replies.length;
	}

	/** Forget scripted replies and recorded frames */
	reset(): void {
		this.replies = [];
		this.sentFrames.length = 0;
		this.sendFailures = 0;
		this.clearCount = 0;
	}

	// ── Transport ──────────────────────────────────────────────────────────

	async connect(config: SerialConfig): Promise<boolean> {
		if (!this.connectResult) {
			return false;
		}
		this.connected = true;
		this.lastConfig = { ...config };
		return true;
	}

	async disconnect(): Promise<void> {
		this.connected = false;
	}

	isConnected(): boolean {
		return this.connected;
	}

	async send(data: Uint8Array): Promise<boolean> {
		if (!this.connected) {
			return false;
		}
		if (this.sendFailures > 0) {
			this.sendFailures--;
			return false;
		}
		this.sentFrames.push(data.slice());
		return true;
	}

	async receive(timeoutMs: number): Promise<Uint8Array | null> {
		if (!this.connected) {
			return null;
		}

		const reply = this.replies.shift();
		if (reply === undefined || reply.kind === "silence") {
			await new Promise((resolve) => setTimeout(resolve, timeoutMs));
			return null;
		}

		for (const listener of this.listeners) {
			listener(reply.bytes.slice());
		}
		return reply.bytes.slice();
	}

	onData(listener: DataListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Counts the call. Scripted replies stand for future board answers,
	 * not buffered bytes, so they stay queued.
	 */
	async clearBuffers(): Promise<void> {
		this.clearCount++;
	}
}
