import { findFrameStart, getFrameLength, hasValidChecksum } from "./frame.js";

const EMPTY = new Uint8Array(0);

/**
 * Reassembles frames from an arbitrarily chunked byte stream.
 *
 * Bytes ahead of the next 0xFF 0x00 sentinel are discarded and counted.
 * A sentinel pair can also occur inside noise or payload data. When the
 * candidate at the head of the buffer fails its checksum, or cannot be
 * complete yet while a later sentinel already starts a valid frame, the
 * assembler resynchronises on that later sentinel.
 *
 * A bad frame with no other sentinel inside it is returned raw, so the
 * corruption surfaces as a ProtocolError from decodeFrame() upstream.
 */
export class FrameAssembler {
	private buffer: Uint8Array = EMPTY;
	private discarded = 0;

	/**
	 * Feed received bytes
	 *
	 * @returns Every frame completed by this chunk, in arrival order
	 */
	push(chunk: Uint8Array): Uint8Array[] {
		this.append(chunk);
		const frames: Uint8Array[] = [];

		for (;;) {
			const start = findFrameStart(this.buffer);
			if (start === -1) {
				this.discarded += this.buffer.length;
				this.buffer = EMPTY;
				break;
			}
			if (start > 0) {
				this.drop(start);
			}

			const length = getFrameLength(this.buffer);
			if (length === undefined) {
				break;
			}

			if (this.buffer.length < length) {
				const next = this.nextValidFrameStart();
				if (next === -1) {
					break;
				}
				this.drop(next);
				continue;
			}

			const candidate = this.buffer.slice(0, length);
			if (!hasValidChecksum(candidate)) {
				const inner = findFrameStart(this.buffer, 1);
				if (inner !== -1 && inner < length - 1) {
					this.drop(inner);
					continue;
				}
			}

			frames.push(candidate);
			this.buffer = this.buffer.slice(length);
		}

		return frames;
	}

	/** Bytes held back waiting for the rest of a frame */
	get pending(): number {
		return this.buffer.length;
	}

	/** Total bytes dropped as noise since construction or reset() */
	get discardedBytes(): number {
		return this.discarded;
	}

	reset(): void {
		this.buffer = EMPTY;
		this.discarded = 0;
	}

	/** Drop the partial frame but keep counters */
	clear(): void {
		this.buffer = EMPTY;
	}

	/** Offset of a later sentinel that starts a complete, valid frame */
	private nextValidFrameStart(): number {
		for (
			let at = findFrameStart(this.buffer, 1);
			at !== -1;
			at = findFrameStart(this.buffer, at + 1)
		) {
			const length = getFrameLength(this.buffer, at);
			if (length === undefined || at + length > this.buffer.length) {
				continue;
			}
			if (hasValidChecksum(this.buffer.subarray(at, at + length))) {
				return at;
			}
		}
		return -1;
	}

	private drop(count: number): void {
		this.discarded += count;
		this.buffer = this.buffer.slice(count);
	}

	private append(chunk: Uint8Array): void {
		if (this.buffer.length === 0) {
			this.buffer = chunk.slice();
			return;
		}
		const next = new Uint8Array(this.buffer.length + chunk.length);
		next.set(this.buffer, 0);
		next.set(chunk, this.buffer.length);
		this.buffer = next;
	}
}
