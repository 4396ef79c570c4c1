import { CancelledError } from "@vmc-link/device";

interface Waiter {
	grant: () => void;
}

/**
 * FIFO mutual exclusion for a half-duplex serial line.
 *
 * Every exchange on a transport runs inside runExclusive(), and a dispense
 * holds it from delivery to its last poll. Concurrent callers queue in
 * arrival order. A caller whose AbortSignal fires while it
 * is still queued leaves the queue without ever holding the line.
 */
export class SerialLock {
	private locked = false;
	private waiters: Waiter[] = [];

	get isLocked(): boolean {
		return this.locked;
	}

	/** Callers waiting behind the current holder */
	get queueLength(): number {
		return this.waiters.length;
	}

	/**
	 * Run a task while holding the line
	 *
	 * @throws CancelledError if the signal aborts before the line is acquired
	 */
	async runExclusive<T>(
		task: () => Promise<T>,
		signal?: AbortSignal,
	): Promise<T> {
		await this.acquire(signal);
		try {
			return await task();
		} finally {
			this.release();
		}
	}

	private acquire(signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			return Promise.reject(
				new CancelledError("Cancelled before acquiring the serial line"),
			);
		}
		if (!this.locked) {
			this.locked = true;
			return Promise.resolve();
		}

		return new Promise((resolve, reject) => {
			const onAbort = () => {
				this.waiters = this.waiters.filter((w) => w !== waiter);
				reject(new CancelledError("Cancelled while waiting for the serial line"));
			};
			const waiter: Waiter = {
				grant: () => {
					signal?.removeEventListener("abort", onAbort);
					resolve();
				},
			};
			this.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	private release(): void {
		const next = this.waiters.shift();
		if (next) {
			// Ownership passes straight to the next waiter
			next.grant();
		} else {
			this.locked = false;
		}
	}
}
