export type Parity = "none" | "odd" | "even";

export type FlowControl = "none" | "hardware" | "software";

/**
 * Serial line parameters handed to {@link Transport.connect}.
 * The VMC board speaks 9600 8N1 without flow control out of the box.
 */
export interface SerialConfig {
	baudRate: number;
	dataBits: 5 | 6 | 7 | 8;
	stopBits: 1 | 2;
	parity: Parity;
	flowControl: FlowControl;
	/** OS device path, e.g. "/dev/ttyUSB0" or "COM3" */
	devicePath?: string;
}

export const DEFAULT_SERIAL_CONFIG: Readonly<SerialConfig> = Object.freeze({
	baudRate: 9600,
	dataBits: 8,
	stopBits: 1,
	parity: "none",
	flowControl: "none",
});

/** Byte-stream observer registered through {@link Transport.onData} */
export type DataListener = (chunk: Uint8Array) => void;

/**
 * Byte-level I/O to a VMC board.
 *
 * Implementations:
 * - MemoryTransport: canned responses for tests
 * - StreamTransport: any Node duplex stream (serial port, socket, pipe)
 * - SimulatedVmcTransport: an emulated board with fault injection
 *
 * A transport carries one exchange at a time; callers above it are
 * responsible for serializing access.
 */
export interface Transport {
	/** Human-readable name, e.g. "Serial (/dev/ttyUSB0)" */
	readonly name: string;

	/** Open the link. Resolves false when the device cannot be opened. */
	connect(config: SerialConfig): Promise<boolean>;

	disconnect(): Promise<void>;

	isConnected(): boolean;

	/**
	 * Write one encoded frame.
	 * Resolves false on transport failure; never rejects.
	 */
	send(data: Uint8Array): Promise<boolean>;

	/**
	 * Wait for the next complete inbound frame.
	 * Resolves null when nothing arrives within timeoutMs.
	 */
	receive(timeoutMs: number): Promise<Uint8Array | null>;

	/**
	 * Observe raw inbound bytes as they arrive, independent of receive().
	 * Returns a function that removes the listener.
	 */
	onData(listener: DataListener): () => void;

	/** Drop any buffered inbound and outbound bytes */
	clearBuffers(): Promise<void>;
}
