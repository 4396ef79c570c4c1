import type { Duplex } from "node:stream";
import type { Logger } from "@vmc-link/core";
import type { SerialConfig } from "@vmc-link/device";

/**
 * Opens the underlying byte stream for a serial config, e.g. a serial port
 * binding, a TCP socket to a serial bridge, or an in-process pair in tests.
 */
export type StreamOpener = (config: SerialConfig) => Promise<Duplex>;

export interface StreamTransportOptions {
	open: StreamOpener;
	/** @default "Stream" */
	name?: string;
	logger?: Logger;
}

/** Health statistics for a stream link */
export interface StreamHealth {
	/** Frames written successfully */
	framesSent: number;
	/** Whole frames reassembled from inbound bytes */
	framesReceived: number;
	/** Inbound bytes dropped while hunting for a frame start */
	bytesDiscarded: number;
	/** receive() calls that ended without a frame */
	timeouts: number;
	/** Writes that failed or were refused */
	sendErrors: number;
	/** Last error message, if any */
	lastError?: string;
}
