/**
 * Duplex-stream transport for VMC boards
 */

export { StreamTransport } from "./stream-transport.js";
export type {
	StreamHealth,
	StreamOpener,
	StreamTransportOptions,
} from "./types.js";
