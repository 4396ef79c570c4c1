/**
 * VMC serial protocol: framing, command catalog and response decoding
 */

export { FrameAssembler } from "./assembler.js";
export * as VmcCommandBuilder from "./commands.js";
export {
	validateAge,
	validateAmount,
	validateQuantity,
	validateSlot,
} from "./commands.js";
export * from "./constants.js";
export {
	calculateFrameChecksum,
	decodeFrame,
	encodeFrame,
	findFrameStart,
	formatFrame,
	getFrameLength,
	hasValidChecksum,
	type VmcFrame,
} from "./frame.js";
export {
	decodeResponse,
	type ResponseOf,
	type SharedCodeMode,
	type VmcResponse,
	type VmcResponseKind,
} from "./responses.js";
export { decodeUint32LE, encodeUint32LE } from "@vmc-link/core";
