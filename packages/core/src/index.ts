export * from "./binary.js";
export * from "./checksum.js";
export * from "./logger.js";
