/**
 * VMC vending engine, fault recovery, lane management and the fountain
 * controller
 */

export {
	DEFAULT_ENGINE_CONFIG,
	DEFAULT_FOUNTAIN_CONFIG,
	type EngineConfig,
	engineConfigSchema,
	type FountainConfig,
	fountainConfigSchema,
	type LoadConfigOptions,
	loadConfig,
	resolveEngineConfig,
	serialConfigSchema,
	type VmcConfig,
} from "./config.js";
export {
	type CommandOptions,
	type DeliveryEcho,
	type DeliveryStatus,
	type DispenseState,
	type ExecuteOptions,
	VendingEngine,
	type VendingEngineOptions,
} from "./engine.js";
export {
	ALL_LANES_UNAVAILABLE_MESSAGE,
	FountainController,
	type FountainControllerOptions,
	type HealthCheckResult,
	NOT_READY_MESSAGE,
} from "./fountain.js";
export {
	formatLaneReport,
	type LaneInfo,
	LaneManager,
	type LaneManagerOptions,
	type LaneRecord,
	type LaneSnapshot,
	type LaneStatus,
	type LaneStatusReport,
	type LaneStore,
	LOAD_BALANCE_THRESHOLD,
	MAX_CONSECUTIVE_FAILURES,
	MAX_FALLBACK_LANES,
	MemoryLaneStore,
} from "./lanes.js";
export {
	JsonFileLaneStore,
	type JsonFileLaneStoreOptions,
} from "./lane-file-store.js";
export {
	type Dispenser,
	type FaultRecoveryOptions,
	FaultRecoveryPolicy,
	type RecoveredDispenseResult,
} from "./recovery.js";
export {
	type DispenseFailureKind,
	type DispenseResult,
	dispenseFailed,
	dispenseSucceeded,
} from "./results.js";
export { SerialLock } from "./serial-lock.js";
export {
	COLUMN_COUNT,
	columnOf,
	isValidSlot,
	ROW_COUNT,
	rowOf,
	type SlotPosition,
	slotAt,
	slotPosition,
	slotsInRow,
	VALID_SLOTS,
} from "./slots.js";
