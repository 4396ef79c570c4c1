/**
 * Configuration for the VMC engine and fountain controller.
 *
 * Reads configuration from:
 * 1. CLI flags (--command-timeout, --poll-interval, --max-poll-attempts,
 *    --baud-rate, --device, --log-level, --[no-]auto-clear-faults)
 * 2. Environment variables (VMC_COMMAND_TIMEOUT_MS, VMC_POLL_INTERVAL_MS,
 *    VMC_MAX_POLL_ATTEMPTS, VMC_BAUD_RATE, VMC_DEVICE_PATH, VMC_LOG_LEVEL,
 *    VMC_AUTO_CLEAR_FAULTS)
 * 3. Defaults
 */

import { LOG_LEVELS, type LogLevel } from "@vmc-link/core";
import {
	ArgumentError,
	DEFAULT_SERIAL_CONFIG,
	type SerialConfig,
} from "@vmc-link/device";
import { z } from "zod";

// ── Schemas ────────────────────────────────────────────────────────────────

export const engineConfigSchema = z.object({
	commandTimeoutMs: z.number().int().positive(),
	pollIntervalMs: z.number().int().nonnegative(),
	maxPollAttempts: z.number().int().positive(),
});

export type EngineConfig = Readonly<z.infer<typeof engineConfigSchema>>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
	commandTimeoutMs: 5000,
	pollIntervalMs: 500,
	maxPollAttempts: 20,
});

export const serialConfigSchema = z.object({
	baudRate: z.number().int().min(9600).max(115200),
	dataBits: z.union([z.literal(5), z.literal(6), z.literal(7), z.literal(8)]),
	stopBits: z.union([z.literal(1), z.literal(2)]),
	parity: z.enum(["none", "odd", "even"]),
	flowControl: z.enum(["none", "hardware", "software"]),
	devicePath: z.string().min(1).optional(),
}) satisfies z.ZodType<SerialConfig>;

export const fountainConfigSchema = z.object({
	/** Send REMOVE_FAULT right after connecting */
	autoClearFaults: z.boolean(),
	/** Lanes the controller rotates through */
	lanes: z.array(z.number().int().min(1).max(255)).min(1),
});

export type FountainConfig = z.infer<typeof fountainConfigSchema>;

export const DEFAULT_FOUNTAIN_CONFIG: Readonly<FountainConfig> = Object.freeze({
	autoClearFaults: true,
	lanes: [1, 2, 3, 4, 5, 6, 7, 8],
});

export interface VmcConfig {
	engine: EngineConfig;
	serial: SerialConfig;
	fountain: FountainConfig;
	logLevel: LogLevel;
}

// ── Validation ─────────────────────────────────────────────────────────────

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

/**
 * Parse a value against a schema, raising ArgumentError with every issue
 */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	value: unknown,
	what: string,
): T {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		throw new ArgumentError(
			`Invalid ${what}: ${describeIssues(parsed.error)}`,
		);
	}
	return parsed.data;
}

/**
 * Merge overrides onto the defaults and validate
 *
 * @throws ArgumentError if any value is out of range
 */
export function resolveEngineConfig(
	overrides: Partial<EngineConfig> = {},
): EngineConfig {
	const merged = {
		commandTimeoutMs:
			overrides.commandTimeoutMs ?? DEFAULT_ENGINE_CONFIG.commandTimeoutMs,
		pollIntervalMs:
			overrides.pollIntervalMs ?? DEFAULT_ENGINE_CONFIG.pollIntervalMs,
		maxPollAttempts:
			overrides.maxPollAttempts ?? DEFAULT_ENGINE_CONFIG.maxPollAttempts,
	};
	return Object.freeze(validate(engineConfigSchema, merged, "engine config"));
}

// ── Sources ────────────────────────────────────────────────────────────────

/** Raw string settings keyed by their config name */
type RawSettings = Partial<Record<SettingName, string>>;

const SETTINGS = {
	commandTimeoutMs: { flag: "--command-timeout", env: "VMC_COMMAND_TIMEOUT_MS" },
	pollIntervalMs: { flag: "--poll-interval", env: "VMC_POLL_INTERVAL_MS" },
	maxPollAttempts: { flag: "--max-poll-attempts", env: "VMC_MAX_POLL_ATTEMPTS" },
	baudRate: { flag: "--baud-rate", env: "VMC_BAUD_RATE" },
	devicePath: { flag: "--device", env: "VMC_DEVICE_PATH" },
	logLevel: { flag: "--log-level", env: "VMC_LOG_LEVEL" },
	autoClearFaults: { flag: "--auto-clear-faults", env: "VMC_AUTO_CLEAR_FAULTS" },
} as const;

type SettingName = keyof typeof SETTINGS;

const SETTING_NAMES = Object.keys(SETTINGS).filter(
	(key): key is SettingName => key in SETTINGS,
);

const NEGATED_AUTO_CLEAR = "--no-auto-clear-faults";

/**
 * Pick config flags out of CLI arguments. Other arguments are ignored so
 * commands can share argv with their own positionals.
 *
 * @param argv - Arguments after the program name
 */
function parseCliArgs(argv: readonly string[]): RawSettings {
	const settings: RawSettings = {};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		if (arg === NEGATED_AUTO_CLEAR) {
			settings.autoClearFaults = "false";
			continue;
		}

		for (const name of SETTING_NAMES) {
			const { flag } = SETTINGS[name];
			if (arg.startsWith(`${flag}=`)) {
				settings[name] = arg.slice(flag.length + 1);
			} else if (arg === flag) {
				const next = argv[i + 1];
				if (name === "autoClearFaults" && (next === undefined || next.startsWith("--"))) {
					settings[name] = "true";
				} else if (next !== undefined) {
					settings[name] = next;
					i++;
				}
			}
		}
	}

	return settings;
}

function readEnv(env: Readonly<Record<string, string | undefined>>): RawSettings {
	const settings: RawSettings = {};
	for (const name of SETTING_NAMES) {
		const value = env[SETTINGS[name].env];
		if (value !== undefined && value.trim() !== "") {
			settings[name] = value.trim();
		}
	}
	return settings;
}

const booleanSetting = z
	.enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
	.transform((value) => ["true", "1", "yes", "on"].includes(value));

const settingsSchema = z.object({
	commandTimeoutMs: z.coerce.number().optional(),
	pollIntervalMs: z.coerce.number().optional(),
	maxPollAttempts: z.coerce.number().optional(),
	baudRate: z.coerce.number().optional(),
	devicePath: z.string().optional(),
	logLevel: z.enum(LOG_LEVELS).optional(),
	autoClearFaults: booleanSetting.optional(),
});

export interface LoadConfigOptions {
	/** CLI arguments after the program name. @default process.argv.slice(2) */
	argv?: readonly string[];
	/** @default process.env */
	env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Load configuration from all sources.
 *
 * Priority: CLI flags > environment variables > defaults
 *
 * @throws ArgumentError listing every invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): VmcConfig {
	const cli = parseCliArgs(options.argv ?? process.argv.slice(2));
	const env = readEnv(options.env ?? process.env);
	const settings = validate(settingsSchema, { ...env, ...cli }, "configuration");

	const engine = resolveEngineConfig({
		commandTimeoutMs: settings.commandTimeoutMs,
		pollIntervalMs: settings.pollIntervalMs,
		maxPollAttempts: settings.maxPollAttempts,
	});

	const serial = validate(
		serialConfigSchema,
		{
			...DEFAULT_SERIAL_CONFIG,
			baudRate: settings.baudRate ?? DEFAULT_SERIAL_CONFIG.baudRate,
			devicePath: settings.devicePath,
		},
		"serial config",
	);

	const fountain = validate(
		fountainConfigSchema,
		{
			...DEFAULT_FOUNTAIN_CONFIG,
			autoClearFaults:
				settings.autoClearFaults ?? DEFAULT_FOUNTAIN_CONFIG.autoClearFaults,
		},
		"fountain config",
	);

	return {
		engine,
		serial,
		fountain,
		logLevel: settings.logLevel ?? "info",
	};
}
