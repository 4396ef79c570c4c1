/**
 * vmc-link command line: frame tools and simulator runs.
 *
 * Every command prints one JSON document on stdout. Logs go to stderr.
 * Engine and serial settings come from loadConfig(), so the shared flags
 * (--command-timeout, --poll-interval, ...) and VMC_* variables apply.
 */

import { createLogger } from "@vmc-link/core";
import { ArgumentError, errorMessage } from "@vmc-link/device";
import type { SimulatedFault } from "@vmc-link/device-transport-simulator";
import { loadConfig } from "@vmc-link/engine";
import {
	type CommandLine,
	integerFlag,
	parseCommandLine,
	parseInteger,
	requirePositional,
	stringFlag,
} from "./args.js";
import { handleDecode, parseMode } from "./commands/decode.js";
import { ENCODERS, handleEncode } from "./commands/encode.js";
import { handleFountain } from "./commands/fountain.js";
import { handleSimulate, parseFault } from "./commands/simulate.js";

export interface CliIo {
	out(text: string): void;
	err(text: string): void;
}

export interface RunCliOptions {
	/** @default process.env */
	env?: Readonly<Record<string, string | undefined>>;
}

export const USAGE = [
	"Usage: vmc-link <command> [options]",
	"",
	"Commands:",
	"  decode <hex> [--mode status|balance]   Decode frames from hex",
	"  encode <command> [args...]             Build a host frame",
	"  simulate <slot> [--fault motor|optical|<code>] [--persistent]",
	"           [--busy <polls>] [--retries <n>]",
	"                                         Dispense on a simulated board",
	"  fountain [count] [--fault <kind>] [--fault-slot <slot>] [--lane-state <file>]",
	"                                         Run the fountain controller on a simulated board",
	"",
	"Encodable commands:",
	...[...ENCODERS.values()].map((e) => `  ${e.usage}`),
	"",
	"Options:",
	"  --command-timeout <ms>  --poll-interval <ms>  --max-poll-attempts <n>",
	"  --baud-rate <baud>  --device <path>  --log-level <level>",
	"  --[no-]auto-clear-faults",
].join("\n");

interface Outcome {
	output: unknown;
	ok: boolean;
}

async function dispatch(
	line: CommandLine,
	argv: readonly string[],
	options: RunCliOptions,
): Promise<Outcome> {
	const { command, positionals, flags } = line;

	switch (command) {
		case "decode":
			return {
				output: handleDecode(
					positionals.join(" ") || requirePositional(positionals, 0, "hex"),
					parseMode(stringFlag(flags, "mode")),
				),
				ok: true,
			};

		case "encode":
			return {
				output: handleEncode(
					requirePositional(positionals, 0, "command"),
					positionals.slice(1),
				),
				ok: true,
			};

		case "simulate": {
			const config = loadConfig({ argv, env: options.env });
			const logger = createLogger({ name: "cli", level: config.logLevel, fd: 2 });
			const fault = stringFlag(flags, "fault");
			const report = await handleSimulate(
				{
					slot: parseInteger(requirePositional(positionals, 0, "slot"), "slot"),
					fault: fault === undefined ? undefined : parseFault(fault),
					persistent: flags.has("persistent"),
					busyPolls: integerFlag(flags, "busy", 0),
					retries: integerFlag(flags, "retries", 0),
				},
				config,
				logger,
			);
			return { output: report, ok: report.result.success };
		}

		case "fountain": {
			const config = loadConfig({ argv, env: options.env });
			const logger = createLogger({ name: "cli", level: config.logLevel, fd: 2 });
			const count = positionals[0];
			const fault = stringFlag(flags, "fault");
			const faults = new Map<number, SimulatedFault>();
			if (fault !== undefined) {
				const slot = integerFlag(flags, "fault-slot", config.fountain.lanes[0] ?? 1);
				faults.set(slot, parseFault(fault));
			}
			const report = await handleFountain(
				{
					count: count === undefined ? 1 : parseInteger(count, "count"),
					faults,
					laneStatePath: stringFlag(flags, "lane-state"),
				},
				config,
				logger,
			);
			return { output: report, ok: report.results.every((r) => r.success) };
		}

		default:
			throw new ArgumentError(`Unknown command: ${command}`);
	}
}

/**
 * Run one CLI invocation
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function runCli(
	argv: readonly string[],
	io: CliIo,
	options: RunCliOptions = {},
): Promise<number> {
	try {
		const line = parseCommandLine(argv);
		if (line.command === undefined || line.command === "help" || line.flags.has("help")) {
			io.out(USAGE);
			return line.command === undefined && !line.flags.has("help") ? 1 : 0;
		}

		const { output, ok } = await dispatch(line, argv, options);
		io.out(JSON.stringify(output, null, 2));
		return ok ? 0 : 1;
	} catch (error) {
		io.err(`Error: ${errorMessage(error)}`);
		return 1;
	}
}
