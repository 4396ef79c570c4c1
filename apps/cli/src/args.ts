import { ArgumentError } from "@vmc-link/device";

export interface CommandLine {
	command: string | undefined;
	positionals: string[];
	/** Flags without their leading dashes; switches map to true */
	flags: Map<string, string | true>;
}

/** Flags that always take a value */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
	"command-timeout",
	"poll-interval",
	"max-poll-attempts",
	"baud-rate",
	"device",
	"log-level",
	"fault",
	"fault-slot",
	"busy",
	"retries",
	"mode",
	"lane-state",
]);

/** Switches that may be followed by an explicit boolean */
const OPTIONAL_VALUE_FLAGS: ReadonlySet<string> = new Set(["auto-clear-faults"]);

const BOOLEAN_WORDS: ReadonlySet<string> = new Set([
	"true",
	"false",
	"1",
	"0",
	"yes",
	"no",
	"on",
	"off",
]);

/**
 * Split CLI arguments into a command, its positionals and flags
 *
 * @param argv - Arguments after the program name
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
	const positionals: string[] = [];
	const flags = new Map<string, string | true>();

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;

		if (arg === "-h") {
			flags.set("help", true);
			continue;
		}
		if (!arg.startsWith("--")) {
			positionals.push(arg);
			continue;
		}

		const eq = arg.indexOf("=");
		if (eq !== -1) {
			flags.set(arg.slice(2, eq), arg.slice(eq + 1));
			continue;
		}

		const name = arg.slice(2);
		const next = argv[i + 1];
		if (VALUE_FLAGS.has(name)) {
			if (next === undefined) {
				throw new ArgumentError(`--${name} needs a value`);
			}
			flags.set(name, next);
			i++;
		} else if (OPTIONAL_VALUE_FLAGS.has(name) && next !== undefined && BOOLEAN_WORDS.has(next)) {
			flags.set(name, next);
			i++;
		} else {
			flags.set(name, true);
		}
	}

	const [command, ...rest] = positionals;
	return { command, positionals: rest, flags };
}

/**
 * Parse a decimal or 0x-prefixed hex integer
 *
 * @throws ArgumentError naming the argument
 */
export function parseInteger(text: string, name: string): number {
	const value = /^0x[0-9a-f]+$/i.test(text) ? Number.parseInt(text, 16) : Number(text);
	if (text.trim() === "" || !Number.isInteger(value)) {
		throw new ArgumentError(`${name} must be an integer (got "${text}")`);
	}
	return value;
}

export function integerFlag(
	flags: ReadonlyMap<string, string | true>,
	name: string,
	fallback: number,
): number {
	const value = flags.get(name);
	if (value === undefined) {
		return fallback;
	}
	if (value === true) {
		throw new ArgumentError(`--${name} needs a value`);
	}
	return parseInteger(value, `--${name}`);
}

export function stringFlag(
	flags: ReadonlyMap<string, string | true>,
	name: string,
): string | undefined {
	const value = flags.get(name);
	if (value === true) {
		throw new ArgumentError(`--${name} needs a value`);
	}
	return value;
}

/** The positional at `index`, or an ArgumentError naming it */
export function requirePositional(
	positionals: readonly string[],
	index: number,
	name: string,
): string {
	const value = positionals[index];
	if (value === undefined) {
		throw new ArgumentError(`Missing argument: <${name}>`);
	}
	return value;
}
