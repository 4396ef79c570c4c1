import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CreateLoggerOptions {
	/** Component name attached to every record */
	name?: string;
	/** @default "info" */
	level?: LogLevel;
	/** File descriptor records are written to. @default 1 */
	fd?: 1 | 2;
}

/**
 * Create a pino logger for a VMC component.
 *
 * Records are JSON lines on stdout, or stderr with `fd: 2` when stdout
 * carries command output. Pipe through `pino-pretty` when reading them by hand.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const pinoOptions: LoggerOptions = {
		level: options.level ?? "info",
		base: options.name ? { component: options.name } : null,
	};
	return pino(
		pinoOptions,
		pino.destination({ fd: options.fd ?? 1, sync: true }),
	);
}

/** A logger that drops everything; the default when callers pass none */
export function silentLogger(): Logger {
	return pino({ level: "silent" });
}
