#!/usr/bin/env node
/**
 * vmc-link executable
 *
 * Usage:
 *   vmc-link <command> [options]
 *
 * Environment variables:
 *   VMC_COMMAND_TIMEOUT_MS, VMC_POLL_INTERVAL_MS, VMC_MAX_POLL_ATTEMPTS,
 *   VMC_BAUD_RATE, VMC_DEVICE_PATH, VMC_LOG_LEVEL, VMC_AUTO_CLEAR_FAULTS
 */

import { runCli } from "./cli.js";

process.exitCode = await runCli(process.argv.slice(2), {
	out: (text) => process.stdout.write(`${text}\n`),
	err: (text) => process.stderr.write(`${text}\n`),
});
