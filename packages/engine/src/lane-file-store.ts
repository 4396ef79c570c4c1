/**
 * Lane state persisted as a JSON file, so rotation and lane health survive
 * a restart of the controller.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type Logger, silentLogger } from "@vmc-link/core";
import { z } from "zod";
import type { LaneSnapshot, LaneStore } from "./lanes.js";

const laneRecordSchema = z.object({
	status: z.enum(["active", "empty", "failed", "disabled"]),
	failures: z.number().int().nonnegative(),
	successes: z.number().int().nonnegative(),
});

const laneSnapshotSchema = z.object({
	currentLane: z.number().int(),
	totalDispenses: z.number().int().nonnegative(),
	lanes: z.record(z.string().regex(/^\d+$/), laneRecordSchema),
});

export interface JsonFileLaneStoreOptions {
	/** File holding the snapshot; parent directories are created on write */
	path: string;
	logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class JsonFileLaneStore implements LaneStore {
	readonly path: string;

	private readonly logger: Logger;

	constructor(options: JsonFileLaneStoreOptions) {
		this.path = path.resolve(options.path);
		this.logger = (options.logger ?? silentLogger()).child({
			component: "lane-store",
		});
	}

	/**
	 * @returns The stored snapshot, or undefined when the file is missing or
	 * unreadable, in which case lanes start fresh
	 */
	read(): LaneSnapshot | undefined {
		let raw: string;
		try {
			raw = fs.readFileSync(this.path, "utf8");
		} catch (error) {
			if (!isMissingFile(error)) {
				this.logger.error({ err: error, path: this.path }, "failed to read lane state");
			}
			return undefined;
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (error) {
			this.logger.warn({ err: error, path: this.path }, "lane state is not JSON, ignoring");
			return undefined;
		}

		const parsed = laneSnapshotSchema.safeParse(json);
		if (!parsed.success) {
			this.logger.warn(
				{ path: this.path, issues: parsed.error.issues.length },
				"lane state has an unexpected shape, ignoring",
			);
			return undefined;
		}
		return parsed.data;
	}

	/**
	 * Replaces the file through a rename. A failed write is logged and the
	 * in-memory state carries on.
	 */
	write(snapshot: LaneSnapshot): void {
		const tmpPath = `${this.path}.tmp`;
		try {
			fs.mkdirSync(path.dirname(this.path), { recursive: true });
			fs.writeFileSync(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`);
			fs.renameSync(tmpPath, this.path);
		} catch (error) {
			this.logger.error({ err: error, path: this.path }, "failed to save lane state");
			fs.rmSync(tmpPath, { force: true });
		}
	}
}
