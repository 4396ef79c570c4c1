import { describe, expect, it } from "vitest";
import { createLogger, LOG_LEVELS, silentLogger } from "../src/logger.js";

describe("createLogger", () => {
	it("defaults to info", () => {
		expect(createLogger().level).toBe("info");
	});

	it("takes a level and a component name", () => {
		const logger = createLogger({ name: "engine", level: "debug", fd: 2 });

		expect(logger.level).toBe("debug");
		expect(logger.bindings()).toEqual({ component: "engine" });
	});

	it("adds child bindings", () => {
		const child = createLogger({ name: "engine" }).child({ slot: 3 });
		expect(child.bindings()).toEqual({ component: "engine", slot: 3 });
	});
});

describe("silentLogger", () => {
	it("drops every level", () => {
		const logger = silentLogger();

		expect(logger.level).toBe("silent");
		const enabled = LOG_LEVELS.filter(
			(level) => level !== "silent" && logger.isLevelEnabled(level),
		);
		expect(enabled).toEqual([]);
	});
});
