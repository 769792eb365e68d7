import path from "node:path";
import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";
import { AppError } from "./errors";

const ARGV = ["node", "host"];

describe("loadConfig", () => {
	it("falls back to defaults", () => {
		expect(loadConfig(ARGV, {})).toEqual({
			server: { host: "0.0.0.0", port: 8000, maxBodyBytes: 65536 },
			paths: {
				sqlite: path.resolve("./data/farm.db"),
				logDir: path.resolve("./logs")
			},
			logLevel: "info",
			alerts: { cooldownMs: 10000 }
		});
	});

	it("reads the environment", () => {
		const cfg = loadConfig(ARGV, {
			HOST: "127.0.0.1",
			PORT: "9000",
			SQLITE_PATH: ":memory:",
			LOG_LEVEL: "DEBUG",
			ALERT_COOLDOWN_MS: "2500",
			MAX_BODY_BYTES: "1024"
		});

		expect(cfg.server).toEqual({ host: "127.0.0.1", port: 9000, maxBodyBytes: 1024 });
		expect(cfg.paths.sqlite).toBe(":memory:");
		expect(cfg.logLevel).toBe("debug");
		expect(cfg.alerts.cooldownMs).toBe(2500);
	});

	it("lets flags win over the environment", () => {
		const cfg = loadConfig([...ARGV, "--port", "9100", "--log-level", "warn", "--sqlite", "/tmp/x.db"], {
			PORT: "9000",
			LOG_LEVEL: "debug"
		});

		expect(cfg.server.port).toBe(9100);
		expect(cfg.logLevel).toBe("warn");
		expect(cfg.paths.sqlite).toBe("/tmp/x.db");
	});

	it.each([
		[{ PORT: "abc" }, "port must be a positive integer"],
		[{ PORT: "70000" }, "port must be between 1 and 65535"],
		[{ ALERT_COOLDOWN_MS: "-5" }, "ALERT_COOLDOWN_MS must be a positive integer"],
		[{ LOG_LEVEL: "loud" }, "logLevel must be one of: error, warn, info, http, verbose, debug, silly"]
	])("rejects %o", (env, message) => {
		let caught: unknown;
		try {
			loadConfig(ARGV, env);
		} catch (err) {
			caught = err;
		}
		expect(caught).toBeInstanceOf(AppError);
		expect(caught).toMatchObject({ code: "CONFIG_ERROR", message });
	});
});
