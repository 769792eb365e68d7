import { config as loadEnv } from "dotenv";
import path from "node:path";
import { Command } from "commander";

import { configError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface ServerConfig {
	host: string;
	port: number;
	maxBodyBytes: number;
}

export interface AlertsConfig {
	cooldownMs: number;
}

export interface AppConfig {
	server: ServerConfig;
	paths: {
		sqlite: string;
		logDir: string;
	};
	logLevel: LogLevel;
	alerts: AlertsConfig;
}

interface CliOptions {
	host?: string;
	port?: string;
	sqlite?: string;
	logDir?: string;
	logLevel?: string;
}

/* ---------- defaults ---------- */

const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_PORT = 8000;
const DEFAULT_SQLITE = "./data/farm.db";
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_COOLDOWN_MS = 10_000;
const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function parseCommandLine(argv: readonly string[]): CliOptions {
	const program = new Command();

	program
		.name("vertical-farm-host")
		.option("--host <host>", "Interface to listen on")
		.option("-p, --port <port>", "HTTP/WebSocket port")
		.option("--sqlite <path>", "Path to the SQLite database file")
		.option("--log-dir <dir>", "Directory for rotated log files")
		.option("--log-level <level>", `One of: ${LOG_LEVELS.join(", ")}`)
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(Array.from(argv));

	return program.opts<CliOptions>();
}

type Env = Record<string, string | undefined>;

function optionalString(raw: string | undefined, def: string): string {
	if (raw === undefined || raw.trim() === "") return def;
	return raw.trim();
}

function positiveInt(name: string, raw: string | undefined, def: number): number {
	if (raw === undefined || raw.trim() === "") return def;
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		throw configError(`${name} must be a positive integer`, { value: raw });
	}
	return n;
}

function isLogLevel(v: string): v is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(v);
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	if (cfg.server.port > 65535) {
		throw configError("port must be between 1 and 65535", { port: cfg.server.port });
	}
	if (!cfg.paths.sqlite) {
		throw configError("sqlite path is required");
	}
}

/* ---------- public API ---------- */

/**
 * Build the host configuration. Precedence: command-line flags, then
 * environment (including `.env`), then defaults.
 */
export function loadConfig(argv: readonly string[] = process.argv, env: Env = process.env): AppConfig {
	if (env === process.env) {
		loadEnv();
	}

	const cli = parseCommandLine(argv);

	const logLevel = optionalString(cli.logLevel ?? env.LOG_LEVEL, DEFAULT_LOG_LEVEL).toLowerCase();
	if (!isLogLevel(logLevel)) {
		throw configError(`logLevel must be one of: ${LOG_LEVELS.join(", ")}`, { value: logLevel });
	}

	const sqlite = optionalString(cli.sqlite ?? env.SQLITE_PATH, DEFAULT_SQLITE);

	const cfg: AppConfig = {
		server: {
			host: optionalString(cli.host ?? env.HOST, DEFAULT_HOST),
			port: positiveInt("port", cli.port ?? env.PORT, DEFAULT_PORT),
			maxBodyBytes: positiveInt("MAX_BODY_BYTES", env.MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES)
		},
		paths: {
			sqlite: sqlite === ":memory:" ? sqlite : path.resolve(sqlite),
			logDir: path.resolve(optionalString(cli.logDir ?? env.LOG_DIR, DEFAULT_LOG_DIR))
		},
		logLevel,
		alerts: {
			cooldownMs: positiveInt("ALERT_COOLDOWN_MS", env.ALERT_COOLDOWN_MS, DEFAULT_COOLDOWN_MS)
		}
	};

	validateConfig(cfg);

	return cfg;
}
