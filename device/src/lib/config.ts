import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";

import { generatorNames } from "../generators";

export interface TransmitterConfig {
	url: string;
	generator: string;
	devices: string[];
	intervalMs: number;
	/** Stop after this many events per device; 0 runs until interrupted. */
	count: number;
	timeoutMs: number;
	retries: number;
	backoffMs: number;
	maxBackoffMs: number;
	concurrency: number;
	logLevel: string;
}

/* ---------- defaults ---------- */

const DEFAULT_URL = "http://127.0.0.1:8000/ingest";
const DEFAULT_DEVICE = "farm-esp32-1";

function positiveInt(raw: string): number {
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		throw new InvalidArgumentError("must be a positive integer");
	}
	return n;
}

function nonNegativeInt(raw: string): number {
	const n = Number(raw);
	if (!Number.isInteger(n) || n < 0) {
		throw new InvalidArgumentError("must be a non-negative integer");
	}
	return n;
}

function deviceList(raw: string): string[] {
	const ids = raw
		.split(",")
		.map(s => s.trim())
		.filter(Boolean);
	if (ids.length === 0) {
		throw new InvalidArgumentError("at least one device id is required");
	}
	return ids;
}

/* ---------- validation ---------- */

function validateConfig(cfg: TransmitterConfig): void {
	let parsed: URL;
	try {
		parsed = new URL(cfg.url);
	} catch {
		throw new Error(`url is not a valid URL: ${cfg.url}`);
	}
	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new Error("url must use http or https");
	}
	if (!generatorNames().includes(cfg.generator)) {
		throw new Error(`generator must be one of: ${generatorNames().join(", ")}`);
	}
	if (cfg.maxBackoffMs < cfg.backoffMs) {
		throw new Error("maxBackoffMs must be >= backoffMs");
	}
}

/* ---------- public API ---------- */

export function loadConfig(argv: readonly string[] = process.argv): TransmitterConfig {
	const program = new Command();

	program
		.name("mock-device")
		.description("Send synthetic sensor events to the host")
		.option("-u, --url <url>", "Ingest endpoint", process.env.INGEST_URL ?? DEFAULT_URL)
		.option("-g, --generator <name>", `One of: ${generatorNames().join(", ")}`, "steady")
		.option("-d, --devices <ids>", "Comma-separated device ids", deviceList, [process.env.DEVICE_ID ?? DEFAULT_DEVICE])
		.option("-i, --interval-ms <ms>", "Delay between events per device", positiveInt, 1000)
		.option("-n, --count <n>", "Events per device (0 = forever)", nonNegativeInt, 0)
		.option("--timeout-ms <ms>", "HTTP timeout per attempt", positiveInt, 3000)
		.option("--retries <n>", "Retries per event after the first attempt", nonNegativeInt, 5)
		.option("--backoff-ms <ms>", "Initial retry backoff", positiveInt, 500)
		.option("--max-backoff-ms <ms>", "Backoff ceiling", positiveInt, 8000)
		.option("--concurrency <n>", "Devices sending at the same time", positiveInt, 4)
		.option("--log-level <level>", "Log level", process.env.LOG_LEVEL ?? "info")
		.allowExcessArguments(false);

	program.parse(Array.from(argv));

	const cfg = program.opts<TransmitterConfig>();
	validateConfig(cfg);
	return cfg;
}
