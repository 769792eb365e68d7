import { createApp } from "./app";
import { HostServer } from "./server";
import { loadConfig } from "./shared/config";
import { createLogger } from "./shared/log";

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "host",
		level: config.logLevel
	});

	logger.info("Host starting (sqlite=%s cooldownMs=%d)", config.paths.sqlite, config.alerts.cooldownMs);

	const app = createApp({
		sqlitePath: config.paths.sqlite,
		logger,
		cooldownMs: config.alerts.cooldownMs
	});

	const server = new HostServer({ config: config.server, gateway: app.gateway, logger });

	try {
		await server.start();
	} catch (err) {
		app.close();
		throw err;
	}

	let stopping = false;
	const stop = (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info("Stopping host (signal=%s)", signal);

		server
			.stop()
			.catch((err: unknown) => {
				logger.error("Server shutdown failed: %s", err instanceof Error ? err.message : String(err));
			})
			.finally(() => {
				app.close();
				logger.info("Host exiting");
				process.exit(0);
			});
	};

	process.on("SIGINT", () => stop("SIGINT"));
	process.on("SIGTERM", () => stop("SIGTERM"));
}

main().catch(err => {
	console.error(err);
	process.exit(1);
});
