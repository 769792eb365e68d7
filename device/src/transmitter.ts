import pMap from "p-map";

import { getGenerator } from "./generators";
import { loadConfig } from "./lib/config";
import { runDevice } from "./lib/device-loop";
import { createLogger } from "./lib/log";
import { createSender } from "./lib/sender";

async function main(): Promise<void> {
	const config = loadConfig();
	const logger = createLogger("mock-device", config.logLevel);

	const generator = getGenerator(config.generator);
	const sender = createSender({ ...config, logger });

	logger.info(
		"Mock device starting url=%s generator=%s devices=%s intervalMs=%d",
		config.url,
		config.generator,
		config.devices.join(","),
		config.intervalMs
	);

	let running = true;
	process.on("SIGINT", () => {
		logger.info("Stopping mock device (signal=SIGINT)");
		running = false;
	});
	process.on("SIGTERM", () => {
		running = false;
	});

	const results = await pMap(
		config.devices,
		deviceId =>
			runDevice({
				generator: generator.create(deviceId),
				sender,
				config,
				logger,
				shouldRun: () => running
			}),
		{ concurrency: config.concurrency }
	);

	for (const r of results) {
		logger.info("device=%s sent=%d failed=%d invalid=%d", r.deviceId, r.sent, r.failed, r.invalid);
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
