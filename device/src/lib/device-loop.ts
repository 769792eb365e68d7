import type winston from "winston";
import { SensorEventSchema } from "@vertical-farm/common";

import type { EventGenerator } from "../generators/types";
import type { TransmitterConfig } from "./config";
import { sleep, type Sender } from "./sender";

export interface DeviceStats {
	deviceId: string;
	sent: number;
	failed: number;
	invalid: number;
}

/**
 * Drive one mock device: generate, check against the shared schema, send,
 * wait. Stops after `count` events (0 = never) or when `shouldRun` turns false.
 */
export async function runDevice(params: {
	generator: EventGenerator;
	sender: Sender;
	config: Pick<TransmitterConfig, "count" | "intervalMs">;
	logger: winston.Logger;
	shouldRun?: () => boolean;
	wait?: (ms: number) => Promise<void>;
}): Promise<DeviceStats> {
	const { generator, sender, config, logger } = params;
	const shouldRun = params.shouldRun ?? (() => true);
	const wait = params.wait ?? sleep;

	const stats: DeviceStats = { deviceId: generator.deviceId, sent: 0, failed: 0, invalid: 0 };

	for (let i = 0; (config.count === 0 || i < config.count) && shouldRun(); i++) {
		const event = generator.next();

		const check = SensorEventSchema.safeParse(event);
		if (!check.success) {
			stats.invalid++;
			logger.error("Generated event failed validation seq=%d: %s", event.seq, check.error.message);
		} else {
			const res = await sender.send(event);
			if (res.ok) {
				stats.sent++;
				logger.info(
					"[OK] device=%s seq=%d ts=%s ph=%s ec=%s lux=%s",
					event.device,
					event.seq,
					event.ts,
					String(event.water?.ph),
					String(event.water?.ec_ms_cm),
					String(event.light?.lux)
				);
			} else {
				stats.failed++;
			}
		}

		if (config.count === 0 || i + 1 < config.count) {
			await wait(config.intervalMs);
		}
	}

	return stats;
}
