import type { GeneratedEvent, GeneratorModule, Random } from "./types";
import { localIsoTimestamp, normalValue, pick } from "./readings";

/** Readings around optimal operating conditions, with natural variation. */
export function steadyReadings(random: Random): Omit<GeneratedEvent, "type" | "ts" | "device" | "seq"> {
	return {
		air: {
			t_c: normalValue(random, "air_temp"),
			rh_pct: normalValue(random, "air_humidity"),
			p_hpa: normalValue(random, "air_pressure")
		},
		water: {
			t_c: normalValue(random, "water_temp"),
			ph: normalValue(random, "water_ph"),
			ec_ms_cm: normalValue(random, "water_ec")
		},
		light: { lux: normalValue(random, "light_lux") },
		level: { float: pick(random, [0, 1]) }
	};
}

const SteadyGenerator: GeneratorModule = {
	name: "steady",

	create(deviceId: string, random: Random = Math.random) {
		let seq = 0;

		return {
			deviceId,
			next(now = new Date()): GeneratedEvent {
				seq += 1;
				return {
					type: "sensor",
					ts: localIsoTimestamp(now),
					device: deviceId,
					seq,
					...steadyReadings(random)
				};
			}
		};
	}
};

export default SteadyGenerator;
