import type { GeneratedEvent, GeneratorModule, Random } from "./types";
import { SENSOR_NAMES, faultValue, localIsoTimestamp, normalValue, pick, type SensorName } from "./readings";

export const CYCLE_PACKETS = 40;
export const FAULT_PACKETS = 10;

/**
 * Steady readings, except that every 40-packet cycle opens with 10 packets in
 * which one randomly chosen sensor reads out of bounds.
 */
const FlaggedGenerator: GeneratorModule = {
	name: "flagged",

	create(deviceId: string, random: Random = Math.random) {
		let seq = 0;
		let faulty: SensorName | null = null;

		const value = (name: SensorName): number =>
			name === faulty ? faultValue(random, name) : normalValue(random, name);

		return {
			deviceId,
			next(now = new Date()): GeneratedEvent {
				const position = seq % CYCLE_PACKETS;
				if (position === 0) {
					faulty = pick(random, SENSOR_NAMES);
				} else if (position === FAULT_PACKETS) {
					faulty = null;
				}

				seq += 1;

				return {
					type: "sensor",
					ts: localIsoTimestamp(now),
					device: deviceId,
					seq,
					air: {
						t_c: value("air_temp"),
						rh_pct: value("air_humidity"),
						p_hpa: value("air_pressure")
					},
					water: {
						t_c: value("water_temp"),
						ph: value("water_ph"),
						ec_ms_cm: value("water_ec")
					},
					light: { lux: value("light_lux") },
					level: { float: pick(random, [0, 1]) },
					flagged: faulty ? [faulty] : []
				};
			}
		};
	}
};

export default FlaggedGenerator;
