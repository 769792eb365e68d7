import type { Random } from "./types";

export type SensorName =
	| "air_temp"
	| "air_humidity"
	| "air_pressure"
	| "water_temp"
	| "water_ph"
	| "water_ec"
	| "light_lux";

export interface SensorProfile {
	mean: number;
	stddev: number;
	/** Clamp bounds for normal operation. */
	min: number;
	max: number;
	/** Out-of-bounds ranges used when a sensor is flagged. */
	faults: readonly (readonly [number, number])[];
	integer?: boolean;
}

export const SENSOR_PROFILES: Readonly<Record<SensorName, SensorProfile>> = {
	air_temp: { mean: 24.0, stddev: 1.5, min: 18.0, max: 30.0, faults: [[15.0, 18.0], [30.0, 35.0]] },
	air_humidity: { mean: 55.0, stddev: 7.0, min: 30.0, max: 90.0, faults: [[20.0, 35.0], [85.0, 95.0]] },
	air_pressure: { mean: 1007.5, stddev: 3.5, min: 990.0, max: 1030.0, faults: [[990.0, 998.0], [1020.0, 1035.0]] },
	water_temp: { mean: 20.0, stddev: 1.2, min: 15.0, max: 28.0, faults: [[12.0, 16.0], [26.0, 32.0]] },
	water_ph: { mean: 6.3, stddev: 0.25, min: 4.5, max: 8.5, faults: [[4.5, 5.5], [7.5, 8.5]] },
	water_ec: { mean: 1.4, stddev: 0.18, min: 0.5, max: 3.0, faults: [[0.3, 0.7], [2.5, 3.5]] },
	light_lux: { mean: 500, stddev: 100, min: 50, max: 1500, faults: [[20, 80], [1200, 1800]], integer: true }
};

export const SENSOR_NAMES: readonly SensorName[] = [
	"air_temp",
	"air_humidity",
	"air_pressure",
	"water_temp",
	"water_ph",
	"water_ec",
	"light_lux"
];

export function clamp(v: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, v));
}

export function round2(v: number): number {
	return Math.round(v * 100) / 100;
}

/** Box-Muller transform. */
export function gauss(random: Random, mean: number, stddev: number): number {
	const u = 1 - random(); // (0, 1]
	const v = random();
	return mean + stddev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function pick<T>(random: Random, items: readonly T[]): T {
	return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

export function normalValue(random: Random, name: SensorName): number {
	const p = SENSOR_PROFILES[name];
	const v = clamp(gauss(random, p.mean, p.stddev), p.min, p.max);
	return p.integer ? Math.trunc(v) : round2(v);
}

export function faultValue(random: Random, name: SensorName): number {
	const p = SENSOR_PROFILES[name];
	const [lo, hi] = pick(random, p.faults);
	const v = lo + random() * (hi - lo);
	return p.integer ? Math.trunc(clamp(v, lo, hi)) : round2(v);
}

function pad(n: number, width = 2): string {
	return String(Math.trunc(Math.abs(n))).padStart(width, "0");
}

/** Local time with numeric offset, e.g. 2026-01-23T12:34:56.789+02:00. */
export function localIsoTimestamp(d: Date = new Date()): string {
	const offsetMin = -d.getTimezoneOffset();
	const sign = offsetMin >= 0 ? "+" : "-";
	return (
		`${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
		`T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}` +
		`${sign}${pad(offsetMin / 60)}:${pad(offsetMin % 60)}`
	);
}
