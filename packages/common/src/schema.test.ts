import { describe, expect, it } from "vitest";

import { SensorEventSchema } from "./schema";

describe("SensorEventSchema", () => {
	const base = { type: "sensor", ts: "2026-03-01T10:00:00+00:00", device: "farm-1", seq: 3 };

	it("fills missing reading groups with null", () => {
		const res = SensorEventSchema.parse(base);
		expect(res).toEqual({ ...base, air: null, water: null, light: null, level: null });
	});

	it("coerces integer strings and truncates fractional numbers for seq", () => {
		expect(SensorEventSchema.parse({ ...base, seq: "42" }).seq).toBe(42);
		expect(SensorEventSchema.parse({ ...base, seq: 7.9 }).seq).toBe(7);
	});

	it("rejects seq that is not an integer", () => {
		expect(SensorEventSchema.safeParse({ ...base, seq: "7.5" }).success).toBe(false);
		expect(SensorEventSchema.safeParse({ ...base, seq: "abc" }).success).toBe(false);
		expect(SensorEventSchema.safeParse({ ...base, seq: -1 }).success).toBe(false);
		expect(SensorEventSchema.safeParse({ ...base, seq: true }).success).toBe(false);
	});

	it("rejects an empty device", () => {
		expect(SensorEventSchema.safeParse({ ...base, device: "  " }).success).toBe(false);
	});

	it("keeps the device id exactly as sent", () => {
		expect(SensorEventSchema.parse({ ...base, device: "rack " }).device).toBe("rack ");
	});

	it("rejects seq beyond the safe integer range", () => {
		expect(SensorEventSchema.safeParse({ ...base, seq: "9007199254740993" }).success).toBe(false);
		expect(SensorEventSchema.safeParse({ ...base, seq: 2 ** 53 }).success).toBe(false);
		expect(SensorEventSchema.parse({ ...base, seq: Number.MAX_SAFE_INTEGER }).seq).toBe(Number.MAX_SAFE_INTEGER);
	});

	it("reads boolean float switches as 0 and 1", () => {
		expect(SensorEventSchema.parse({ ...base, level: { float: false } }).level).toEqual({ float: 0 });
		expect(SensorEventSchema.parse({ ...base, level: { float: true } }).level).toEqual({ float: 1 });
		expect(SensorEventSchema.parse({ ...base, level: { float: "low" } }).level).toEqual({ float: null });
	});

	it("turns non-numeric readings into null instead of failing", () => {
		const res = SensorEventSchema.parse({
			...base,
			water: { ph: "acidic", ec_ms_cm: 1.2 },
			level: "full"
		});
		expect(res.water).toEqual({ t_c: null, ph: null, ec_ms_cm: 1.2 });
		expect(res.level).toBeNull();
	});
});
