import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Alert, SensorEvent } from "@vertical-farm/common";

import { initDb, openDb, type DbHandle } from "../shared/db";
import { AppError } from "../shared/errors";
import { createEventStore, parseStoredPayload, type EventStore } from "./event-store";

function event(device: string, seq: number, extra: Partial<SensorEvent> = {}): SensorEvent {
	return {
		type: "sensor",
		ts: `2026-03-01T10:00:${String(seq).padStart(2, "0")}+00:00`,
		device,
		seq,
		air: { t_c: 22.5, rh_pct: 60, p_hpa: 1012 },
		water: { t_c: 20.1, ph: 6.1, ec_ms_cm: 1.4 },
		light: { lux: 12000 },
		level: { float: 1 },
		...extra
	};
}

describe("event store", () => {
	let handle: DbHandle;
	let store: EventStore;

	beforeEach(() => {
		handle = openDb(":memory:");
		initDb(handle.db);
		store = createEventStore(handle.db);
	});

	afterEach(() => {
		handle.close();
	});

	function insert(e: SensorEvent, extra: Record<string, unknown> = {}): number {
		return store.insertEvent(e, { ...e, ...extra, type: "sensor" });
	}

	it("starts empty", () => {
		expect(store.latestEvent()).toBeNull();
		expect(store.latestEventPerDevice()).toEqual([]);
		expect(store.counts()).toEqual({ events: 0, alerts: 0 });
	});

	it("returns increasing ids and the latest payload verbatim", () => {
		const a = insert(event("a", 1));
		const b = insert(event("a", 2), { firmware: "1.2.0" });

		expect(b).toBeGreaterThan(a);
		expect(store.latestEvent()).toEqual({ ...event("a", 2), firmware: "1.2.0" });
	});

	it("keeps the last row of every device", () => {
		insert(event("a", 1));
		insert(event("b", 9));
		insert(event("a", 2));

		const latest = store.latestEventPerDevice();
		expect(latest.map(p => [p.device, p.seq])).toEqual([
			["b", 9],
			["a", 2]
		]);
	});

	it("flattens readings into columns, newest first", () => {
		insert(event("a", 1));
		insert(event("a", 2, { water: null, level: { float: 0 } }));

		const rows = store.recentEvents(10);
		expect(rows).toHaveLength(2);
		expect(rows[0]).toMatchObject({ seq: 2, water_ph: null, water_t_c: null, level_float: 0 });
		expect(rows[1]).toMatchObject({
			seq: 1,
			air_t_c: 22.5,
			air_rh_pct: 60,
			air_p_hpa: 1012,
			water_ph: 6.1,
			water_ec_ms_cm: 1.4,
			light_lux: 12000,
			level_float: 1
		});
	});

	it("limits recent events", () => {
		for (let i = 1; i <= 5; i++) insert(event("a", i));
		expect(store.recentEvents(3).map(r => r.seq)).toEqual([5, 4, 3]);
	});

	it("stores alerts with their audit record", () => {
		const alert: Alert = {
			type: "alert",
			ts: "2026-03-01T10:00:01+00:00",
			device: "a",
			severity: "CRIT",
			code: "WATER_LOW",
			message: "Reservoir level is LOW (float=0)."
		};
		store.insertAlert(alert, { event: { type: "sensor", seq: 1 }, alert });
		store.insertAlert({ ...alert, severity: "WARN", code: "PH_LOW", message: "pH is low: 5.00 (< 5.5)." });

		const rows = store.recentAlerts(10);
		expect(rows.map(r => r.code)).toEqual(["PH_LOW", "WATER_LOW"]);
		expect(rows[1]).toMatchObject({ device: "a", severity: "CRIT", message: "Reservoir level is LOW (float=0)." });

		const raw = handle.db.prepare("SELECT raw_json FROM alerts WHERE code = 'WATER_LOW'").get() as { raw_json: string };
		expect(JSON.parse(raw.raw_json)).toEqual({ event: { type: "sensor", seq: 1 }, alert });
		expect(store.counts()).toEqual({ events: 0, alerts: 2 });
	});

	it("reports write failures as retryable db errors", () => {
		handle.close();
		let caught: unknown;
		try {
			insert(event("a", 1));
		} catch (err) {
			caught = err;
		}
		expect(caught).toBeInstanceOf(AppError);
		expect(caught).toMatchObject({ code: "DB_ERROR", status: 503, retryable: true });

		// reopen so afterEach has something to close
		handle = openDb(":memory:");
	});

	it("runs the schema setup once per database", () => {
		insert(event("a", 1));
		initDb(handle.db);
		expect(store.counts().events).toBe(1);
		expect(handle.db.pragma("user_version", { simple: true })).toBe(1);
	});
});

describe("parseStoredPayload", () => {
	it("accepts sensor objects only", () => {
		expect(parseStoredPayload('{"type":"sensor","seq":1}')).toEqual({ type: "sensor", seq: 1 });
		expect(parseStoredPayload('{"type":"alert"}')).toBeNull();
		expect(parseStoredPayload("[1,2]")).toBeNull();
		expect(parseStoredPayload("not json")).toBeNull();
	});
});
