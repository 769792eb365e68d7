import type Database from "better-sqlite3";
import type { Alert, SensorEvent, SensorPayload, Severity } from "@vertical-farm/common";

import { dbError } from "../shared/errors";
import { Sql } from "../shared/sql";

export interface EventRow {
	id: number;
	ts: string;
	device: string;
	seq: number;

	air_t_c: number | null;
	air_rh_pct: number | null;
	air_p_hpa: number | null;

	water_t_c: number | null;
	water_ph: number | null;
	water_ec_ms_cm: number | null;

	light_lux: number | null;
	level_float: number | null;
}

export interface AlertRow {
	id: number;
	ts: string;
	device: string | null;
	severity: Severity;
	code: string;
	message: string;
}

/** Audit record stored next to every alert. */
export interface AlertAudit {
	event: SensorPayload;
	alert: Alert;
}

/**
 * Append-only storage for sensor events and alerts. Every insert is committed
 * before the call returns; failures surface as retryable DB_ERRORs.
 */
export interface EventStore {
	insertEvent(event: SensorEvent, payload: SensorPayload): number;
	latestEvent(): SensorPayload | null;
	latestEventPerDevice(): SensorPayload[];
	recentEvents(limit: number): EventRow[];
	insertAlert(alert: Alert, audit?: AlertAudit): number;
	recentAlerts(limit: number): AlertRow[];
	counts(): { events: number; alerts: number };
}

type RawJsonRow = { raw_json: string };
type CountRow = { n: number };

function isRecord(v: unknown): v is Record<string, unknown> {
	return v !== null && typeof v === "object" && !Array.isArray(v);
}

/** Rehydrate a stored payload. Rows that no longer look like sensor events are dropped. */
export function parseStoredPayload(rawJson: string): SensorPayload | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(rawJson);
	} catch {
		return null;
	}
	if (!isRecord(parsed) || parsed.type !== "sensor") return null;
	return { ...parsed, type: "sensor" };
}

function levelColumn(v: number | null): number | null {
	return v === null ? null : Math.trunc(v);
}

function guard<T>(operation: string, fn: () => T): T {
	try {
		return fn();
	} catch (err) {
		throw dbError(`Event store ${operation} failed`, { operation }, err);
	}
}

export function createEventStore(db: Database.Database): EventStore {
	const stmts = {
		insertEvent: db.prepare(Sql.insertEvent),
		latestEvent: db.prepare(Sql.selectLatestEvent),
		latestPerDevice: db.prepare(Sql.selectLatestEventPerDevice),
		recentEvents: db.prepare(Sql.selectRecentEvents),
		countEvents: db.prepare(Sql.countEvents),
		insertAlert: db.prepare(Sql.insertAlert),
		recentAlerts: db.prepare(Sql.selectRecentAlerts),
		countAlerts: db.prepare(Sql.countAlerts)
	};

	return {
		insertEvent(event, payload) {
			return guard("insertEvent", () => {
				const res = stmts.insertEvent.run({
					ts: event.ts,
					device: event.device,
					seq: event.seq,
					air_t_c: event.air?.t_c ?? null,
					air_rh_pct: event.air?.rh_pct ?? null,
					air_p_hpa: event.air?.p_hpa ?? null,
					water_t_c: event.water?.t_c ?? null,
					water_ph: event.water?.ph ?? null,
					water_ec_ms_cm: event.water?.ec_ms_cm ?? null,
					light_lux: event.light?.lux ?? null,
					level_float: levelColumn(event.level?.float ?? null),
					raw_json: JSON.stringify(payload)
				});
				return Number(res.lastInsertRowid);
			});
		},

		latestEvent() {
			return guard("latestEvent", () => {
				const row = stmts.latestEvent.get() as RawJsonRow | undefined;
				return row ? parseStoredPayload(row.raw_json) : null;
			});
		},

		latestEventPerDevice() {
			return guard("latestEventPerDevice", () => {
				const rows = stmts.latestPerDevice.all() as RawJsonRow[];
				const out: SensorPayload[] = [];
				for (const row of rows) {
					const payload = parseStoredPayload(row.raw_json);
					if (payload) out.push(payload);
				}
				return out;
			});
		},

		recentEvents(limit) {
			return guard("recentEvents", () => stmts.recentEvents.all(limit) as EventRow[]);
		},

		insertAlert(alert, audit) {
			return guard("insertAlert", () => {
				const res = stmts.insertAlert.run({
					ts: alert.ts,
					device: alert.device,
					severity: alert.severity,
					code: alert.code,
					message: alert.message,
					raw_json: audit ? JSON.stringify(audit) : null
				});
				return Number(res.lastInsertRowid);
			});
		},

		recentAlerts(limit) {
			return guard("recentAlerts", () => stmts.recentAlerts.all(limit) as AlertRow[]);
		},

		counts() {
			return guard("counts", () => {
				const events = stmts.countEvents.get() as CountRow;
				const alerts = stmts.countAlerts.get() as CountRow;
				return { events: events.n, alerts: alerts.n };
			});
		}
	};
}
