import type { Alert, SensorEvent, SensorPayload } from "@vertical-farm/common";

import type { AlertEngine } from "../alerts/engine";
import type { Broadcaster, Subscriber } from "../feed/broadcaster";
import type { Logger } from "../shared/log";
import type { AlertRow, EventRow, EventStore } from "../store/event-store";
import type { AcceptanceFilter } from "./acceptance";
import { validateSensorEvent, type ValidationIssue } from "./validate";

export type IngestResult =
	| { status: "accepted"; id: number; event: SensorEvent; alerts: Alert[] }
	| { status: "ignored"; device: string; seq: number }
	| { status: "rejected"; error: string; issues: ValidationIssue[] };

/** Parallel per-field arrays, oldest sample first. */
export interface EventSeries {
	ts: string[];
	device: string[];
	seq: number[];
	air_t_c: (number | null)[];
	air_rh_pct: (number | null)[];
	air_p_hpa: (number | null)[];
	water_t_c: (number | null)[];
	water_ph: (number | null)[];
	water_ec_ms_cm: (number | null)[];
	light_lux: (number | null)[];
	level_float: (number | null)[];
}

export interface GatewayDeps {
	store: EventStore;
	filter: AcceptanceFilter;
	engine: AlertEngine;
	broadcaster: Broadcaster;
	logger: Logger;
}

export function toSeries(rowsNewestFirst: readonly EventRow[]): EventSeries {
	const series: EventSeries = {
		ts: [],
		device: [],
		seq: [],
		air_t_c: [],
		air_rh_pct: [],
		air_p_hpa: [],
		water_t_c: [],
		water_ph: [],
		water_ec_ms_cm: [],
		light_lux: [],
		level_float: []
	};

	for (let i = rowsNewestFirst.length - 1; i >= 0; i--) {
		const r = rowsNewestFirst[i];
		series.ts.push(r.ts);
		series.device.push(r.device);
		series.seq.push(r.seq);
		series.air_t_c.push(r.air_t_c);
		series.air_rh_pct.push(r.air_rh_pct);
		series.air_p_hpa.push(r.air_p_hpa);
		series.water_t_c.push(r.water_t_c);
		series.water_ph.push(r.water_ph);
		series.water_ec_ms_cm.push(r.water_ec_ms_cm);
		series.light_lux.push(r.light_lux);
		series.level_float.push(r.level_float);
	}

	return series;
}

/**
 * Orchestrates one event at a time:
 * validate -> accept -> persist -> snapshot -> broadcast -> alerts -> persist -> broadcast.
 *
 * Everything up to and including handing frames to subscribers runs
 * synchronously, so no two ingestions interleave and per-device order is the
 * acceptance order. Only socket completion is awaited.
 *
 * Cursor and snapshot move only after the event is stored; a storage failure
 * leaves both untouched and propagates as a retryable AppError. A failed alert
 * write also propagates, after the stored event has been broadcast.
 */
export class IngestionGateway {
	private snapshot: SensorPayload | null = null;

	constructor(private readonly deps: GatewayDeps) {}

	/** Rehydrate snapshot and per-device cursors from storage. */
	restore(): { devices: number; snapshot: boolean } {
		const { store, filter, logger } = this.deps;

		let devices = 0;
		for (const payload of store.latestEventPerDevice()) {
			const res = validateSensorEvent(payload);
			if (!res.ok) {
				logger.warn("Skipping stored event that no longer validates: %s", res.error);
				continue;
			}
			filter.restore(res.event.device, res.event.seq, res.event.ts);
			devices++;
		}

		const latest = store.latestEvent();
		this.snapshot = latest;

		if (latest) {
			logger.info(
				"Restored snapshot device=%s seq=%s and %d device cursor(s)",
				String(latest.device),
				String(latest.seq),
				devices
			);
		} else {
			logger.info("No stored events; starting empty");
		}

		return { devices, snapshot: latest !== null };
	}

	async ingest(input: unknown): Promise<IngestResult> {
		const { store, filter, engine, broadcaster, logger } = this.deps;

		const res = validateSensorEvent(input);
		if (!res.ok) {
			logger.info("Rejected event: %s", res.error);
			return { status: "rejected", error: res.error, issues: res.issues };
		}

		const { event, payload } = res;

		if (!filter.check(event.device, event.seq, event.ts)) {
			logger.debug("Ignored stale/duplicate event device=%s seq=%d ts=%s", event.device, event.seq, event.ts);
			return { status: "ignored", device: event.device, seq: event.seq };
		}

		const id = store.insertEvent(event, payload);
		filter.record(event.device, event.seq, event.ts);
		this.snapshot = payload;

		const deliveries = [broadcaster.broadcast(payload)];

		let alerts: Alert[];
		try {
			alerts = engine.evaluate(event, payload);
		} catch (err) {
			// The event itself is stored and already on its way to subscribers.
			await Promise.all(deliveries);
			throw err;
		}
		for (const alert of alerts) {
			deliveries.push(broadcaster.broadcast(alert));
		}

		logger.debug(
			"Accepted event id=%d device=%s seq=%d alerts=%d",
			id,
			event.device,
			event.seq,
			alerts.length
		);

		await Promise.all(deliveries);

		return { status: "accepted", id, event, alerts };
	}

	latest(): SensorPayload | null {
		return this.snapshot;
	}

	/** Attach a live subscriber; it is greeted with the current snapshot. */
	subscribe(subscriber: Subscriber): () => void {
		return this.deps.broadcaster.subscribe(subscriber, this.snapshot ?? undefined);
	}

	recentAlerts(limit: number): AlertRow[] {
		return this.deps.store.recentAlerts(limit);
	}

	history(limit: number): EventSeries {
		return toSeries(this.deps.store.recentEvents(limit));
	}

	get subscriberCount(): number {
		return this.deps.broadcaster.size;
	}
}
