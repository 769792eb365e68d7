import type { Alert, SensorEvent, SensorPayload } from "@vertical-farm/common";

import type { Logger } from "../shared/log";
import type { EventStore } from "../store/event-store";
import { ALL_RULES, type AlertRuleDefinition } from "./rules";

export const DEFAULT_COOLDOWN_MS = 10_000;

export interface AlertEngineOptions {
	store: Pick<EventStore, "insertAlert">;
	logger: Logger;
	cooldownMs?: number;
	rules?: readonly AlertRuleDefinition[];
	/** Wall clock in ms; injectable for tests. */
	now?: () => number;
}

export function cooldownKey(device: string, code: string): string {
	return `${device}:${code}`;
}

/**
 * Threshold rules gated by a per device+rule cooldown. Fired alerts are
 * persisted before they are returned; pushing them to subscribers is the
 * caller's job.
 */
export class AlertEngine {
	private readonly lastFired = new Map<string, number>();
	private readonly store: Pick<EventStore, "insertAlert">;
	private readonly logger: Logger;
	private readonly rules: readonly AlertRuleDefinition[];
	private readonly now: () => number;
	readonly cooldownMs: number;

	constructor(opts: AlertEngineOptions) {
		this.store = opts.store;
		this.logger = opts.logger;
		this.rules = opts.rules ?? ALL_RULES;
		this.now = opts.now ?? Date.now;
		this.cooldownMs = opts.cooldownMs ?? DEFAULT_COOLDOWN_MS;
	}

	/**
	 * Run every rule against the event. A rule that throws is logged and
	 * skipped. A failed alert write does not stop the remaining rules, but it
	 * is rethrown once they have run so the caller can report it.
	 */
	evaluate(event: SensorEvent, payload?: SensorPayload): Alert[] {
		const fired: Alert[] = [];
		const failures: unknown[] = [];

		for (const rule of this.rules) {
			const message = this.check(rule, event);
			if (message === null) continue;

			try {
				const alert = this.fire(rule, event, message, payload);
				if (alert) fired.push(alert);
			} catch (err) {
				failures.push(err);
			}
		}

		if (failures.length > 0) {
			throw failures[0];
		}

		return fired;
	}

	/** Last fire time for a device+rule, if it ever fired. */
	lastFiredAt(device: string, code: string): number | undefined {
		return this.lastFired.get(cooldownKey(device, code));
	}

	get cooldownEntries(): number {
		return this.lastFired.size;
	}

	private check(rule: AlertRuleDefinition, event: SensorEvent): string | null {
		try {
			return rule.evaluate(event);
		} catch (err) {
			this.logger.error(
				"Alert rule %s failed for device=%s seq=%d: %s",
				rule.code,
				event.device,
				event.seq,
				err instanceof Error ? err.message : String(err)
			);
			return null;
		}
	}

	private fire(rule: AlertRuleDefinition, event: SensorEvent, message: string, payload?: SensorPayload): Alert | null {
		const key = cooldownKey(event.device, rule.code);
		const previous = this.lastFired.get(key);
		const now = this.now();
		if (previous !== undefined && now - previous < this.cooldownMs) {
			this.logger.debug("Alert %s suppressed by cooldown", key);
			return null;
		}

		// Window is taken before the write and handed back if the write fails.
		this.lastFired.set(key, now);

		const alert: Alert = {
			type: "alert",
			ts: event.ts,
			device: event.device,
			severity: rule.severity,
			code: rule.code,
			message
		};

		try {
			this.store.insertAlert(alert, { event: payload ?? { ...event }, alert });
		} catch (err) {
			if (previous === undefined) {
				this.lastFired.delete(key);
			} else {
				this.lastFired.set(key, previous);
			}
			throw err;
		}

		this.logger.info("[%s] %s %s: %s", alert.severity, alert.device, alert.code, alert.message);
		return alert;
	}
}
