import type { AlertCode, SensorEvent, Severity } from "@vertical-farm/common";

// Thresholds (fixed; not per device)
export const PH_LOW = 5.5;
export const PH_HIGH = 6.8;
export const EC_LOW = 0.8;
export const EC_HIGH = 2.2;
export const WATER_TEMP_HIGH_C = 26.0;

export interface AlertRuleDefinition {
	readonly code: AlertCode;
	readonly severity: Severity;
	/** Message when the rule trips, null otherwise. Missing readings never trip. */
	evaluate(event: SensorEvent): string | null;
}

function isNumber(v: unknown): v is number {
	return typeof v === "number" && Number.isFinite(v);
}

function fmtValue(v: number): string {
	return v.toFixed(2);
}

function fmtThreshold(v: number): string {
	return Number.isInteger(v) ? v.toFixed(1) : String(v);
}

const waterLow: AlertRuleDefinition = {
	code: "WATER_LOW",
	severity: "CRIT",
	evaluate(event) {
		return event.level?.float === 0 ? "Reservoir level is LOW (float=0)." : null;
	}
};

const phLow: AlertRuleDefinition = {
	code: "PH_LOW",
	severity: "WARN",
	evaluate(event) {
		const ph = event.water?.ph;
		if (!isNumber(ph) || !(ph < PH_LOW)) return null;
		return `pH is low: ${fmtValue(ph)} (< ${fmtThreshold(PH_LOW)}).`;
	}
};

const phHigh: AlertRuleDefinition = {
	code: "PH_HIGH",
	severity: "WARN",
	evaluate(event) {
		const ph = event.water?.ph;
		if (!isNumber(ph) || !(ph > PH_HIGH)) return null;
		return `pH is high: ${fmtValue(ph)} (> ${fmtThreshold(PH_HIGH)}).`;
	}
};

const ecLow: AlertRuleDefinition = {
	code: "EC_LOW",
	severity: "WARN",
	evaluate(event) {
		const ec = event.water?.ec_ms_cm;
		if (!isNumber(ec) || !(ec < EC_LOW)) return null;
		return `EC is low: ${fmtValue(ec)} mS/cm (< ${fmtThreshold(EC_LOW)}).`;
	}
};

const ecHigh: AlertRuleDefinition = {
	code: "EC_HIGH",
	severity: "WARN",
	evaluate(event) {
		const ec = event.water?.ec_ms_cm;
		if (!isNumber(ec) || !(ec > EC_HIGH)) return null;
		return `EC is high: ${fmtValue(ec)} mS/cm (> ${fmtThreshold(EC_HIGH)}).`;
	}
};

const waterTempHigh: AlertRuleDefinition = {
	code: "WATER_TEMP_HIGH",
	severity: "WARN",
	evaluate(event) {
		const t = event.water?.t_c;
		if (!isNumber(t) || !(t > WATER_TEMP_HIGH_C)) return null;
		return `Water temp is high: ${fmtValue(t)}°C (> ${fmtThreshold(WATER_TEMP_HIGH_C)}).`;
	}
};

export const ALL_RULES: readonly AlertRuleDefinition[] = [
	waterLow,
	phLow,
	phHigh,
	ecLow,
	ecHigh,
	waterTempHigh
];
