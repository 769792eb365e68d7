export type Severity = "INFO" | "WARN" | "CRIT";

export type AlertCode =
	| "WATER_LOW"
	| "PH_LOW"
	| "PH_HIGH"
	| "EC_LOW"
	| "EC_HIGH"
	| "WATER_TEMP_HIGH";

export interface AirReading {
	t_c: number | null;
	rh_pct: number | null;
	p_hpa: number | null;
}

export interface WaterReading {
	t_c: number | null;
	ph: number | null;
	ec_ms_cm: number | null;
}

export interface LightReading {
	lux: number | null;
}

export interface LevelReading {
	float: number | null;
}

export interface SensorEvent {
	type: "sensor";

	ts: string;        // Ex. 2026-01-23T12:34:56.789+02:00
	device: string;
	seq: number;

	air: AirReading | null;
	water: WaterReading | null;
	light: LightReading | null;
	level: LevelReading | null;
}

/**
 * Verbatim payload as received from the device. Only the envelope fields are
 * known; everything else is carried through untouched.
 */
export type SensorPayload = Record<string, unknown> & { type: "sensor" };

export interface Alert {
	type: "alert";
	ts: string;
	device: string;
	severity: Severity;
	code: AlertCode;
	message: string;
}
