/**
 * SQL used by the event store. Positional parameters are `?`, named ones `@name`.
 */

export const SCHEMA_VERSION = 1;

export const Sql = {
	createSchema: `
		CREATE TABLE IF NOT EXISTS sensor_events (
			id              INTEGER PRIMARY KEY AUTOINCREMENT,
			ts              TEXT    NOT NULL,
			device          TEXT    NOT NULL,
			seq             INTEGER NOT NULL,

			air_t_c         REAL,
			air_rh_pct      REAL,
			air_p_hpa       REAL,

			water_t_c       REAL,
			water_ph        REAL,
			water_ec_ms_cm  REAL,

			light_lux       REAL,
			level_float     INTEGER,

			raw_json        TEXT    NOT NULL,
			received_at     TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
		);

		CREATE INDEX IF NOT EXISTS idx_sensor_events_device_seq
		ON sensor_events (device, seq);

		CREATE INDEX IF NOT EXISTS idx_sensor_events_device_id
		ON sensor_events (device, id);

		CREATE INDEX IF NOT EXISTS idx_sensor_events_ts
		ON sensor_events (ts);

		CREATE TABLE IF NOT EXISTS alerts (
			id          INTEGER PRIMARY KEY AUTOINCREMENT,
			ts          TEXT NOT NULL,
			device      TEXT,
			severity    TEXT NOT NULL CHECK (severity IN ('INFO','WARN','CRIT')),
			code        TEXT NOT NULL,
			message     TEXT NOT NULL,
			raw_json    TEXT
		);

		CREATE INDEX IF NOT EXISTS idx_alerts_ts
		ON alerts (ts);
	`,

	insertEvent: `
		INSERT INTO sensor_events (
			ts, device, seq,
			air_t_c, air_rh_pct, air_p_hpa,
			water_t_c, water_ph, water_ec_ms_cm,
			light_lux, level_float,
			raw_json
		) VALUES (
			@ts, @device, @seq,
			@air_t_c, @air_rh_pct, @air_p_hpa,
			@water_t_c, @water_ph, @water_ec_ms_cm,
			@light_lux, @level_float,
			@raw_json
		)`,

	/** Most recent insert across all devices. */
	selectLatestEvent: "SELECT raw_json FROM sensor_events ORDER BY id DESC LIMIT 1",

	/** Last inserted row of every device, oldest device activity first. */
	selectLatestEventPerDevice: `
		SELECT e.raw_json
		FROM sensor_events e
		JOIN (
			SELECT device, MAX(id) AS id
			FROM sensor_events
			GROUP BY device
		) last ON last.id = e.id
		ORDER BY e.id ASC`,

	selectRecentEvents: `
		SELECT
			id, ts, device, seq,
			air_t_c, air_rh_pct, air_p_hpa,
			water_t_c, water_ph, water_ec_ms_cm,
			light_lux, level_float
		FROM sensor_events
		ORDER BY id DESC
		LIMIT ?`,

	countEvents: "SELECT COUNT(*) AS n FROM sensor_events",

	insertAlert: `
		INSERT INTO alerts (ts, device, severity, code, message, raw_json)
		VALUES (@ts, @device, @severity, @code, @message, @raw_json)`,

	selectRecentAlerts: `
		SELECT id, ts, device, severity, code, message
		FROM alerts
		ORDER BY id DESC
		LIMIT ?`,

	countAlerts: "SELECT COUNT(*) AS n FROM alerts"
} as const;
