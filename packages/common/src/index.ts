// Wire shapes shared by the host and the mock device
export type {
	AirReading,
	Alert,
	AlertCode,
	LevelReading,
	LightReading,
	SensorEvent,
	SensorPayload,
	Severity,
	WaterReading
} from "./telemetry";

// Validation schemas (used mainly by the host)
export { SensorEventSchema } from "./schema";
