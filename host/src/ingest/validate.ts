import { SensorEventSchema, type SensorEvent, type SensorPayload } from "@vertical-farm/common";

export type ValidationIssue = {
	path: (string | number)[];
	message: string;
};

type ZodIssueLike = {
	path: readonly (string | number | symbol)[];
	message: string;
};

export type ValidationResult =
	| { ok: true; event: SensorEvent; payload: SensorPayload }
	| { ok: false; error: string; issues: ValidationIssue[] };

const REQUIRED = ["ts", "device", "seq"] as const;

const FIELD_ERRORS: Record<string, string> = {
	ts: "ts must be a non-empty string",
	device: "device must be a non-empty string",
	seq: "seq must be a non-negative integer"
};

function isRecord(v: unknown): v is Record<string, unknown> {
	return v !== null && typeof v === "object" && !Array.isArray(v);
}

function toIssues(issues: readonly ZodIssueLike[]): ValidationIssue[] {
	return issues.map(i => ({
		path: i.path
			.map((p): string | number => (typeof p === "symbol" ? (p.description ?? p.toString()) : p))
			.filter((p): p is string | number => typeof p === "string" || typeof p === "number"),
		message: i.message
	}));
}

function fail(error: string, issues: ValidationIssue[] = []): ValidationResult {
	return { ok: false, error, issues };
}

/**
 * Structural check of one incoming sensor event. Nested readings are never a
 * reason to reject; they are normalized to numbers or null.
 */
export function validateSensorEvent(input: unknown): ValidationResult {
	if (!isRecord(input)) {
		return fail("Event must be a JSON object");
	}

	if (input.type !== "sensor") {
		return fail("Unsupported event type (expected type='sensor')", [
			{ path: ["type"], message: "Expected 'sensor'" }
		]);
	}

	const missing = REQUIRED.filter(k => input[k] === undefined || input[k] === null);
	if (missing.length > 0) {
		return fail(
			"Missing required fields: ts, device, seq",
			missing.map(k => ({ path: [k], message: "Required" }))
		);
	}

	const res = SensorEventSchema.safeParse(input);
	if (!res.success) {
		const issues = toIssues(res.error.issues);
		const field = issues.find(i => typeof i.path[0] === "string" && i.path[0] in FIELD_ERRORS)?.path[0];
		return fail(typeof field === "string" ? FIELD_ERRORS[field] : "Invalid sensor event", issues);
	}

	return { ok: true, event: res.data, payload: { ...input, type: "sensor" } };
}
