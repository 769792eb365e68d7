import { z } from "zod";

// Nested readings are optional and tolerant: anything that is not a finite
// number becomes null, so rules can treat "absent" and "garbage" alike.
const reading = z
	.unknown()
	.transform(v => (typeof v === "number" && Number.isFinite(v) ? v : null));

// Float switches report either 0/1 or false/true.
const flag = z
	.unknown()
	.transform(v => (typeof v === "boolean" ? (v ? 1 : 0) : v))
	.pipe(reading);

function group<T extends z.ZodRawShape>(shape: T) {
	return z
		.unknown()
		.transform(v => (v !== null && typeof v === "object" && !Array.isArray(v) ? v : null))
		.pipe(z.object(shape).nullable());
}

const seq = z
	.union([
		z.number().finite(),
		z.string().trim().regex(/^[+-]?\d+$/, "seq must be an integer")
	])
	.transform(v => Math.trunc(Number(v)))
	.pipe(z.number().int().nonnegative().refine(Number.isSafeInteger, "seq must be a non-negative integer"));

export const SensorEventSchema = z.object({
	type: z.literal("sensor"),
	ts: z.string().min(1),
	// Kept exactly as sent: it is the partition key.
	device: z.string().refine(s => s.trim().length > 0, "device must be a non-empty string"),
	seq,
	air: group({ t_c: reading, rh_pct: reading, p_hpa: reading }),
	water: group({ t_c: reading, ph: reading, ec_ms_cm: reading }),
	light: group({ lux: reading }),
	level: group({ float: flag })
});
