// Date, time and offset are all required.
const ISO_RE =
	/^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})$/i;

/** An instant with sub-millisecond digits kept, so microsecond stamps still order. */
export interface Instant {
	ms: number;
	/** Fraction of a millisecond, in [0, 1). */
	sub: number;
}

/**
 * Parse an ISO-8601 timestamp with a UTC offset. Returns null for anything
 * else, including offset-less stamps `Date.parse` would read as local time.
 */
export function parseInstant(ts: string): Instant | null {
	const m = ISO_RE.exec(ts.trim());
	if (!m) return null;

	const [, date, time, fraction, offset] = m;
	const millis = (fraction ?? "").slice(0, 3).padEnd(3, "0");
	const rest = (fraction ?? "").slice(3);

	const zone = offset.toUpperCase() === "Z" ? "Z" : offset.includes(":") ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`;
	const normalized = `${date}T${time.length === 5 ? `${time}:00` : time}.${millis}${zone}`;

	const ms = Date.parse(normalized);
	if (Number.isNaN(ms)) return null;

	return { ms, sub: rest ? Number(`0.${rest}`) : 0 };
}

export function isAfter(a: Instant, b: Instant): boolean {
	return a.ms > b.ms || (a.ms === b.ms && a.sub > b.sub);
}
