//
// Query-string parsing for the read endpoints.
//

export class QueryError extends Error {
	public readonly status: number;

	constructor(message: string, status = 400) {
		super(message);
		this.name = "QueryError";
		this.status = status;
	}
}

export function getString(url: URL, key: string): string | undefined {
	const v = url.searchParams.get(key);
	if (v === null) return undefined;
	const trimmed = v.trim();
	return trimmed.length ? trimmed : undefined;
}

export function getInt(url: URL, key: string): number | undefined {
	const v = getString(url, key);
	if (v === undefined) return undefined;
	if (!/^-?\d+$/.test(v)) throw new QueryError(`Invalid integer for '${key}'`);
	const n = Number.parseInt(v, 10);
	if (!Number.isSafeInteger(n)) throw new QueryError(`Invalid integer for '${key}'`);
	return n;
}

export function getPositiveInt(url: URL, key: string): number | undefined {
	const n = getInt(url, key);
	if (n === undefined) return undefined;
	if (n <= 0) throw new QueryError(`'${key}' must be > 0`);
	return n;
}

/**
 * Parse `limit` with bounds.
 */
export function parseLimit(url: URL, opts?: { defaultLimit?: number; maxLimit?: number }): number {
	const def = opts?.defaultLimit ?? 50;
	const max = opts?.maxLimit ?? 500;
	const n = getPositiveInt(url, "limit") ?? def;
	return Math.min(n, max);
}

/**
 * Should the response be CSV?
 * - `?format=csv` OR
 * - `Accept: text/csv`
 */
export function wantsCsv(url: URL, accept: string | undefined): boolean {
	const format = getString(url, "format")?.toLowerCase();
	if (format === "csv") return true;
	return (accept ?? "").toLowerCase().includes("text/csv");
}
