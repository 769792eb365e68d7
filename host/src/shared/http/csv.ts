// CSV for the read endpoints (`?format=csv`): UTF-8 with a BOM, comma
// separated, "\n" line endings.

import type { HttpResponse } from "./endpoint";

export type CsvValue = string | number | null;

export type CsvColumn<T> = {
	header: string;
	accessor: (row: T) => CsvValue;
};

function cell(v: CsvValue): string {
	if (v === null) return "";
	// NaN/Infinity are blank
	const raw = typeof v === "number" ? (Number.isFinite(v) ? String(v) : "") : v;
	return /[",\n\r]/.test(raw) ? `"${raw.replace(/"/g, "\"\"")}"` : raw;
}

export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
	const lines = [columns.map(c => cell(c.header)).join(",")];
	for (const row of rows) {
		lines.push(columns.map(c => cell(c.accessor(row))).join(","));
	}
	return `\uFEFF${lines.join("\n")}\n`;
}

export function csvResponse(body: string, filename: string): HttpResponse {
	return {
		status: 200,
		headers: {
			"content-type": "text/csv; charset=utf-8",
			"content-disposition": `attachment; filename="${filename}"`
		},
		body
	};
}

/** Download name from parts, e.g. `alerts_latest_50.csv`. */
export function makeCsvFilename(parts: readonly string[]): string {
	const name = parts
		.map(p => p.trim().replace(/\s+/g, "_").replace(/[^a-zA-Z0-9._-]/g, "-"))
		.filter(Boolean)
		.join("_");
	return `${name || "data"}.csv`;
}
