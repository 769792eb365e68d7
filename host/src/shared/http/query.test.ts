import { describe, expect, it } from "vitest";

import { csvResponse, makeCsvFilename, toCsv } from "./csv";
import { getString, parseLimit, QueryError, wantsCsv } from "./query";

const url = (qs: string) => new URL(`http://localhost/alerts${qs}`);

describe("query parsing", () => {
	it("applies default and cap to limit", () => {
		expect(parseLimit(url(""))).toBe(50);
		expect(parseLimit(url("?limit=20"))).toBe(20);
		expect(parseLimit(url("?limit=9000"), { defaultLimit: 500, maxLimit: 5000 })).toBe(5000);
	});

	it("rejects non-numeric and non-positive limits", () => {
		expect(() => parseLimit(url("?limit=ten"))).toThrow(QueryError);
		expect(() => parseLimit(url("?limit=0"))).toThrow("'limit' must be > 0");
	});

	it("treats blank values as absent", () => {
		expect(getString(url("?format=%20"), "format")).toBeUndefined();
		expect(parseLimit(url("?limit="))).toBe(50);
	});

	it("detects CSV from the query or the Accept header", () => {
		expect(wantsCsv(url("?format=CSV"), undefined)).toBe(true);
		expect(wantsCsv(url(""), "text/csv")).toBe(true);
		expect(wantsCsv(url(""), "application/json")).toBe(false);
	});
});

describe("csv", () => {
	type Row = { name: string; value: number | null };
	const columns = [
		{ header: "name", accessor: (r: Row) => r.name },
		{ header: "value", accessor: (r: Row) => r.value }
	];

	it("quotes cells that need it and blanks missing values", () => {
		const rows: Row[] = [
			{ name: "plain", value: 1.5 },
			{ name: 'say "hi", ok', value: null },
			{ name: "nan", value: Number.NaN }
		];

		expect(toCsv(rows, columns)).toBe('\uFEFFname,value\nplain,1.5\n"say ""hi"", ok",\nnan,\n');
	});

	it("prefixes a byte order mark", () => {
		expect(toCsv([], columns)).toBe("\uFEFFname,value\n");
	});

	it("builds safe download names", () => {
		expect(makeCsvFilename(["history", "500"])).toBe("history_500.csv");
		expect(makeCsvFilename(["my report", "a/b"])).toBe("my_report_a-b.csv");
		expect(makeCsvFilename([])).toBe("data.csv");
		expect(csvResponse("x", "a.csv").headers).toEqual({
			"content-type": "text/csv; charset=utf-8",
			"content-disposition": 'attachment; filename="a.csv"'
		});
	});
});
