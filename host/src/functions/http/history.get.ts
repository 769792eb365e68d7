import { httpEndpoint, json } from "../../shared/http/endpoint";
import { parseLimit } from "../../shared/http/query";
import { csvResponse, makeCsvFilename, toCsv, type CsvColumn } from "../../shared/http/csv";
import type { EventSeries } from "../../ingest/gateway";

// GET /history?limit&format
//
// The most recent `limit` events as parallel arrays per scalar field, oldest
// first, ready for charting. `format=csv` returns one row per event instead.

const DEFAULT_LIMIT = 500;
const MAX_LIMIT = 5000;

const FIELDS = [
	"ts",
	"device",
	"seq",
	"air_t_c",
	"air_rh_pct",
	"air_p_hpa",
	"water_t_c",
	"water_ph",
	"water_ec_ms_cm",
	"light_lux",
	"level_float"
] as const satisfies readonly (keyof EventSeries)[];

type SeriesIndex = { series: EventSeries; i: number };

const columns: readonly CsvColumn<SeriesIndex>[] = FIELDS.map(f => ({
	header: f,
	accessor: ({ series, i }: SeriesIndex) => series[f][i]
}));

export const getHistory = httpEndpoint(async ({ url, gateway, asCsv }) => {
	const limit = parseLimit(url, { defaultLimit: DEFAULT_LIMIT, maxLimit: MAX_LIMIT });
	const series = gateway.history(limit);

	if (asCsv) {
		const rows = series.ts.map((_, i) => ({ series, i }));
		return csvResponse(toCsv(rows, columns), makeCsvFilename(["history", String(limit)]));
	}

	return json(200, { ok: true, count: series.ts.length, series });
}, { name: "history.get" });
