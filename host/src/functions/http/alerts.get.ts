import { httpEndpoint, json } from "../../shared/http/endpoint";
import { parseLimit } from "../../shared/http/query";
import { csvResponse, makeCsvFilename, toCsv, type CsvColumn } from "../../shared/http/csv";
import type { AlertRow } from "../../store/event-store";

// GET /alerts?limit&format
//
// Query params:
// - limit (optional; default 50, capped at 500)
// - format (optional; "csv" to return CSV, default JSON)
//
// Most recent first.

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

const columns: readonly CsvColumn<AlertRow>[] = [
	{ header: "id", accessor: r => r.id },
	{ header: "ts", accessor: r => r.ts },
	{ header: "device", accessor: r => r.device ?? "" },
	{ header: "severity", accessor: r => r.severity },
	{ header: "code", accessor: r => r.code },
	{ header: "message", accessor: r => r.message }
];

export const getAlerts = httpEndpoint(async ({ url, gateway, log, asCsv }) => {
	const limit = parseLimit(url, { defaultLimit: DEFAULT_LIMIT, maxLimit: MAX_LIMIT });

	log.debug("alerts.get: request limit=%d csv=%s", limit, String(asCsv));

	const rows = gateway.recentAlerts(limit);

	if (asCsv) {
		return csvResponse(toCsv(rows, columns), makeCsvFilename(["alerts", "latest", String(limit)]));
	}

	return json(200, { ok: true, count: rows.length, alerts: rows });
}, { name: "alerts.get" });
