import { httpEndpoint, json, readJsonBody } from "../../shared/http/endpoint";

// POST /ingest
//
// One sensor event per request. Three distinct outcomes:
// - accepted: 200 { ok: true, alerts }
// - ignored (stale/duplicate): 200 { ok: true, ignored: true }
// - rejected (malformed): 400 { ok: false, error, issues }
// A storage failure is a retryable 503 (mapped by httpEndpoint).

export const postIngest = httpEndpoint(async ({ req, gateway, maxBodyBytes }) => {
	const body = await readJsonBody(req, maxBodyBytes);
	const result = await gateway.ingest(body);

	switch (result.status) {
		case "accepted":
			return json(200, { ok: true, alerts: result.alerts.length });
		case "ignored":
			return json(200, { ok: true, ignored: true });
		case "rejected":
			return json(400, { ok: false, error: result.error, issues: result.issues });
	}
}, { name: "ingest.post" });
