import { httpEndpoint, json } from "../../shared/http/endpoint";

// GET /latest
//
// The most recently accepted event, as received. Before any data arrives the
// answer is still a 200 so polling dashboards never see an error.

export const getLatest = httpEndpoint(async ({ gateway }) => {
	const snapshot = gateway.latest();
	if (!snapshot) {
		return json(200, { ok: false, detail: "No data received yet" });
	}
	return json(200, snapshot);
}, { name: "latest.get" });
