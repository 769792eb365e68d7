import { once } from "node:events";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";

import { createApp, type App } from "./app";
import { HostServer } from "./server";
import { createSilentLogger } from "./shared/log";

const TS = "2026-03-01T10:00:00+00:00";

function sensor(seq: number, ph = 6.0) {
	return { type: "sensor", ts: TS, device: "rack-1", seq, water: { t_c: 20, ph, ec_ms_cm: 1.2 } };
}

class FeedClient {
	private readonly queue: unknown[] = [];
	private waiting?: (msg: unknown) => void;

	constructor(readonly ws: WebSocket) {
		ws.on("message", data => {
			const msg: unknown = JSON.parse(String(data));
			const waiter = this.waiting;
			if (waiter) {
				this.waiting = undefined;
				waiter(msg);
			} else {
				this.queue.push(msg);
			}
		});
	}

	next(): Promise<unknown> {
		if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
		return new Promise(resolve => {
			this.waiting = resolve;
		});
	}
}

describe("HostServer", () => {
	let app: App;
	let server: HostServer;
	let base: string;

	beforeEach(async () => {
		const logger = createSilentLogger();
		app = createApp({ sqlitePath: ":memory:", logger });
		server = new HostServer({
			config: { host: "127.0.0.1", port: 0, maxBodyBytes: 512 },
			gateway: app.gateway,
			logger
		});
		const addr = await server.start();
		base = `http://127.0.0.1:${addr.port}`;
	});

	afterEach(async () => {
		await server.stop();
		app.close();
	});

	function post(path: string, body: string) {
		return fetch(`${base}${path}`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body
		});
	}

	it("answers health checks", async () => {
		const res = await fetch(`${base}/health`);
		expect(res.status).toBe(200);
		expect(await res.json()).toMatchObject({ ok: true, service: "host", subscribers: 0 });
	});

	it("reports no data before the first event", async () => {
		const res = await fetch(`${base}/latest`);
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ ok: false, detail: "No data received yet" });
	});

	it("distinguishes accepted, ignored and rejected events", async () => {
		const accepted = await post("/ingest", JSON.stringify(sensor(1, 5.0)));
		expect(accepted.status).toBe(200);
		expect(await accepted.json()).toEqual({ ok: true, alerts: 1 });

		const ignored = await post("/ingest", JSON.stringify(sensor(1)));
		expect(ignored.status).toBe(200);
		expect(await ignored.json()).toEqual({ ok: true, ignored: true });

		const rejected = await post("/ingest", JSON.stringify({ type: "sensor" }));
		expect(rejected.status).toBe(400);
		expect(await rejected.json()).toMatchObject({ ok: false, error: "Missing required fields: ts, device, seq" });

		const latest = await fetch(`${base}/latest`);
		expect(await latest.json()).toEqual(sensor(1, 5.0));
	});

	it("rejects bodies that are not JSON or too large", async () => {
		const bad = await post("/ingest", "{not json");
		expect(bad.status).toBe(400);
		expect(await bad.json()).toEqual({ ok: false, error: "Invalid JSON body", code: "BAD_REQUEST" });

		const big = await post("/ingest", JSON.stringify({ ...sensor(2), pad: "x".repeat(600) }));
		expect(big.status).toBe(413);
		expect(await big.json()).toEqual({
			ok: false,
			error: "Request body exceeds 512 bytes",
			code: "PAYLOAD_TOO_LARGE"
		});
	});

	it("returns 404 and 405 for unknown routes and methods", async () => {
		const missing = await fetch(`${base}/nope`);
		expect(missing.status).toBe(404);
		expect(await missing.json()).toEqual({ ok: false, error: "Not found", code: "NOT_FOUND" });

		const wrong = await fetch(`${base}/ingest`);
		expect(wrong.status).toBe(405);
		expect(await wrong.json()).toEqual({ ok: false, error: "Method not allowed", code: "METHOD_NOT_ALLOWED" });
	});

	it("lists recent alerts as JSON or CSV", async () => {
		await post("/ingest", JSON.stringify(sensor(1, 5.0)));

		const res = await fetch(`${base}/alerts?limit=5`);
		const body: unknown = await res.json();
		expect(body).toMatchObject({
			ok: true,
			count: 1,
			alerts: [{ id: 1, ts: TS, device: "rack-1", severity: "WARN", code: "PH_LOW", message: "pH is low: 5.00 (< 5.5)." }]
		});

		const csv = await fetch(`${base}/alerts?format=csv`);
		expect(csv.headers.get("content-type")).toBe("text/csv; charset=utf-8");
		expect(csv.headers.get("content-disposition")).toBe('attachment; filename="alerts_latest_50.csv"');
		expect(Buffer.from(await csv.arrayBuffer()).toString("utf8")).toBe(
			`\uFEFFid,ts,device,severity,code,message\n1,${TS},rack-1,WARN,PH_LOW,pH is low: 5.00 (< 5.5).\n`
		);
	});

	it("rejects a malformed limit", async () => {
		const res = await fetch(`${base}/alerts?limit=abc`);
		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({ ok: false, error: "Invalid integer for 'limit'" });
	});

	it("serves history as parallel arrays", async () => {
		await post("/ingest", JSON.stringify(sensor(1)));
		await post("/ingest", JSON.stringify(sensor(2)));

		const res = await fetch(`${base}/history?limit=10`);
		expect(await res.json()).toMatchObject({
			ok: true,
			count: 2,
			series: { seq: [1, 2], device: ["rack-1", "rack-1"], water_ph: [6, 6], light_lux: [null, null] }
		});
	});

	it("greets feed clients with the snapshot and streams new events", async () => {
		await post("/ingest", JSON.stringify(sensor(1)));

		const ws = new WebSocket(`${base.replace("http", "ws")}/ws`);
		const feed = new FeedClient(ws);
		await once(ws, "open");

		expect(await feed.next()).toEqual(sensor(1));

		await post("/ingest", JSON.stringify(sensor(2, 7.2)));
		expect(await feed.next()).toEqual(sensor(2, 7.2));
		expect(await feed.next()).toMatchObject({ type: "alert", code: "PH_HIGH", message: "pH is high: 7.20 (> 6.8)." });

		const health = await fetch(`${base}/health`);
		expect(await health.json()).toMatchObject({ subscribers: 1 });

		ws.close();
	});
});
