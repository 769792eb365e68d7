import http from "node:http";
import type { AddressInfo } from "node:net";
import { randomUUID } from "node:crypto";
import { WebSocket, WebSocketServer } from "ws";

import type { Subscriber } from "./feed/broadcaster";
import type { IngestionGateway } from "./ingest/gateway";
import type { ServerConfig } from "./shared/config";
import { methodNotAllowed, notFound, toSafeErrorResponse } from "./shared/errors";
import { describeError, writeResponse, type EndpointArgs, type HttpResponse } from "./shared/http/endpoint";
import type { Logger } from "./shared/log";
import { getAlerts } from "./functions/http/alerts.get";
import { getHealth } from "./functions/http/health.get";
import { getHistory } from "./functions/http/history.get";
import { postIngest } from "./functions/http/ingest.post";
import { getLatest } from "./functions/http/latest.get";

type Route = {
	method: "GET" | "POST";
	handler: (args: Omit<EndpointArgs, "asCsv">) => Promise<HttpResponse>;
};

const ROUTES: Record<string, Route> = {
	"/health": { method: "GET", handler: getHealth },
	"/ingest": { method: "POST", handler: postIngest },
	"/latest": { method: "GET", handler: getLatest },
	"/alerts": { method: "GET", handler: getAlerts },
	"/history": { method: "GET", handler: getHistory }
};

const FEED_PATH = "/ws";
const HEARTBEAT_MS = 30_000;

export interface HostServerOptions {
	config: ServerConfig;
	gateway: IngestionGateway;
	logger: Logger;
}

/** Adapt a `ws` socket to the broadcaster's subscriber contract. */
export function wsSubscriber(ws: WebSocket, id: string = randomUUID()): Subscriber {
	return {
		id,
		isOpen: () => ws.readyState === WebSocket.OPEN,
		send: data =>
			new Promise<void>((resolve, reject) => {
				ws.send(data, err => (err ? reject(err) : resolve()));
			}),
		close: () => ws.close(1001, "server shutting down")
	};
}

/**
 * HTTP + WebSocket front door: JSON endpoints for ingestion and reads, and a
 * live feed on /ws that greets each connection with the current snapshot.
 */
export class HostServer {
	private server?: http.Server;
	private wss?: WebSocketServer;
	private heartbeat?: NodeJS.Timeout;
	private readonly alive = new WeakSet<WebSocket>();

	constructor(private readonly options: HostServerOptions) {}

	start(): Promise<AddressInfo> {
		const { config, logger } = this.options;

		const server = http.createServer((req, res) => {
			this.handleRequest(req, res).catch((err: unknown) => {
				logger.error("Unhandled request failure", describeError(err));
				if (!res.headersSent) {
					const safe = toSafeErrorResponse(err);
					writeResponse(res, { status: safe.status, body: safe.body });
				} else {
					res.destroy();
				}
			});
		});
		this.server = server;

		const wss = new WebSocketServer({ noServer: true });
		this.wss = wss;

		server.on("upgrade", (req, socket, head) => {
			const path = new URL(req.url ?? "/", "http://localhost").pathname;
			if (path !== FEED_PATH) {
				socket.destroy();
				return;
			}
			wss.handleUpgrade(req, socket, head, ws => this.attach(ws));
		});

		this.heartbeat = setInterval(() => this.sweep(), HEARTBEAT_MS);
		this.heartbeat.unref();

		return new Promise((resolve, reject) => {
			server.once("error", reject);
			server.listen(config.port, config.host, () => {
				server.off("error", reject);
				const addr = server.address();
				if (addr === null || typeof addr === "string") {
					reject(new Error("Server is not listening on a TCP port"));
					return;
				}
				logger.info("Listening on http://%s:%d (feed at %s)", addr.address, addr.port, FEED_PATH);
				resolve(addr);
			});
		});
	}

	async stop(): Promise<void> {
		if (this.heartbeat) clearInterval(this.heartbeat);

		for (const ws of this.wss?.clients ?? []) {
			ws.terminate();
		}
		this.wss?.close();

		const server = this.server;
		if (!server) return;

		await new Promise<void>((resolve, reject) => {
			server.close(err => (err ? reject(err) : resolve()));
			server.closeAllConnections();
		});
		this.server = undefined;
	}

	private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const { gateway, logger, config } = this.options;
		const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

		const route = ROUTES[url.pathname];
		if (!route) {
			writeResponse(res, this.errorResponse(notFound()));
			return;
		}
		if (req.method !== route.method) {
			writeResponse(res, this.errorResponse(methodNotAllowed()));
			return;
		}

		const response = await route.handler({
			req,
			url,
			log: logger,
			gateway,
			maxBodyBytes: config.maxBodyBytes
		});
		writeResponse(res, response);
	}

	private errorResponse(err: unknown): HttpResponse {
		const safe = toSafeErrorResponse(err);
		return { status: safe.status, body: safe.body };
	}

	private attach(ws: WebSocket): void {
		const { gateway, logger } = this.options;

		this.alive.add(ws);
		ws.on("pong", () => this.alive.add(ws));

		const unsubscribe = gateway.subscribe(wsSubscriber(ws));

		ws.on("close", () => unsubscribe());
		ws.on("error", err => {
			logger.warn("Feed socket error: %s", err.message);
			unsubscribe();
		});
	}

	/** Drop sockets that missed the previous ping. */
	private sweep(): void {
		for (const ws of this.wss?.clients ?? []) {
			if (!this.alive.has(ws)) {
				ws.terminate();
				continue;
			}
			this.alive.delete(ws);
			ws.ping();
		}
	}
}
