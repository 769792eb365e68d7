// Shared helpers for the HTTP endpoints.
//
// Handlers stay focused on: parse params -> call the gateway -> shape response.
// Logging, error mapping and writing the response live here.

import type http from "node:http";

import type { IngestionGateway } from "../../ingest/gateway";
import { asAppError, badRequest, payloadTooLarge, toSafeErrorResponse } from "../errors";
import type { Logger } from "../log";
import { QueryError, wantsCsv } from "./query";

export type HttpResponse = {
	status: number;
	headers?: Record<string, string>;
	/** Objects are sent as JSON, strings as-is. */
	body: unknown;
};

export type EndpointArgs = {
	req: http.IncomingMessage;
	url: URL;
	log: Logger;
	gateway: IngestionGateway;
	maxBodyBytes: number;
	asCsv: boolean;
};

export type EndpointHandler = (args: EndpointArgs) => Promise<HttpResponse>;

export type EndpointOptions = {
	/** Operation name used in logs. Default: handler name or "http" */
	name?: string;
};

export function json(status: number, body: Record<string, unknown>): HttpResponse {
	return { status, body };
}

export function describeError(err: unknown): { name: string; message: string; stack?: string; code?: unknown } {
	const e = err instanceof Error ? err : new Error(String(err));
	return {
		name: e.name,
		message: e.message,
		stack: e.stack,
		code: "code" in e ? e.code : undefined
	};
}

/**
 * Wrap an HTTP handler with standard concerns:
 * - csv detection
 * - consistent error -> response mapping
 */
export function httpEndpoint(handler: EndpointHandler, opts?: EndpointOptions) {
	const name = opts?.name ?? (handler.name || "http");

	return async (args: Omit<EndpointArgs, "asCsv">): Promise<HttpResponse> => {
		const { log } = args;
		const asCsv = wantsCsv(args.url, args.req.headers.accept);

		try {
			return await handler({ ...args, asCsv });
		} catch (err) {
			// Query parsing / validation errors are user errors.
			if (err instanceof QueryError) {
				log.info("%s: bad request: %s", name, err.message);
				return json(err.status, { ok: false, error: err.message });
			}

			const e = asAppError(err);
			if (e.status >= 500) {
				log.error("%s: %s (%s)", name, e.message, e.code, describeError(e.cause ?? e));
			} else {
				log.info("%s: %s", name, e.message);
			}

			const safe = toSafeErrorResponse(e);
			return { status: safe.status, body: safe.body };
		}
	};
}

/**
 * Read and JSON-decode the request body, capped at `limit` bytes.
 */
export async function readJsonBody(req: http.IncomingMessage, limit: number): Promise<unknown> {
	const chunks: Buffer[] = [];
	let size = 0;

	for await (const chunk of req) {
		const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buf.length;
		if (size > limit) {
			throw payloadTooLarge(limit);
		}
		chunks.push(buf);
	}

	const text = Buffer.concat(chunks).toString("utf8");
	try {
		return JSON.parse(text) as unknown;
	} catch {
		throw badRequest("Invalid JSON body");
	}
}

export function writeResponse(res: http.ServerResponse, response: HttpResponse): void {
	const isText = typeof response.body === "string";
	const payload = isText ? String(response.body) : JSON.stringify(response.body);

	res.writeHead(response.status, {
		"content-type": isText ? "text/plain; charset=utf-8" : "application/json; charset=utf-8",
		...response.headers,
		"content-length": Buffer.byteLength(payload)
	});
	res.end(payload);
}
