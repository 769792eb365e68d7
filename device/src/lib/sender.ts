import type winston from "winston";

import type { GeneratedEvent } from "../generators/types";

export interface PostResult {
	/** HTTP status, or 0 when the host could not be reached. */
	status: number;
	body: string;
}

export interface SendResult extends PostResult {
	ok: boolean;
	attempts: number;
}

export interface SenderOptions {
	url: string;
	timeoutMs: number;
	retries: number;
	backoffMs: number;
	maxBackoffMs: number;
	logger: winston.Logger;
	fetchImpl?: typeof fetch;
	sleep?: (ms: number) => Promise<void>;
}

export type Sender = {
	send: (event: GeneratedEvent) => Promise<SendResult>;
};

export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/** Transport failures and 5xx are worth another try; 4xx means the event itself is wrong. */
export function isRetryable(status: number): boolean {
	return status === 0 || status === 429 || status >= 500;
}

export async function postJson(
	fetchImpl: typeof fetch,
	url: string,
	payload: unknown,
	timeoutMs: number
): Promise<PostResult> {
	try {
		const res = await fetchImpl(url, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify(payload),
			signal: AbortSignal.timeout(timeoutMs)
		});
		return { status: res.status, body: await res.text() };
	} catch (err) {
		return { status: 0, body: err instanceof Error ? err.message : String(err) };
	}
}

export function createSender(opts: SenderOptions): Sender {
	const fetchImpl = opts.fetchImpl ?? fetch;
	const wait = opts.sleep ?? sleep;
	const { logger } = opts;

	const send = async (event: GeneratedEvent): Promise<SendResult> => {
		let backoff = opts.backoffMs;
		let attempts = 0;

		for (;;) {
			attempts++;
			const res = await postJson(fetchImpl, opts.url, event, opts.timeoutMs);

			if (res.status >= 200 && res.status < 300) {
				return { ok: true, attempts, ...res };
			}

			if (!isRetryable(res.status) || attempts > opts.retries) {
				logger.error(
					"Giving up on device=%s seq=%d after %d attempt(s): status=%d %s",
					event.device,
					event.seq,
					attempts,
					res.status,
					res.body
				);
				return { ok: false, attempts, ...res };
			}

			logger.warn(
				"Send failed device=%s seq=%d status=%d; retrying in %dms",
				event.device,
				event.seq,
				res.status,
				backoff
			);
			await wait(backoff);
			backoff = Math.min(opts.maxBackoffMs, backoff * 2);
		}
	};

	return { send };
}
