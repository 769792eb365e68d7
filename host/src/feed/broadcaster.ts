import type { Logger } from "../shared/log";

/** One live feed connection. */
export interface Subscriber {
	readonly id: string;
	isOpen(): boolean;
	/** Resolves once the frame is handed to the transport; rejects on failure. */
	send(data: string): Promise<void>;
	close(): void;
}

export interface BroadcastResult {
	delivered: number;
	pruned: number;
}

/**
 * Fan-out of serialized payloads to every live subscriber.
 *
 * `broadcast` starts every send in one synchronous pass before awaiting any of
 * them, so two broadcasts reach each subscriber in the order they were issued.
 */
export class Broadcaster {
	private readonly subscribers = new Set<Subscriber>();

	constructor(private readonly logger: Logger) {}

	/**
	 * Register a subscriber. When a greeting is given it is sent before the
	 * subscriber becomes visible to broadcasts. Returns an unsubscribe function.
	 */
	subscribe(subscriber: Subscriber, greeting?: unknown): () => void {
		if (greeting !== undefined && greeting !== null) {
			this.deliver(subscriber, JSON.stringify(greeting)).catch((err: unknown) => {
				this.drop(subscriber, err);
			});
		}

		this.subscribers.add(subscriber);
		this.logger.info("Subscriber %s connected (total=%d)", subscriber.id, this.subscribers.size);

		return () => this.unsubscribe(subscriber);
	}

	unsubscribe(subscriber: Subscriber): void {
		if (this.subscribers.delete(subscriber)) {
			this.logger.info("Subscriber %s disconnected (total=%d)", subscriber.id, this.subscribers.size);
		}
	}

	async broadcast(payload: unknown): Promise<BroadcastResult> {
		const data = JSON.stringify(payload);
		const targets = Array.from(this.subscribers);

		const results = await Promise.allSettled(targets.map(s => this.deliver(s, data)));

		let delivered = 0;
		let pruned = 0;
		results.forEach((res, i) => {
			if (res.status === "fulfilled") {
				delivered++;
				return;
			}
			if (this.drop(targets[i], res.reason)) pruned++;
		});

		return { delivered, pruned };
	}

	closeAll(): void {
		for (const s of this.subscribers) {
			try {
				s.close();
			} catch (err) {
				this.logger.warn("Closing subscriber %s failed: %s", s.id, describe(err));
			}
		}
		this.subscribers.clear();
	}

	get size(): number {
		return this.subscribers.size;
	}

	private deliver(subscriber: Subscriber, data: string): Promise<void> {
		if (!subscriber.isOpen()) {
			return Promise.reject(new Error("connection closed"));
		}
		try {
			return subscriber.send(data);
		} catch (err) {
			return Promise.reject(err);
		}
	}

	private drop(subscriber: Subscriber, reason: unknown): boolean {
		const removed = this.subscribers.delete(subscriber);
		this.logger.warn("Pruned subscriber %s: %s", subscriber.id, describe(reason));
		return removed;
	}
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
