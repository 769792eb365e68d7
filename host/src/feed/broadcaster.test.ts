import { describe, expect, it } from "vitest";

import { createSilentLogger } from "../shared/log";
import { Broadcaster, type Subscriber } from "./broadcaster";

class FakeSubscriber implements Subscriber {
	readonly frames: string[] = [];
	open = true;
	failNext = false;
	closed = false;

	constructor(readonly id: string) {}

	isOpen(): boolean {
		return this.open;
	}

	send(data: string): Promise<void> {
		if (this.failNext) return Promise.reject(new Error("socket reset"));
		this.frames.push(data);
		return Promise.resolve();
	}

	close(): void {
		this.closed = true;
	}
}

describe("Broadcaster", () => {
	it("greets a new subscriber before any broadcast reaches it", async () => {
		const b = new Broadcaster(createSilentLogger());
		const sub = new FakeSubscriber("a");

		b.subscribe(sub, { type: "sensor", seq: 5 });
		await b.broadcast({ type: "sensor", seq: 6 });

		expect(sub.frames).toEqual(['{"type":"sensor","seq":5}', '{"type":"sensor","seq":6}']);
	});

	it("skips the greeting when there is nothing to send", async () => {
		const b = new Broadcaster(createSilentLogger());
		const sub = new FakeSubscriber("a");

		b.subscribe(sub);
		await b.broadcast({ n: 1 });

		expect(sub.frames).toEqual(['{"n":1}']);
	});

	it("delivers concurrent broadcasts in issue order", async () => {
		const b = new Broadcaster(createSilentLogger());
		const sub = new FakeSubscriber("a");
		b.subscribe(sub);

		await Promise.all([b.broadcast({ n: 1 }), b.broadcast({ n: 2 }), b.broadcast({ n: 3 })]);

		expect(sub.frames).toEqual(['{"n":1}', '{"n":2}', '{"n":3}']);
	});

	it("prunes subscribers whose send fails or that are closed", async () => {
		const b = new Broadcaster(createSilentLogger());
		const ok = new FakeSubscriber("ok");
		const broken = new FakeSubscriber("broken");
		const gone = new FakeSubscriber("gone");
		b.subscribe(ok);
		b.subscribe(broken);
		b.subscribe(gone);

		broken.failNext = true;
		gone.open = false;

		const res = await b.broadcast({ n: 1 });

		expect(res).toEqual({ delivered: 1, pruned: 2 });
		expect(b.size).toBe(1);
		expect(ok.frames).toEqual(['{"n":1}']);
	});

	it("succeeds with nobody listening", async () => {
		const b = new Broadcaster(createSilentLogger());
		await expect(b.broadcast({ n: 1 })).resolves.toEqual({ delivered: 0, pruned: 0 });
	});

	it("unsubscribes through the returned function", async () => {
		const b = new Broadcaster(createSilentLogger());
		const sub = new FakeSubscriber("a");
		const off = b.subscribe(sub);

		off();
		await b.broadcast({ n: 1 });

		expect(sub.frames).toEqual([]);
		expect(b.size).toBe(0);
	});

	it("closes every subscriber on shutdown", () => {
		const b = new Broadcaster(createSilentLogger());
		const a = new FakeSubscriber("a");
		const c = new FakeSubscriber("c");
		b.subscribe(a);
		b.subscribe(c);

		b.closeAll();

		expect(a.closed && c.closed).toBe(true);
		expect(b.size).toBe(0);
	});
});
