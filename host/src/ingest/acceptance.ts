import { isAfter, parseInstant } from "./timestamp";

export interface DeviceCursor {
	lastSeq: number;
	lastTs: string;
}

/**
 * Per-device "is this newer than what we already have" decision.
 *
 * An event is newer when its seq is higher, or, after a device reboot reset
 * the counter, when its timestamp is strictly later. Anything else is a stale
 * or duplicate delivery.
 *
 * Every method is synchronous, so a check followed by a record in the same
 * tick cannot interleave with another ingestion.
 */
export class AcceptanceFilter {
	private readonly cursors = new Map<string, DeviceCursor>();

	/** Decide without touching state. */
	check(device: string, seq: number, ts: string): boolean {
		const last = this.cursors.get(device);
		if (!last) return true;

		if (seq > last.lastSeq) return true;

		// seq went backwards or repeated: only a later clock proves a reboot.
		// Unparseable timestamps fail closed.
		const incoming = parseInstant(ts);
		const previous = parseInstant(last.lastTs);
		if (!incoming || !previous) return false;

		return isAfter(incoming, previous);
	}

	/** Move the cursor. Call only once the event is durably stored. */
	record(device: string, seq: number, ts: string): void {
		this.cursors.set(device, { lastSeq: seq, lastTs: ts });
	}

	/** Check and, if newer, record in one step. */
	accept(device: string, seq: number, ts: string): boolean {
		if (!this.check(device, seq, ts)) return false;
		this.record(device, seq, ts);
		return true;
	}

	/** Seed a cursor from storage on startup. */
	restore(device: string, seq: number, ts: string): void {
		this.record(device, seq, ts);
	}

	cursor(device: string): DeviceCursor | undefined {
		const c = this.cursors.get(device);
		return c ? { ...c } : undefined;
	}

	get size(): number {
		return this.cursors.size;
	}
}
