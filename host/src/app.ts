import { AlertEngine } from "./alerts/engine";
import { Broadcaster } from "./feed/broadcaster";
import { AcceptanceFilter } from "./ingest/acceptance";
import { IngestionGateway } from "./ingest/gateway";
import { initDb, openDb } from "./shared/db";
import type { Logger } from "./shared/log";
import { createEventStore, type EventStore } from "./store/event-store";

export interface AppOptions {
	sqlitePath: string;
	logger: Logger;
	cooldownMs?: number;
	now?: () => number;
}

export interface App {
	gateway: IngestionGateway;
	store: EventStore;
	broadcaster: Broadcaster;
	close: () => void;
}

/**
 * Wire the pipeline: store, acceptance filter, alert engine and broadcaster,
 * owned by one gateway and rehydrated from disk.
 */
export function createApp(opts: AppOptions): App {
	const { logger } = opts;

	const handle = openDb(opts.sqlitePath);
	try {
		initDb(handle.db);
	} catch (err) {
		handle.close();
		throw err;
	}

	const store = createEventStore(handle.db);
	const broadcaster = new Broadcaster(logger);
	const engine = new AlertEngine({
		store,
		logger,
		cooldownMs: opts.cooldownMs,
		now: opts.now
	});

	const gateway = new IngestionGateway({
		store,
		filter: new AcceptanceFilter(),
		engine,
		broadcaster,
		logger
	});

	gateway.restore();

	return {
		gateway,
		store,
		broadcaster,
		close: () => {
			broadcaster.closeAll();
			handle.close();
		}
	};
}
