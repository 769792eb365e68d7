import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { dbError } from "./errors";
import { SCHEMA_VERSION, Sql } from "./sql";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

/**
 * Open (and create if needed) the SQLite file. Pass ":memory:" for a
 * throwaway database.
 */
export function openDb(sqlitePath: string): DbHandle {
	let db: Database.Database;
	try {
		if (sqlitePath !== ":memory:") {
			ensureDir(path.dirname(sqlitePath));
		}
		db = new Database(sqlitePath);
	} catch (err) {
		throw dbError("Failed to open database", { sqlitePath }, err);
	}

	// WAL: readers never block the writer and vice versa.
	// FULL: a committed insert is on disk before the call returns.
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = FULL");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const ver = Number(db.pragma("user_version", { simple: true }) ?? 0);

		if (ver < SCHEMA_VERSION) {
			db.exec(Sql.createSchema);
			db.pragma(`user_version = ${SCHEMA_VERSION}`);
		}
	});

	try {
		tx();
	} catch (err) {
		throw dbError("Failed to initialize database schema", undefined, err);
	}
}
