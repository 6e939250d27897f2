/**
 * Database module for the Groupkeeper bot.
 * Provides the SQLite connection, typed query functions, transactions and
 * schema initialization. Uses better-sqlite3: every statement and every
 * transaction runs synchronously, so no other task can interleave between a
 * read and the write that depends on it.
 *
 * @module database
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { StoreUnavailableError } from "./utils/errors";
import { logger } from "./utils/logger";

/** SQLite result codes meaning the storage itself cannot serve the request. */
const UNAVAILABLE_CODES = [
	"SQLITE_BUSY",
	"SQLITE_LOCKED",
	"SQLITE_CANTOPEN",
	"SQLITE_IOERR",
	"SQLITE_FULL",
	"SQLITE_READONLY",
	"SQLITE_CORRUPT",
	"SQLITE_NOTADB",
];

function isUnavailable(error: unknown): boolean {
	if (!(error instanceof Error)) return false;
	const code = "code" in error ? error.code : undefined;
	if (typeof code === "string") {
		return UNAVAILABLE_CODES.some((prefix) => code.startsWith(prefix));
	}
	return error.message.includes("database connection is not open");
}

/**
 * Explicit database service, constructed once at startup and handed to the
 * stores that need it.
 *
 * @example
 * ```typescript
 * const db = new DatabaseHandle('./data/bot.db');
 * const rows = db.query<{ user_id: number }>('SELECT user_id FROM photo_whitelist');
 * ```
 */
export class DatabaseHandle {
	private readonly db: Database.Database;

	/**
	 * Opens (creating if needed) the database file and initializes the schema.
	 * WAL journaling lets readers proceed while a writer transaction is open.
	 *
	 * @param path - File path, or `:memory:`
	 * @param busyTimeoutMs - How long a writer waits on another connection's lock
	 * @throws {StoreUnavailableError} If the file cannot be opened
	 */
	constructor(
		readonly path: string,
		busyTimeoutMs = 5000,
	) {
		try {
			if (path !== ":memory:") {
				mkdirSync(dirname(path), { recursive: true });
			}
			this.db = new Database(path);
			this.db.pragma("journal_mode = WAL");
			this.db.pragma(`busy_timeout = ${busyTimeoutMs}`);
			this.db.pragma("foreign_keys = ON");
		} catch (error) {
			logger.error(`Failed to open database at ${path}`, error);
			throw new StoreUnavailableError(`Cannot open database at ${path}`, error);
		}
		this.initSchema();
	}

	/**
	 * Executes a SELECT query and returns all matching rows as typed objects.
	 *
	 * @template T - The row shape expected in the result set
	 * @param sql - The SQL query string (supports parameterized queries)
	 * @param params - Array of parameters to bind to the query
	 */
	query<T>(sql: string, params: unknown[] = []): T[] {
		return this.run(sql, () => this.db.prepare(sql).all(params) as T[]);
	}

	/**
	 * Executes a SELECT query and returns a single row, or undefined if no rows match.
	 */
	get<T>(sql: string, params: unknown[] = []): T | undefined {
		return this.run(
			sql,
			() => this.db.prepare(sql).get(params) as T | undefined,
		);
	}

	/**
	 * Executes an INSERT, UPDATE, or DELETE statement.
	 *
	 * @returns RunResult with the changed row count and last inserted row ID
	 */
	execute(sql: string, params: unknown[] = []): Database.RunResult {
		return this.run(sql, () => this.db.prepare(sql).run(params));
	}

	/**
	 * Runs `fn` inside a `BEGIN IMMEDIATE` transaction. The write lock is taken
	 * before the first read, so the read-modify-write inside `fn` is
	 * serializable against every other connection. Any throw rolls back.
	 *
	 * `fn` must be synchronous; a promise returned from it would commit before
	 * it settles.
	 */
	transaction<T>(fn: () => T): T {
		try {
			return this.db.transaction(fn).immediate();
		} catch (error) {
			throw this.translate(error, "transaction");
		}
	}

	/** True while the connection is usable. */
	get isOpen(): boolean {
		return this.db.open;
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
		}
	}

	private run<T>(sql: string, fn: () => T): T {
		try {
			return fn();
		} catch (error) {
			throw this.translate(error, sql);
		}
	}

	private translate(error: unknown, sql: string): unknown {
		if (error instanceof StoreUnavailableError || !isUnavailable(error)) {
			return error;
		}
		logger.error(`Database unavailable: ${sql}`, error);
		return new StoreUnavailableError("Database is unavailable", error);
	}

	/**
	 * Creates all tables and indexes. Safe to call multiple times - uses
	 * IF NOT EXISTS clauses.
	 *
	 * - violation_records: progressive enforcement state per (group, user, kind)
	 * - captcha_records: join verification challenges; terminal rows are history
	 * - photo_whitelist: users vouched for by an administrator
	 */
	private initSchema(): void {
		this.run("schema", () =>
			this.db.exec(`
    CREATE TABLE IF NOT EXISTS violation_records (
      group_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('profile', 'probation')),
      count INTEGER NOT NULL DEFAULT 0 CHECK(count >= 0),
      first_seen_at INTEGER NOT NULL,
      last_seen_at INTEGER NOT NULL,
      restricted INTEGER NOT NULL DEFAULT 0,
      restricted_by TEXT NOT NULL DEFAULT 'none'
        CHECK(restricted_by IN ('none', 'system', 'administrator')),
      probation_until INTEGER,
      PRIMARY KEY (group_id, user_id, kind)
    );

    CREATE TABLE IF NOT EXISTS captcha_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      group_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK(status IN ('pending', 'verified', 'expired')),
      joined_at INTEGER NOT NULL,
      deadline INTEGER NOT NULL,
      attempts INTEGER NOT NULL DEFAULT 0,
      resolved_at INTEGER,
      chat_id INTEGER,
      message_id INTEGER,
      user_full_name TEXT
    );

    CREATE TABLE IF NOT EXISTS photo_whitelist (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL UNIQUE,
      verified_by INTEGER NOT NULL,
      verified_at INTEGER NOT NULL,
      notes TEXT
    );

    -- At most one non-terminal captcha per (group, user)
    CREATE UNIQUE INDEX IF NOT EXISTS uix_captcha_pending
      ON captcha_records(group_id, user_id) WHERE status = 'pending';

    CREATE INDEX IF NOT EXISTS idx_captcha_status_deadline ON captcha_records(status, deadline);
    CREATE INDEX IF NOT EXISTS idx_captcha_group_user ON captcha_records(group_id, user_id);
    CREATE INDEX IF NOT EXISTS idx_violations_kind_first_seen ON violation_records(kind, restricted, first_seen_at);
    CREATE INDEX IF NOT EXISTS idx_violations_kind_until ON violation_records(kind, restricted, probation_until);
  `),
		);

		logger.info("Database initialized successfully", { path: this.path });
	}
}
