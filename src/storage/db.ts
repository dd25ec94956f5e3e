/**
 * SQLite storage layer for mtgate.
 *
 * Holds:
 * - Per-user credential records (never deleted)
 * - Installation settings (the secret derivation salt)
 * - Rate limit counters for bot commands
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { CONFIG_DIR } from "../utils.js";

const logger = getChildLogger({ module: "storage" });

const DB_PATH = path.join(CONFIG_DIR, "mtgate.db");
const SCHEMA_VERSION = 1;

let db: Database.Database | null = null;

/**
 * Open a database at `file` (":memory:" for an in-process one) and bring its
 * schema up to date.
 */
export function openDatabase(file: string): Database.Database {
	if (file !== ":memory:") {
		const dir = path.dirname(file);
		fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
	}

	const database = new Database(file);

	if (file !== ":memory:") {
		// Credentials live here: owner read/write only
		try {
			fs.chmodSync(file, 0o600);
		} catch {
			logger.warn({ path: file }, "could not set database file permissions to 0600");
		}
		database.pragma("journal_mode = WAL");
	}
	database.pragma("busy_timeout = 5000");

	migrate(database);
	return database;
}

/**
 * Get or create the process-wide database connection.
 */
export function getDb(): Database.Database {
	if (db) return db;
	db = openDatabase(DB_PATH);
	logger.info({ path: DB_PATH }, "database initialized");
	return db;
}

export function closeDb(): void {
	if (db) {
		db.close();
		db = null;
		logger.debug("database closed");
	}
}

function migrate(database: Database.Database): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const row = database.prepare("SELECT version FROM schema_version LIMIT 1").get() as
		| { version: number }
		| undefined;
	const currentVersion = row?.version ?? 0;

	if (currentVersion >= SCHEMA_VERSION) {
		return;
	}

	logger.info({ from: currentVersion, to: SCHEMA_VERSION }, "running migrations");

	if (currentVersion < 1) {
		database.exec(`
			CREATE TABLE IF NOT EXISTS credentials (
				user_id TEXT PRIMARY KEY,
				username TEXT,
				status TEXT NOT NULL CHECK (status IN (
					'ACTIVE', 'REVOKED', 'PENDING_PROVISION', 'PENDING_REVOKE', 'FAILED'
				)),
				target TEXT NOT NULL CHECK (target IN ('active', 'revoked')),
				secret TEXT,
				proxy_link TEXT,
				generation INTEGER NOT NULL DEFAULT 0,
				failure_count INTEGER NOT NULL DEFAULT 0,
				failed_operation TEXT,
				last_error TEXT,
				last_event_at INTEGER,
				last_event_type TEXT,
				next_attempt_at INTEGER,
				created_at INTEGER NOT NULL,
				updated_at INTEGER NOT NULL,
				CHECK (status != 'REVOKED' OR secret IS NULL)
			);
			-- A secret belongs to exactly one user
			CREATE UNIQUE INDEX IF NOT EXISTS idx_credentials_secret
				ON credentials(secret) WHERE secret IS NOT NULL;
			CREATE INDEX IF NOT EXISTS idx_credentials_status ON credentials(status);

			CREATE TABLE IF NOT EXISTS settings (
				key TEXT PRIMARY KEY,
				value TEXT NOT NULL
			);

			CREATE TABLE IF NOT EXISTS rate_limits (
				limiter_type TEXT NOT NULL,
				key TEXT NOT NULL,
				window_start INTEGER NOT NULL,
				points INTEGER NOT NULL DEFAULT 0,
				PRIMARY KEY (limiter_type, key, window_start)
			);
			CREATE INDEX IF NOT EXISTS idx_rate_limits_expiry ON rate_limits(window_start);
		`);
	}

	database.prepare("DELETE FROM schema_version").run();
	database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(SCHEMA_VERSION);

	logger.info({ version: SCHEMA_VERSION }, "migrations complete");
}

/**
 * Drop rate limit windows older than an hour.
 */
export function cleanupExpired(database: Database.Database = getDb()): { rateLimits: number } {
	const oneHourAgo = Date.now() - 3600 * 1000;
	const result = database.prepare("DELETE FROM rate_limits WHERE window_start < ?").run(oneHourAgo);
	if (result.changes > 0) {
		logger.debug({ rateLimits: result.changes }, "cleaned up expired entries");
	}
	return { rateLimits: result.changes };
}

/**
 * Run cleanupExpired on an unref'd interval. A failed pass is logged and the
 * next one still runs.
 */
export function startCleanupTimer(
	intervalMs = 60_000,
	database?: Database.Database,
): { stop(): void } {
	const timer = setInterval(() => {
		try {
			cleanupExpired(database);
		} catch (err) {
			logger.warn({ error: formatErrorSafe(err) }, "rate limit cleanup failed");
		}
	}, intervalMs);
	timer.unref();
	return { stop: () => clearInterval(timer) };
}

export function getDbPath(): string {
	return DB_PATH;
}
