/**
 * Durable credential records.
 *
 * The store is the source of truth for what each user should have. It knows
 * nothing about the proxy server: callers must hold the per-user lock before
 * `upsert`, the store only guarantees each write is atomic.
 */

import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { StoreIOError } from "../errors.js";
import {
	type CredentialStatus,
	type CredentialTarget,
	type MembershipEventType,
	type RemoteOperation,
	type UserCredentialRecord,
	isCredentialStatus,
} from "./types.js";

export interface CredentialStore {
	get(userId: string): UserCredentialRecord | null;
	upsert(record: UserCredentialRecord): void;
	listByStatus(status: CredentialStatus): UserCredentialRecord[];
	countByStatus(): Record<CredentialStatus, number>;
	/** 32-byte salt for secret derivation; created on first call, never rotated. */
	getInstallationSalt(): Buffer;
}

type CredentialRow = {
	user_id: string;
	username: string | null;
	status: string;
	target: string;
	secret: string | null;
	proxy_link: string | null;
	generation: number;
	failure_count: number;
	failed_operation: string | null;
	last_error: string | null;
	last_event_at: number | null;
	last_event_type: string | null;
	next_attempt_at: number | null;
	created_at: number;
	updated_at: number;
};

const SALT_KEY = "installation_salt";
const SALT_BYTES = 32;

function parseTarget(row: CredentialRow): CredentialTarget {
	if (row.target === "active" || row.target === "revoked") return row.target;
	throw new StoreIOError(`credential ${row.user_id} has invalid target '${row.target}'`);
}

function parseOperation(value: string | null): RemoteOperation | null {
	return value === "provision" || value === "revoke" ? value : null;
}

function parseEventType(value: string | null): MembershipEventType | null {
	return value === "join" || value === "leave" ? value : null;
}

function rowToRecord(row: CredentialRow): UserCredentialRecord {
	if (!isCredentialStatus(row.status)) {
		throw new StoreIOError(`credential ${row.user_id} has invalid status '${row.status}'`);
	}
	return {
		userId: row.user_id,
		username: row.username,
		status: row.status,
		target: parseTarget(row),
		secret: row.secret,
		proxyLink: row.proxy_link,
		generation: row.generation,
		failureCount: row.failure_count,
		failedOperation: parseOperation(row.failed_operation),
		lastError: row.last_error,
		lastEventAt: row.last_event_at,
		lastEventType: parseEventType(row.last_event_type),
		nextAttemptAt: row.next_attempt_at,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	};
}

export class SqliteCredentialStore implements CredentialStore {
	constructor(private readonly db: Database.Database) {}

	get(userId: string): UserCredentialRecord | null {
		return this.io("get", () => {
			const row = this.db.prepare("SELECT * FROM credentials WHERE user_id = ?").get(userId) as
				| CredentialRow
				| undefined;
			return row ? rowToRecord(row) : null;
		});
	}

	upsert(record: UserCredentialRecord): void {
		this.io("upsert", () => {
			this.db
				.prepare(
					`INSERT INTO credentials (
						user_id, username, status, target, secret, proxy_link,
						generation, failure_count, failed_operation, last_error,
						last_event_at, last_event_type, next_attempt_at,
						created_at, updated_at
					)
					VALUES (
						@userId, @username, @status, @target, @secret, @proxyLink,
						@generation, @failureCount, @failedOperation, @lastError,
						@lastEventAt, @lastEventType, @nextAttemptAt,
						@createdAt, @updatedAt
					)
					ON CONFLICT(user_id) DO UPDATE SET
						username = excluded.username,
						status = excluded.status,
						target = excluded.target,
						secret = excluded.secret,
						proxy_link = excluded.proxy_link,
						generation = excluded.generation,
						failure_count = excluded.failure_count,
						failed_operation = excluded.failed_operation,
						last_error = excluded.last_error,
						last_event_at = excluded.last_event_at,
						last_event_type = excluded.last_event_type,
						next_attempt_at = excluded.next_attempt_at,
						updated_at = excluded.updated_at`,
				)
				.run(record);
		});
	}

	listByStatus(status: CredentialStatus): UserCredentialRecord[] {
		return this.io("listByStatus", () => {
			const rows = this.db
				.prepare("SELECT * FROM credentials WHERE status = ? ORDER BY updated_at ASC")
				.all(status) as CredentialRow[];
			return rows.map(rowToRecord);
		});
	}

	countByStatus(): Record<CredentialStatus, number> {
		return this.io("countByStatus", () => {
			const counts: Record<CredentialStatus, number> = {
				ACTIVE: 0,
				REVOKED: 0,
				PENDING_PROVISION: 0,
				PENDING_REVOKE: 0,
				FAILED: 0,
			};
			const rows = this.db
				.prepare("SELECT status, COUNT(*) AS count FROM credentials GROUP BY status")
				.all() as Array<{ status: string; count: number }>;
			for (const row of rows) {
				if (isCredentialStatus(row.status)) {
					counts[row.status] = row.count;
				}
			}
			return counts;
		});
	}

	getInstallationSalt(): Buffer {
		return this.io("getInstallationSalt", () => {
			// INSERT OR IGNORE keeps the first salt if two processes race on first run
			this.db
				.prepare("INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)")
				.run(SALT_KEY, crypto.randomBytes(SALT_BYTES).toString("hex"));
			const row = this.db.prepare("SELECT value FROM settings WHERE key = ?").get(SALT_KEY) as
				| { value: string }
				| undefined;
			if (!row) {
				throw new StoreIOError("installation salt missing after insert");
			}
			return Buffer.from(row.value, "hex");
		});
	}

	private io<T>(operation: string, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			if (err instanceof StoreIOError) throw err;
			throw new StoreIOError(`credential store ${operation} failed: ${String(err)}`, {
				cause: err,
			});
		}
	}
}
