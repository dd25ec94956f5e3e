/**
 * Critical behaviors:
 * - Fails closed on errors (blocks requests, doesn't allow)
 * - Refused attempts are not counted
 * - Counters reset with the window
 */

import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CommandRateLimiter } from "../../src/security/rate-limit.js";
import { cleanupExpired, openDatabase } from "../../src/storage/db.js";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

describe("CommandRateLimiter", () => {
	let db: Database.Database;
	let clock: number;

	beforeEach(() => {
		db = openDatabase(":memory:");
		clock = 120_000;
	});

	afterEach(() => {
		if (db.open) db.close();
	});

	function limiter(limit = 3) {
		return new CommandRateLimiter(db, { limit, windowMs: 60_000, now: () => clock });
	}

	it("allows up to the limit within a window", () => {
		const rl = limiter();

		expect(rl.consume("42")).toEqual({ allowed: true, remaining: 2, resetMs: 60_000 });
		expect(rl.consume("42").remaining).toBe(1);
		expect(rl.consume("42").remaining).toBe(0);
		expect(rl.consume("42")).toEqual({ allowed: false, remaining: 0, resetMs: 60_000 });
	});

	it("does not count refused attempts", () => {
		const rl = limiter(1);
		rl.consume("42");
		rl.consume("42");
		rl.consume("42");

		const row = db
			.prepare("SELECT points FROM rate_limits WHERE key = ?")
			.get("42") as { points: number } | undefined;
		expect(row?.points).toBe(1);
	});

	it("keeps keys and limiter types apart", () => {
		const commands = limiter(1);
		const other = new CommandRateLimiter(db, {
			limit: 1,
			limiterType: "start",
			now: () => clock,
		});

		expect(commands.consume("1").allowed).toBe(true);
		expect(commands.consume("2").allowed).toBe(true);
		expect(other.consume("1").allowed).toBe(true);
		expect(commands.consume("1").allowed).toBe(false);
	});

	it("starts a fresh window", () => {
		const rl = limiter(1);
		clock = 150_000;
		expect(rl.consume("42")).toEqual({ allowed: true, remaining: 0, resetMs: 30_000 });
		expect(rl.consume("42").allowed).toBe(false);

		clock = 180_000;
		expect(rl.consume("42").allowed).toBe(true);
	});

	it("blocks when the database fails", () => {
		const rl = limiter();
		db.close();

		// Must block, not allow
		expect(rl.consume("42")).toEqual({ allowed: false, remaining: 0, resetMs: 60_000 });
	});

	it("drops windows older than an hour", () => {
		new CommandRateLimiter(db, { limit: 5, now: () => 0 }).consume("42");
		new CommandRateLimiter(db, { limit: 5 }).consume("42");

		expect(cleanupExpired(db)).toEqual({ rateLimits: 1 });
		const remaining = db.prepare("SELECT COUNT(*) AS n FROM rate_limits").get() as { n: number };
		expect(remaining.n).toBe(1);
	});
});
