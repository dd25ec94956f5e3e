import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { openDatabase, startCleanupTimer } from "../../src/storage/db.js";

const warn = vi.hoisted(() => vi.fn());

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn,
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

describe("storage/db cleanup timer", () => {
	let db: Database.Database;

	beforeEach(() => {
		vi.useFakeTimers();
		warn.mockClear();
		db = openDatabase(":memory:");
	});

	afterEach(() => {
		vi.useRealTimers();
		if (db.open) db.close();
	});

	function countRows(): number {
		const row = db.prepare("SELECT COUNT(*) AS n FROM rate_limits").get() as { n: number };
		return row.n;
	}

	it("drops expired rate limit windows on each tick", () => {
		const insert = db.prepare(
			"INSERT INTO rate_limits (limiter_type, key, window_start, points) VALUES ('command', ?, ?, 1)",
		);
		insert.run("old", 0);
		insert.run("fresh", Date.now());
		const timer = startCleanupTimer(1_000, db);

		vi.advanceTimersByTime(1_000);

		expect(countRows()).toBe(1);
		timer.stop();
	});

	it("logs a failed pass and keeps running", () => {
		const timer = startCleanupTimer(1_000, db);
		db.close();

		vi.advanceTimersByTime(2_000);

		expect(warn).toHaveBeenCalledTimes(2);
		expect(warn.mock.calls[0][1]).toBe("rate limit cleanup failed");
		timer.stop();
	});
});
