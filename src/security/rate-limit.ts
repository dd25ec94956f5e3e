/**
 * SQLite-backed fixed-window rate limiter for bot commands.
 *
 * Counters persist across restarts. Fails closed: if the check itself errors,
 * the command is refused.
 */

import type Database from "better-sqlite3";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "rate-limit" });

export type RateLimitResult = {
	allowed: boolean;
	remaining: number;
	/** Ms until the current window ends. */
	resetMs: number;
};

export type CommandRateLimiterOptions = {
	limit: number;
	windowMs?: number;
	/** Namespace in the rate_limits table. Default: "command". */
	limiterType?: string;
	now?: () => number;
};

export class CommandRateLimiter {
	private readonly limit: number;
	private readonly windowMs: number;
	private readonly limiterType: string;
	private readonly now: () => number;

	constructor(
		private readonly db: Database.Database,
		options: CommandRateLimiterOptions,
	) {
		this.limit = Math.max(1, options.limit);
		this.windowMs = options.windowMs ?? 60_000;
		this.limiterType = options.limiterType ?? "command";
		this.now = options.now ?? Date.now;
	}

	/**
	 * Count one attempt for `key` and report whether it is allowed.
	 * Refused attempts are not counted.
	 */
	consume(key: string): RateLimitResult {
		const now = this.now();
		const windowStart = Math.floor(now / this.windowMs) * this.windowMs;
		const resetMs = windowStart + this.windowMs - now;

		try {
			return this.db.transaction(() => {
				const row = this.db
					.prepare(
						"SELECT points FROM rate_limits WHERE limiter_type = ? AND key = ? AND window_start = ?",
					)
					.get(this.limiterType, key, windowStart) as { points: number } | undefined;
				const current = row?.points ?? 0;

				if (current >= this.limit) {
					return { allowed: false, remaining: 0, resetMs };
				}

				this.db
					.prepare(
						`INSERT INTO rate_limits (limiter_type, key, window_start, points)
						 VALUES (?, ?, ?, 1)
						 ON CONFLICT(limiter_type, key, window_start)
						 DO UPDATE SET points = points + 1`,
					)
					.run(this.limiterType, key, windowStart);

				return { allowed: true, remaining: this.limit - current - 1, resetMs };
			})();
		} catch (err) {
			logger.error({ error: String(err), key }, "rate limit check failed - blocking");
			return { allowed: false, remaining: 0, resetMs };
		}
	}
}
