/**
 * Credential lifecycle engine.
 *
 * Membership events set a user's `target` (active or revoked); `reconcile` then
 * drives the stored `status` toward it through the provisioner. All work for a
 * user runs under that user's lock, and every state change is written to the
 * store before the next remote call, so after a crash the PENDING_* status says
 * exactly which idempotent call to repeat.
 */

import { StoreIOError, isRetryableError } from "../errors.js";
import { KeyedMutex } from "../infra/keyed-lock.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import {
	type RetryConfig,
	computeRetryDelay,
	decideRetry,
	resolveRetryConfig,
} from "../infra/retry.js";
import { getChildLogger } from "../logging.js";
import type { CredentialStore } from "../credentials/store.js";
import {
	type AdminAlert,
	type MembershipEvent,
	type NotificationMessage,
	type Notifier,
	type RemoteOperation,
	type UserCredentialRecord,
	parseAccessRequest,
	parseMembershipEvent,
} from "../credentials/types.js";
import type { RemoteProvisioner } from "../proxy/provisioner.js";
import { secretPrefix } from "../utils.js";

const logger = getChildLogger({ module: "reconciler" });

export type CredentialProvisioner = Pick<
	RemoteProvisioner,
	"provision" | "revoke" | "linkFor" | "deriveSecret"
>;

export type ReconciliationEngineOptions = {
	store: CredentialStore;
	provisioner: CredentialProvisioner;
	notifier: Notifier;
	retry?: Partial<RetryConfig>;
	/** Re-drive retryable failures from a timer. Default: true. */
	autoRetry?: boolean;
	/** Send the link again when an ACTIVE user joins again. Default: true. */
	resendLinkOnRejoin?: boolean;
	now?: () => number;
};

export type EngineStats = {
	joins: number;
	leaves: number;
	staleEvents: number;
	accessRequests: number;
	provisioned: number;
	revoked: number;
	retries: number;
	failures: number;
	notificationFailures: number;
};

export type HandleEventResult = {
	outcome: "applied" | "stale" | "duplicate";
	record: UserCredentialRecord;
};

export type AccessRequestResult = {
	/** "superseded": a leave was applied after the membership check. */
	outcome: "applied" | "superseded";
	record: UserCredentialRecord;
};

export type SweepResult = {
	examined: number;
	redriven: number;
	skippedLocked: number;
	/** Left to a retry timer already armed in this process. */
	skippedScheduled: number;
	errors: number;
};

type Cursor = { record: UserCredentialRecord };

type DriveContext = {
	/** Event fields changed and must be persisted even if nothing else happens. */
	dirty: boolean;
	resendLink: boolean;
};

export class ReconciliationEngine {
	private readonly store: CredentialStore;
	private readonly provisioner: CredentialProvisioner;
	private readonly notifier: Notifier;
	private readonly retryConfig: RetryConfig;
	private readonly autoRetry: boolean;
	private readonly resendLinkOnRejoin: boolean;
	private readonly now: () => number;

	private readonly locks = new KeyedMutex();
	private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
	private readonly inflight = new Set<Promise<unknown>>();
	private stopped = false;

	private readonly stats: EngineStats = {
		joins: 0,
		leaves: 0,
		staleEvents: 0,
		accessRequests: 0,
		provisioned: 0,
		revoked: 0,
		retries: 0,
		failures: 0,
		notificationFailures: 0,
	};

	constructor(options: ReconciliationEngineOptions) {
		this.store = options.store;
		this.provisioner = options.provisioner;
		this.notifier = options.notifier;
		this.retryConfig = resolveRetryConfig(options.retry);
		this.autoRetry = options.autoRetry ?? true;
		this.resendLinkOnRejoin = options.resendLinkOnRejoin ?? true;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Apply one membership event and reconcile the user. Resolves once the
	 * user's record has settled (ACTIVE, REVOKED, FAILED, or pending a retry).
	 * Throws a ZodError for a malformed event and StoreIOError when the store
	 * cannot be read.
	 */
	async handleEvent(raw: unknown): Promise<HandleEventResult> {
		const event = parseMembershipEvent(raw);

		return this.locks.run(event.userId, async () => {
			const existing = this.store.get(event.userId);

			const verdict = classifyEvent(existing, event);
			if (existing && verdict !== "apply") {
				this.stats.staleEvents += 1;
				logger.info(
					{
						userId: event.userId,
						type: event.type,
						timestamp: event.timestamp,
						lastEventAt: existing.lastEventAt,
					},
					verdict === "stale" ? "dropping stale event" : "dropping duplicate event",
				);
				return { outcome: verdict, record: existing };
			}

			if (event.type === "join") this.stats.joins += 1;
			else this.stats.leaves += 1;

			const now = this.now();
			const base = existing ?? newRecord(event.userId, now);
			const record: UserCredentialRecord = {
				...base,
				username: event.username ?? base.username,
				target: event.type === "join" ? "active" : "revoked",
				lastEventAt: event.timestamp,
				lastEventType: event.type,
			};

			logger.debug(
				{ userId: event.userId, type: event.type, status: record.status },
				"membership event accepted",
			);

			const rejoinedWhileActive = event.type === "join" && existing?.status === "ACTIVE";
			const settled = await this.drive(record, {
				dirty: true,
				resendLink: rejoinedWhileActive && this.resendLinkOnRejoin,
			});
			return { outcome: "applied", record: settled };
		});
	}

	/**
	 * Fire-and-forget form of handleEvent for event sources. Failures are logged.
	 */
	submit(raw: unknown): void {
		this.track(
			this.handleEvent(raw).catch((err: unknown) => {
				logger.error({ error: formatErrorSafe(err) }, "membership event failed");
			}),
		);
	}

	/**
	 * Grant or re-send access to a user whose membership was just confirmed.
	 *
	 * This is not a membership event: `lastEventAt` and `lastEventType` are left
	 * as they are, so any leave Telegram reports afterwards still applies. The
	 * request is refused when a leave was applied at or after `checkedAt`.
	 */
	async requestAccess(raw: unknown): Promise<AccessRequestResult> {
		const request = parseAccessRequest(raw);

		return this.locks.run(request.userId, async () => {
			const existing = this.store.get(request.userId);

			if (
				existing &&
				existing.target === "revoked" &&
				existing.lastEventType === "leave" &&
				existing.updatedAt >= request.checkedAt
			) {
				logger.info(
					{ userId: request.userId, checkedAt: request.checkedAt, updatedAt: existing.updatedAt },
					"access request superseded by a later leave",
				);
				return { outcome: "superseded", record: existing };
			}

			this.stats.accessRequests += 1;
			const base = existing ?? newRecord(request.userId, this.now());
			const record: UserCredentialRecord = {
				...base,
				username: request.username ?? base.username,
				target: "active",
			};
			const settled = await this.drive(record, {
				dirty: true,
				resendLink: base.status === "ACTIVE",
			});
			return { outcome: "applied", record: settled };
		});
	}

	/**
	 * Fire-and-forget form of requestAccess for bot commands. Failures are logged.
	 */
	submitAccessRequest(raw: unknown): void {
		this.track(
			this.requestAccess(raw).catch((err: unknown) => {
				logger.error({ error: formatErrorSafe(err) }, "access request failed");
			}),
		);
	}

	/**
	 * Drive one user's stored record toward its target. Null when the user is unknown.
	 */
	async reconcile(userId: string): Promise<UserCredentialRecord | null> {
		return this.locks.run(userId, async () => {
			const record = this.store.get(userId);
			if (!record) return null;
			return this.drive(record, { dirty: false, resendLink: false });
		});
	}

	/**
	 * Operator re-drive: clears the failure count and reconciles, FAILED included.
	 */
	async retry(userId: string): Promise<UserCredentialRecord | null> {
		return this.locks.run(userId, async () => {
			const record = this.store.get(userId);
			if (!record) return null;
			logger.info({ userId, status: record.status }, "manual retry");
			return this.drive({ ...record, failureCount: 0, nextAttemptAt: null }, {
				dirty: true,
				resendLink: false,
			});
		});
	}

	/**
	 * Re-drive PENDING_* records that are due: a scheduled retry whose time has
	 * come, or, with no retry scheduled, a record untouched for `staleAfterMs`.
	 * Users whose lock is held are left to the current holder, and users with
	 * a retry timer armed are left to that timer.
	 */
	async sweep(now: number = this.now(), staleAfterMs = 0): Promise<SweepResult> {
		const pending = [
			...this.store.listByStatus("PENDING_PROVISION"),
			...this.store.listByStatus("PENDING_REVOKE"),
		];
		const due = pending.filter((record) =>
			record.nextAttemptAt !== null
				? record.nextAttemptAt <= now
				: record.updatedAt <= now - staleAfterMs,
		);

		let skippedLocked = 0;
		let skippedScheduled = 0;
		const work: Promise<UserCredentialRecord | null>[] = [];
		for (const record of due) {
			if (this.locks.isLocked(record.userId)) {
				skippedLocked += 1;
				continue;
			}
			if (this.timers.has(record.userId)) {
				skippedScheduled += 1;
				continue;
			}
			work.push(this.reconcile(record.userId));
		}

		const results = await Promise.allSettled(work);
		const errors = results.filter((r) => r.status === "rejected").length;
		for (const result of results) {
			if (result.status === "rejected") {
				logger.warn({ error: formatErrorSafe(result.reason) }, "sweep re-drive failed");
			}
		}

		const summary = {
			examined: pending.length,
			redriven: work.length,
			skippedLocked,
			skippedScheduled,
			errors,
		};
		if (summary.redriven > 0 || summary.skippedLocked > 0 || summary.skippedScheduled > 0) {
			logger.info(summary, "recovery sweep");
		}
		return summary;
	}

	getStats(): EngineStats {
		return { ...this.stats };
	}

	/** Number of scheduled retry timers. */
	get scheduledRetries(): number {
		return this.timers.size;
	}

	/**
	 * Cancel retry timers and wait for submitted events to settle.
	 */
	async stop(): Promise<void> {
		this.stopped = true;
		for (const timer of this.timers.values()) {
			clearTimeout(timer);
		}
		this.timers.clear();
		await Promise.allSettled([...this.inflight]);
	}

	// ─────────────────────────────────────────────────────────────────────────
	// State machine
	// ─────────────────────────────────────────────────────────────────────────

	private async drive(record: UserCredentialRecord, ctx: DriveContext): Promise<UserCredentialRecord> {
		// Tracks the last persisted state, which is what a failure is recorded against
		const cursor: Cursor = { record };
		try {
			if (record.target === "active") {
				switch (record.status) {
					case "ACTIVE": {
						const current = ctx.dirty ? this.save(record) : record;
						if (ctx.resendLink && current.proxyLink) {
							await this.deliver(current.userId, {
								kind: "access_granted",
								link: current.proxyLink,
								reissued: false,
							});
						}
						return current;
					}
					case "PENDING_PROVISION":
						return await this.provisionCycle(cursor, false);
					case "FAILED":
						if (record.failedOperation !== "revoke") {
							return await this.provisionCycle(cursor, false);
						}
						await this.revokeSecret(cursor, false);
						break;
					case "PENDING_REVOKE":
						await this.revokeSecret(cursor, false);
						break;
					case "REVOKED":
						break;
				}
				return await this.provisionCycle(cursor, true);
			}

			switch (record.status) {
				case "REVOKED":
					return ctx.dirty ? this.save(record) : record;
				case "ACTIVE":
				case "PENDING_REVOKE":
					return await this.revokeSecret(cursor, true);
				case "FAILED":
					return await this.revokeSecret(cursor, record.failedOperation === "revoke");
				default:
					// PENDING_PROVISION: the link was never delivered, clean up quietly
					return await this.revokeSecret(cursor, false);
			}
		} catch (err) {
			return this.handleFailure(cursor.record, err);
		}
	}

	/**
	 * Add the cycle's secret and mark the user ACTIVE. `fresh` starts a new
	 * generation; otherwise the current one is re-applied.
	 */
	private async provisionCycle(cursor: Cursor, fresh: boolean): Promise<UserCredentialRecord> {
		const record = cursor.record;
		const generation = fresh || record.generation < 1 ? record.generation + 1 : record.generation;
		const secret = this.provisioner.deriveSecret(record.userId, generation);
		const continuing = !fresh && record.status === "PENDING_PROVISION";

		const pending = this.save({
			...record,
			status: "PENDING_PROVISION",
			generation,
			secret,
			proxyLink: null,
			failureCount: continuing ? record.failureCount : 0,
			failedOperation: null,
			nextAttemptAt: null,
		});
		cursor.record = pending;

		const confirmed = await this.provisioner.provision(record.userId, generation);
		const link = this.provisioner.linkFor(confirmed);

		const active = this.save({
			...pending,
			status: "ACTIVE",
			secret: confirmed,
			proxyLink: link,
			failureCount: 0,
			lastError: null,
		});
		cursor.record = active;
		this.cancelRetry(record.userId);
		this.stats.provisioned += 1;
		logger.info(
			{ userId: record.userId, generation, secret: secretPrefix(confirmed) },
			"access granted",
		);

		await this.deliver(record.userId, { kind: "access_granted", link, reissued: generation > 1 });
		return active;
	}

	/**
	 * Remove the user's current secret and mark them REVOKED.
	 */
	private async revokeSecret(cursor: Cursor, notifyUser: boolean): Promise<UserCredentialRecord> {
		const record = cursor.record;
		const secret =
			record.secret ??
			(record.generation > 0 ? this.provisioner.deriveSecret(record.userId, record.generation) : null);

		if (secret !== null) {
			cursor.record = this.save({
				...record,
				status: "PENDING_REVOKE",
				secret,
				proxyLink: null,
				failureCount: record.status === "PENDING_REVOKE" ? record.failureCount : 0,
				failedOperation: null,
				nextAttemptAt: null,
			});
			await this.provisioner.revoke(secret);
		}

		const revoked = this.save({
			...cursor.record,
			status: "REVOKED",
			secret: null,
			proxyLink: null,
			failureCount: 0,
			failedOperation: null,
			lastError: null,
			nextAttemptAt: null,
		});
		cursor.record = revoked;
		this.cancelRetry(record.userId);
		if (secret !== null) {
			this.stats.revoked += 1;
			logger.info({ userId: record.userId, secret: secretPrefix(secret) }, "access revoked");
		}

		if (notifyUser) {
			await this.deliver(record.userId, { kind: "access_revoked" });
		}
		return revoked;
	}

	private async handleFailure(
		current: UserCredentialRecord,
		err: unknown,
	): Promise<UserCredentialRecord> {
		const userId = current.userId;
		const reason = formatErrorSafe(err);
		const operation: RemoteOperation = current.status === "PENDING_REVOKE" ? "revoke" : "provision";

		if (err instanceof StoreIOError) {
			// Nothing was persisted past `current`. The caller learns about it; a
			// stored record is also re-driven from a timer.
			this.stats.retries += 1;
			const delayMs = computeRetryDelay(this.retryConfig, current.failureCount + 1);
			logger.error({ userId, error: reason, delayMs }, "store write failed; state not advanced");
			this.scheduleRetry(userId, delayMs);
			throw err;
		}

		const isFatal = !isRetryableError(err);
		const failureCount = current.failureCount + 1;
		const decision = isFatal ? null : decideRetry(this.retryConfig, failureCount);

		if (decision?.kind === "retry") {
			this.stats.retries += 1;
			logger.warn(
				{ userId, operation, failureCount, delayMs: decision.delayMs, error: reason },
				`${operation} failed; retry scheduled`,
			);
			const next = this.trySave({
				...current,
				failureCount,
				lastError: reason,
				nextAttemptAt: this.now() + decision.delayMs,
			});
			this.scheduleRetry(userId, decision.delayMs);
			return next;
		}

		this.stats.failures += 1;
		logger.error(
			{ userId, operation, failureCount, error: reason },
			isFatal ? `${operation} rejected` : `${operation} gave up after ${failureCount} attempts`,
		);
		const failed = this.trySave({
			...current,
			status: "FAILED",
			failureCount,
			failedOperation: operation,
			lastError: reason,
			nextAttemptAt: null,
		});
		this.cancelRetry(userId);

		if (operation === "provision") {
			await this.deliver(userId, { kind: "provisioning_failed", reason });
		}
		await this.alert({
			level: "error",
			title: `${operation} failed`,
			message: `User ${userId}: ${reason}`,
		});
		return failed;
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Helpers
	// ─────────────────────────────────────────────────────────────────────────

	private save(record: UserCredentialRecord): UserCredentialRecord {
		const next = { ...record, updatedAt: this.now() };
		this.store.upsert(next);
		return next;
	}

	/** Persist failure bookkeeping; if even that fails, keep the retry in memory. */
	private trySave(record: UserCredentialRecord): UserCredentialRecord {
		try {
			return this.save(record);
		} catch (err) {
			logger.error(
				{ userId: record.userId, error: formatErrorSafe(err) },
				"could not persist failure state",
			);
			this.scheduleRetry(record.userId, computeRetryDelay(this.retryConfig, record.failureCount));
			return record;
		}
	}

	private scheduleRetry(userId: string, delayMs: number): void {
		if (!this.autoRetry || this.stopped) return;
		this.cancelRetry(userId);
		const timer = setTimeout(() => {
			this.timers.delete(userId);
			this.track(
				this.reconcile(userId).catch((err: unknown) => {
					logger.error({ userId, error: formatErrorSafe(err) }, "scheduled retry failed");
				}),
			);
		}, delayMs);
		timer.unref();
		this.timers.set(userId, timer);
	}

	private cancelRetry(userId: string): void {
		const timer = this.timers.get(userId);
		if (timer) {
			clearTimeout(timer);
			this.timers.delete(userId);
		}
	}

	private track(promise: Promise<unknown>): void {
		this.inflight.add(promise);
		void promise.finally(() => {
			this.inflight.delete(promise);
		});
	}

	private async deliver(userId: string, message: NotificationMessage): Promise<void> {
		try {
			await this.notifier.notify(userId, message);
		} catch (err) {
			this.stats.notificationFailures += 1;
			logger.warn(
				{ userId, kind: message.kind, error: formatErrorSafe(err) },
				"notification not delivered",
			);
		}
	}

	private async alert(alert: AdminAlert): Promise<void> {
		try {
			await this.notifier.alertAdmins(alert);
		} catch (err) {
			this.stats.notificationFailures += 1;
			logger.warn({ title: alert.title, error: formatErrorSafe(err) }, "admin alert not delivered");
		}
	}
}

function newRecord(userId: string, now: number): UserCredentialRecord {
	return {
		userId,
		username: null,
		status: "REVOKED",
		target: "revoked",
		secret: null,
		proxyLink: null,
		generation: 0,
		failureCount: 0,
		failedOperation: null,
		lastError: null,
		lastEventAt: null,
		lastEventType: null,
		nextAttemptAt: null,
		createdAt: now,
		updatedAt: now,
	};
}

/**
 * Events are ordered by timestamp. On a tie, a leave beats a join and an
 * identical event is a redelivery.
 */
export function classifyEvent(
	existing: UserCredentialRecord | null,
	event: MembershipEvent,
): "apply" | "stale" | "duplicate" {
	if (!existing || existing.lastEventAt === null) return "apply";
	if (event.timestamp < existing.lastEventAt) return "stale";
	if (event.timestamp > existing.lastEventAt) return "apply";
	if (event.type === existing.lastEventType) return "duplicate";
	return event.type === "join" ? "stale" : "apply";
}
