/**
 * The only component that changes the proxy server's secret set.
 *
 * Every call is admitted through a bounded queue and raced against a timeout.
 * A timed-out call aborts the channel and surfaces as AmbiguousTimeoutError: the
 * server may or may not have applied it, and only an idempotent retry settles it.
 */

import {
	AmbiguousTimeoutError,
	ProvisioningError,
	QueueSaturatedError,
	RetryableTransportError,
} from "../errors.js";
import { BoundedQueue, type BoundedQueueStats, QueueFullError } from "../infra/bounded-queue.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { TimeoutError, withTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { secretPrefix } from "../utils.js";
import type { ProxyControlChannel } from "./channel.js";
import { type ProxyEndpoint, buildProxyLink, deriveSecret } from "./secret.js";

const logger = getChildLogger({ module: "provisioner" });

export type RemoteProvisionerOptions = {
	channel: ProxyControlChannel;
	endpoint: ProxyEndpoint;
	/** Installation salt; see CredentialStore.getInstallationSalt. */
	salt: Buffer;
	maxConcurrent?: number;
	maxQueueDepth?: number;
	timeoutMs?: number;
};

export class RemoteProvisioner {
	private readonly channel: ProxyControlChannel;
	private readonly endpoint: ProxyEndpoint;
	private readonly salt: Buffer;
	private readonly queue: BoundedQueue;
	private readonly timeoutMs: number;

	constructor(options: RemoteProvisionerOptions) {
		this.channel = options.channel;
		this.endpoint = options.endpoint;
		this.salt = options.salt;
		this.queue = new BoundedQueue({
			maxConcurrent: options.maxConcurrent ?? 1,
			maxQueueDepth: options.maxQueueDepth ?? 50,
		});
		this.timeoutMs = options.timeoutMs ?? 30_000;
	}

	deriveSecret(userId: string, generation: number): string {
		return deriveSecret(this.salt, userId, generation);
	}

	linkFor(secret: string): string {
		return buildProxyLink(this.endpoint, secret);
	}

	/**
	 * Make sure the cycle's secret exists on the server and return it.
	 */
	async provision(userId: string, generation: number): Promise<string> {
		const secret = this.deriveSecret(userId, generation);
		await this.call("add", secret, (signal) => this.channel.addSecret(secret, signal));
		logger.info({ userId, generation, secret: secretPrefix(secret) }, "secret provisioned");
		return secret;
	}

	/**
	 * Make sure `secret` is gone from the server.
	 */
	async revoke(secret: string): Promise<void> {
		await this.call("remove", secret, (signal) => this.channel.removeSecret(secret, signal));
		logger.info({ secret: secretPrefix(secret) }, "secret revoked");
	}

	queueStats(): BoundedQueueStats {
		return this.queue.stats();
	}

	private async call(
		action: "add" | "remove",
		secret: string,
		fn: (signal: AbortSignal) => Promise<void>,
	): Promise<void> {
		const label = `${this.channel.name} ${action} ${secretPrefix(secret)}`;
		try {
			await this.queue.run(() => {
				const controller = new AbortController();
				const pending = fn(controller.signal);
				return withTimeout(pending, this.timeoutMs, {
					label,
					onTimeout: () => controller.abort(),
				}).catch(async (err: unknown) => {
					if (err instanceof TimeoutError) {
						// Hold the slot until the aborted call has actually stopped
						await pending.catch((lateErr: unknown) => {
							logger.debug({ error: formatErrorSafe(lateErr) }, `${label}: settled after timeout`);
						});
					}
					throw err;
				});
			});
		} catch (err) {
			throw toProvisioningError(err, label, this.timeoutMs);
		}
	}
}

function toProvisioningError(err: unknown, label: string, timeoutMs: number): ProvisioningError {
	if (err instanceof ProvisioningError) return err;
	if (err instanceof QueueFullError) {
		return new QueueSaturatedError(`${label}: ${err.message}`, { cause: err });
	}
	if (err instanceof TimeoutError) {
		return new AmbiguousTimeoutError(`${label}: outcome unknown after ${timeoutMs}ms`, timeoutMs, {
			cause: err,
		});
	}
	return new RetryableTransportError(`${label}: ${formatErrorSafe(err)}`, { cause: err });
}
