import { FatalRemoteError, RetryableTransportError } from "../../src/errors.js";
import type { ProxyControlChannel } from "../../src/proxy/channel.js";

type Action = "add" | "remove";

/**
 * Proxy channel backed by a Set. Failures can be queued per action; each queued
 * entry applies to one call.
 */
export class InMemoryProxyChannel implements ProxyControlChannel {
	readonly name = "memory";
	readonly secrets = new Set<string>();
	readonly calls: Array<{ action: Action; secret: string }> = [];
	private readonly failures: Array<{ action: Action; kind: "retryable" | "fatal" | "hang" }> = [];

	failNext(action: Action, kind: "retryable" | "fatal" | "hang", times = 1): void {
		for (let i = 0; i < times; i++) {
			this.failures.push({ action, kind });
		}
	}

	async addSecret(secret: string, signal: AbortSignal): Promise<void> {
		await this.apply("add", secret, signal);
		this.secrets.add(secret);
	}

	async removeSecret(secret: string, signal: AbortSignal): Promise<void> {
		await this.apply("remove", secret, signal);
		this.secrets.delete(secret);
	}

	async listSecrets(): Promise<string[]> {
		return [...this.secrets];
	}

	private async apply(action: Action, secret: string, signal: AbortSignal): Promise<void> {
		this.calls.push({ action, secret });
		// Let other callers interleave, as a real remote call would
		await new Promise((resolve) => setImmediate(resolve));

		const index = this.failures.findIndex((f) => f.action === action);
		if (index === -1) return;
		const [failure] = this.failures.splice(index, 1);
		switch (failure?.kind) {
			case "retryable":
				throw new RetryableTransportError(`memory: ${action} failed`);
			case "fatal":
				throw new FatalRemoteError(`memory: ${action} rejected`, 2);
			case "hang":
				await new Promise<void>((_resolve, reject) => {
					signal.addEventListener("abort", () => reject(signal.reason), { once: true });
				});
				break;
		}
	}
}
