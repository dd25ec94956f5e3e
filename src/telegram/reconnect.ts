import type { TelegramConfig } from "../config/config.js";
import { computeRetryDelay } from "../infra/retry.js";

export type ReconnectPolicy = {
	initialMs: number;
	maxMs: number;
	factor: number;
	jitter: number;
	maxAttempts: number;
};

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
	initialMs: 1_000,
	maxMs: 60_000,
	factor: 2.0,
	jitter: 0.3,
	maxAttempts: 0, // 0 = unlimited
};

/**
 * Resolve reconnect policy from config.
 */
export function resolveReconnectPolicy(
	config: { telegram?: TelegramConfig },
	overrides?: Partial<ReconnectPolicy>,
): ReconnectPolicy {
	const cfg = config.telegram?.reconnect;
	return {
		initialMs: overrides?.initialMs ?? cfg?.initialMs ?? DEFAULT_RECONNECT_POLICY.initialMs,
		maxMs: overrides?.maxMs ?? cfg?.maxMs ?? DEFAULT_RECONNECT_POLICY.maxMs,
		factor: overrides?.factor ?? cfg?.factor ?? DEFAULT_RECONNECT_POLICY.factor,
		jitter: overrides?.jitter ?? cfg?.jitter ?? DEFAULT_RECONNECT_POLICY.jitter,
		maxAttempts: overrides?.maxAttempts ?? cfg?.maxAttempts ?? DEFAULT_RECONNECT_POLICY.maxAttempts,
	};
}

/**
 * Backoff delay before reconnect attempt `attempt` (1-based).
 */
export function computeBackoff(policy: ReconnectPolicy, attempt: number): number {
	return computeRetryDelay(
		{
			maxAttempts: policy.maxAttempts,
			baseDelayMs: policy.initialMs,
			maxDelayMs: policy.maxMs,
			factor: policy.factor,
			jitter: policy.jitter,
		},
		attempt,
	);
}

/**
 * Sleep with optional abort signal.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new Error("Aborted"));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new Error("Aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
