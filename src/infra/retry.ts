import { sleep } from "../utils.js";

export type RetryConfig = {
	/** Maximum number of attempts (including the first). Must be >= 1. */
	maxAttempts: number;
	/** Delay before the first retry. */
	baseDelayMs: number;
	/** Upper bound for any single delay. */
	maxDelayMs: number;
	/** Exponential backoff factor. Default: 2. */
	factor: number;
	/** Jitter factor (0–1). Randomizes delay by ±jitter. Default: 0.25. */
	jitter: number;
};

export type RetryOptions = Partial<RetryConfig> & {
	/** Return false to stop retrying. Defaults to always-retry. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	/** Called before each retry sleep. */
	onRetry?: (err: unknown, info: RetryInfo) => void;
	label?: string;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	maxAttempts: number;
	delayMs: number;
};

const DEFAULT_CONFIG: RetryConfig = {
	maxAttempts: 3,
	baseDelayMs: 1000,
	maxDelayMs: 30_000,
	factor: 2,
	jitter: 0.25,
};

export function resolveRetryConfig(opts?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_CONFIG.maxAttempts),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_CONFIG.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs),
		factor: Math.max(1, opts?.factor ?? DEFAULT_CONFIG.factor),
		jitter: Math.min(1, Math.max(0, opts?.jitter ?? DEFAULT_CONFIG.jitter)),
	};
}

/**
 * Backoff delay after the given failed attempt (1-based).
 */
export function computeRetryDelay(config: RetryConfig, attempt: number): number {
	const base = config.baseDelayMs * config.factor ** (Math.max(1, attempt) - 1);
	const capped = Math.min(base, config.maxDelayMs);
	const jitterRange = capped * config.jitter;
	const jitter = (Math.random() - 0.5) * 2 * jitterRange;
	return Math.max(0, Math.round(capped + jitter));
}

export type RetryDecision = { kind: "retry"; delayMs: number } | { kind: "give-up" };

/**
 * Decide what to do after a persisted operation failed for the `failureCount`-th time.
 * Used where the retry is rescheduled rather than awaited in a loop.
 */
export function decideRetry(config: RetryConfig, failureCount: number): RetryDecision {
	if (failureCount >= config.maxAttempts) {
		return { kind: "give-up" };
	}
	return { kind: "retry", delayMs: computeRetryDelay(config, failureCount) };
}

/**
 * Retry an async operation in place with exponential backoff and jitter.
 *
 * @example
 * ```ts
 * const host = await retryAsync(() => lookupPublicHost(), {
 *   maxAttempts: 3,
 *   shouldRetry: (err) => isTransientNetworkError(err),
 * });
 * ```
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
	const config = resolveRetryConfig(opts);
	const { shouldRetry, onRetry, label } = opts ?? {};

	let lastError: unknown;

	for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
		try {
			return await fn();
		} catch (err) {
			lastError = err;
			if (attempt >= config.maxAttempts) {
				break;
			}

			const info: RetryInfo = {
				attempt,
				maxAttempts: config.maxAttempts,
				delayMs: computeRetryDelay(config, attempt),
			};
			if (shouldRetry && !shouldRetry(err, info)) {
				break;
			}

			onRetry?.(err, info);
			if (info.delayMs > 0) {
				await sleep(info.delayMs);
			}
		}
	}

	const prefix = label ? `${label}: ` : "";
	throw lastError ?? new Error(`${prefix}retryAsync exhausted ${config.maxAttempts} attempts`);
}
