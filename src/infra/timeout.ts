/**
 * Timeout utilities for async operations.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type WithTimeoutOptions = {
	label?: string;
	/** Runs once when the timeout wins the race, e.g. to abort the underlying work. */
	onTimeout?: () => void;
};

/**
 * Race a promise against a timeout. Rejects with TimeoutError if the
 * timeout fires first.
 *
 * The original promise keeps running; pass `onTimeout` to cancel it.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	options: WithTimeoutOptions = {},
): Promise<T> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return promise;
	}

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		const timer = setTimeout(() => {
			if (settled) return;
			settled = true;
			options.onTimeout?.();
			reject(
				new TimeoutError(
					`${options.label ?? "operation"} timed out after ${timeoutMs}ms`,
					timeoutMs,
				),
			);
		}, timeoutMs);
		timer.unref();

		promise.then(
			(value) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				resolve(value);
			},
			(err: unknown) => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				reject(err);
			},
		);
	});
}

/**
 * fetch() that aborts the request itself when the timeout fires.
 */
export async function fetchWithTimeout(
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
): Promise<Response> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return fetch(url, init);
	}

	const controller = new AbortController();
	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs));
	}, timeoutMs);
	timer.unref();

	try {
		return await fetch(url, { ...init, signal: controller.signal });
	} finally {
		clearTimeout(timer);
	}
}
