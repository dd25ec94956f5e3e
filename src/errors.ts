/**
 * Failure kinds of the credential lifecycle.
 *
 * `retryable` is what the engine looks at: retryable failures keep the record
 * pending and are re-driven later, the rest mark it FAILED.
 */

export abstract class ProvisioningError extends Error {
	abstract readonly retryable: boolean;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Transport or authentication failure on the management channel. */
export class RetryableTransportError extends ProvisioningError {
	readonly retryable = true;
}

/** Too many remote calls already waiting; try again later. */
export class QueueSaturatedError extends RetryableTransportError {}

/** The proxy side validated and refused the operation. Not retried. */
export class FatalRemoteError extends ProvisioningError {
	readonly retryable = false;

	constructor(
		message: string,
		public readonly exitCode: number | null = null,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/** Reading or writing the credential store failed. State must not advance. */
export class StoreIOError extends ProvisioningError {
	readonly retryable = true;
}

/**
 * A remote call timed out: it may or may not have been applied. Resolved only by
 * an idempotent retry, never by assuming either outcome.
 */
export class AmbiguousTimeoutError extends ProvisioningError {
	readonly retryable = true;

	constructor(
		message: string,
		public readonly timeoutMs: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export function isRetryableError(err: unknown): boolean {
	return err instanceof ProvisioningError && err.retryable;
}
