/**
 * Per-key mutual exclusion.
 *
 * Callers for the same key run strictly one after another in arrival order;
 * different keys never wait on each other. The lock is released on every exit
 * path of `fn`, including throws.
 */
export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();
	private readonly holders = new Map<string, number>();

	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();

		let release: (() => void) | undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);
		this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

		try {
			await previous;
			return await fn();
		} finally {
			release?.();
			const remaining = (this.holders.get(key) ?? 1) - 1;
			if (remaining > 0) {
				this.holders.set(key, remaining);
			} else {
				this.holders.delete(key);
			}
			// Only drop the tail if nobody queued behind us
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** True while any caller holds or waits for the key. */
	isLocked(key: string): boolean {
		return this.holders.has(key);
	}

	/** Number of keys with a holder or waiter. */
	get size(): number {
		return this.holders.size;
	}
}
