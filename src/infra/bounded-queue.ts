/**
 * Concurrency limiter with a bounded wait queue.
 *
 * At most `maxConcurrent` tasks run at once. Further tasks wait in FIFO order
 * until `maxQueueDepth` are waiting; past that, `run` rejects immediately with
 * QueueFullError instead of queueing.
 */

export class QueueFullError extends Error {
	constructor(
		public readonly queued: number,
		public readonly maxQueueDepth: number,
	) {
		super(`queue full: ${queued} tasks waiting (max ${maxQueueDepth})`);
		this.name = "QueueFullError";
	}
}

export type BoundedQueueOptions = {
	maxConcurrent: number;
	maxQueueDepth: number;
};

export type BoundedQueueStats = {
	active: number;
	queued: number;
	maxConcurrent: number;
	maxQueueDepth: number;
};

export class BoundedQueue {
	private readonly maxConcurrent: number;
	private readonly maxQueueDepth: number;
	private active = 0;
	private readonly waiting: Array<() => void> = [];

	constructor(options: BoundedQueueOptions) {
		this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent));
		this.maxQueueDepth = Math.max(0, Math.floor(options.maxQueueDepth));
	}

	async run<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	stats(): BoundedQueueStats {
		return {
			active: this.active,
			queued: this.waiting.length,
			maxConcurrent: this.maxConcurrent,
			maxQueueDepth: this.maxQueueDepth,
		};
	}

	private async acquire(): Promise<void> {
		if (this.active < this.maxConcurrent) {
			this.active += 1;
			return;
		}
		if (this.waiting.length >= this.maxQueueDepth) {
			throw new QueueFullError(this.waiting.length, this.maxQueueDepth);
		}
		await new Promise<void>((resolve) => {
			this.waiting.push(resolve);
		});
	}

	private release(): void {
		const next = this.waiting.shift();
		if (next) {
			// Slot passes straight to the next waiter
			next();
			return;
		}
		this.active -= 1;
	}
}
