import { describe, expect, it } from "vitest";
import { BoundedQueue, QueueFullError } from "../../src/infra/bounded-queue.js";

function deferred<T = void>() {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("infra/bounded-queue", () => {
	it("never runs more than maxConcurrent tasks at once", async () => {
		const queue = new BoundedQueue({ maxConcurrent: 2, maxQueueDepth: 10 });
		let running = 0;
		let peak = 0;

		await Promise.all(
			Array.from({ length: 6 }, () =>
				queue.run(async () => {
					running++;
					peak = Math.max(peak, running);
					await new Promise((resolve) => setTimeout(resolve, 1));
					running--;
				}),
			),
		);

		expect(peak).toBe(2);
		expect(queue.stats()).toEqual({ active: 0, queued: 0, maxConcurrent: 2, maxQueueDepth: 10 });
	});

	it("rejects with QueueFullError once the wait queue is full", async () => {
		const queue = new BoundedQueue({ maxConcurrent: 1, maxQueueDepth: 1 });
		const gate = deferred();

		const running = queue.run(() => gate.promise);
		const waiting = queue.run(async () => "waited");

		expect(queue.stats()).toMatchObject({ active: 1, queued: 1 });
		await expect(queue.run(async () => "overflow")).rejects.toBeInstanceOf(QueueFullError);

		gate.resolve();
		await running;
		await expect(waiting).resolves.toBe("waited");
		expect(queue.stats()).toMatchObject({ active: 0, queued: 0 });
	});

	it("releases the slot when a task throws", async () => {
		const queue = new BoundedQueue({ maxConcurrent: 1, maxQueueDepth: 0 });

		await expect(
			queue.run(async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");
		await expect(queue.run(async () => "ok")).resolves.toBe("ok");
	});
});
