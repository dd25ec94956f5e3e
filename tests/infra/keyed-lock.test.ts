import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../../src/infra/keyed-lock.js";

function deferred<T = void>() {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("infra/keyed-lock", () => {
	it("runs callers for the same key one at a time in arrival order", async () => {
		const mutex = new KeyedMutex();
		const order: string[] = [];
		const gate = deferred();

		const first = mutex.run("u1", async () => {
			order.push("first:start");
			await gate.promise;
			order.push("first:end");
		});
		const second = mutex.run("u1", async () => {
			order.push("second");
		});

		await new Promise((resolve) => setTimeout(resolve, 0));
		expect(order).toEqual(["first:start"]);
		expect(mutex.isLocked("u1")).toBe(true);

		gate.resolve();
		await Promise.all([first, second]);

		expect(order).toEqual(["first:start", "first:end", "second"]);
		expect(mutex.isLocked("u1")).toBe(false);
		expect(mutex.size).toBe(0);
	});

	it("does not block different keys", async () => {
		const mutex = new KeyedMutex();
		const gate = deferred();
		const order: string[] = [];

		const slow = mutex.run("u1", async () => {
			await gate.promise;
			order.push("u1");
		});
		await mutex.run("u2", async () => {
			order.push("u2");
		});

		expect(order).toEqual(["u2"]);
		gate.resolve();
		await slow;
		expect(order).toEqual(["u2", "u1"]);
	});

	it("releases the lock when the holder throws", async () => {
		const mutex = new KeyedMutex();

		await expect(
			mutex.run("u1", async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		await expect(mutex.run("u1", async () => "next")).resolves.toBe("next");
		expect(mutex.isLocked("u1")).toBe(false);
	});
});
