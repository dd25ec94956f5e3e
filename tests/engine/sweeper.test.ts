import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { SweepResult } from "../../src/engine/reconciler.js";
import { startRecoverySweep } from "../../src/engine/sweeper.js";

const mockLogger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => mockLogger,
}));

const EMPTY: SweepResult = {
	examined: 0,
	redriven: 0,
	skippedLocked: 0,
	skippedScheduled: 0,
	errors: 0,
};

describe("startRecoverySweep", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		mockLogger.error.mockClear();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("sweeps everything pending at startup, then on the interval with the stale threshold", async () => {
		const sweep = vi.fn(async () => EMPTY);
		const handle = startRecoverySweep(
			{ sweep },
			{ intervalMs: 5_000, staleAfterMs: 120_000, now: () => 42 },
		);

		expect(sweep).toHaveBeenCalledWith(42, 0);

		await vi.advanceTimersByTimeAsync(5_000);
		expect(sweep).toHaveBeenLastCalledWith(42, 120_000);
		expect(sweep).toHaveBeenCalledTimes(2);

		handle.stop();
		await vi.advanceTimersByTimeAsync(20_000);
		expect(sweep).toHaveBeenCalledTimes(2);
	});

	it("never runs two passes at once", async () => {
		let finish: (() => void) | undefined;
		const sweep = vi.fn(
			() =>
				new Promise<SweepResult>((resolve) => {
					finish = () => resolve(EMPTY);
				}),
		);
		const handle = startRecoverySweep({ sweep }, { intervalMs: 1_000, staleAfterMs: 0 });

		await vi.advanceTimersByTimeAsync(3_000);
		expect(sweep).toHaveBeenCalledTimes(1);

		finish?.();
		await vi.advanceTimersByTimeAsync(1_000);
		expect(sweep).toHaveBeenCalledTimes(2);
		handle.stop();
	});

	it("clamps the interval to one second", async () => {
		const sweep = vi.fn(async () => EMPTY);
		const handle = startRecoverySweep({ sweep }, { intervalMs: 10, staleAfterMs: 0 });

		await vi.advanceTimersByTimeAsync(999);
		expect(sweep).toHaveBeenCalledTimes(1);
		await vi.advanceTimersByTimeAsync(1);
		expect(sweep).toHaveBeenCalledTimes(2);
		handle.stop();
	});

	it("logs a failed pass and keeps going", async () => {
		const sweep = vi
			.fn<() => Promise<SweepResult>>()
			.mockRejectedValueOnce(new Error("database is locked"))
			.mockResolvedValue(EMPTY);
		const handle = startRecoverySweep({ sweep }, { intervalMs: 1_000, staleAfterMs: 0 });

		await vi.advanceTimersByTimeAsync(1_000);

		expect(mockLogger.error).toHaveBeenCalledWith(
			{ error: "Error: database is locked" },
			"recovery sweep failed",
		);
		expect(sweep).toHaveBeenCalledTimes(2);
		handle.stop();
	});
});
