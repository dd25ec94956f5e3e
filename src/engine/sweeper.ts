import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { ReconciliationEngine } from "./reconciler.js";

const logger = getChildLogger({ module: "recovery-sweep" });

export type RecoverySweep = {
	stop: () => void;
};

/**
 * Periodically re-drive stuck PENDING_* records.
 *
 * The first pass runs immediately and treats every pending record without a
 * scheduled retry as due: after a restart nothing is in flight, so whatever is
 * pending was interrupted.
 */
export function startRecoverySweep(
	engine: Pick<ReconciliationEngine, "sweep">,
	options: { intervalMs: number; staleAfterMs: number; now?: () => number },
): RecoverySweep {
	const intervalMs = Math.max(1_000, options.intervalMs);
	const now = options.now ?? Date.now;
	let running = false;

	const tick = async (staleAfterMs: number) => {
		if (running) {
			return;
		}
		running = true;
		try {
			await engine.sweep(now(), staleAfterMs);
		} catch (err) {
			logger.error({ error: formatErrorSafe(err) }, "recovery sweep failed");
		} finally {
			running = false;
		}
	};

	const timer = setInterval(() => {
		void tick(options.staleAfterMs);
	}, intervalMs);
	timer.unref();

	void tick(0);

	return {
		stop: () => {
			clearInterval(timer);
		},
	};
}
