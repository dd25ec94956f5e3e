/**
 * Process-level unhandled rejection handler.
 *
 * - config / fatal errors → exit(1)
 * - transient network errors → warn + continue
 * - AbortError → suppressed (expected during shutdown)
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (isTransientNetworkError(err)) return "transient";

	const lower = formatErrorSafe(err, 1000).toLowerCase();

	if (
		lower.includes("missing required config") ||
		lower.includes("invalid configuration") ||
		lower.includes("cannot find module")
	) {
		return "config";
	}

	if (
		lower.includes("out of memory") ||
		lower.includes("maximum call stack") ||
		lower.includes("sqlite_corrupt") ||
		lower.includes("database disk image is malformed")
	) {
		return "fatal";
	}

	return "unknown";
}

/**
 * Install the handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;
			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;
			case "config":
			case "fatal":
				logger.fatal({ process: processLabel, category }, `unrecoverable rejection: ${formatted}`);
				process.exit(1);
				break;
			default:
				// Scoped to one user; keep running.
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
