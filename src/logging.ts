/**
 * One pino logger per process, writing JSON lines to a 0600 file.
 *
 * Level and file come from the `logging` config section (or a test override)
 * and are re-read on every `getLogger()`; the logger is rebuilt when either
 * changes. `--verbose` forces debug.
 */

import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import { loadConfig } from "./config/config.js";
import { isVerbose } from "./globals.js";
import { CONFIG_DIR } from "./utils.js";

export type LogTarget = {
	level: LevelWithSilent;
	file: string;
};

type Destination = ReturnType<typeof pino.destination>;

type Active = {
	key: string;
	logger: Logger;
	destination: Destination;
};

let active: Active | null = null;
let override: Partial<LogTarget> | null = null;

function resolveTarget(): LogTarget {
	const section: Partial<LogTarget> = override ?? loadConfig().logging ?? {};
	return {
		level: isVerbose() ? "debug" : (section.level ?? "info"),
		file: section.file ?? path.join(CONFIG_DIR, "logs", "mtgate.log"),
	};
}

/** Log lines carry user ids and secret prefixes; never let the file start out world-readable. */
function ensurePrivateFile(file: string): void {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	try {
		fs.closeSync(fs.openSync(file, "wx", 0o600));
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EEXIST") throw err;
	}
}

// Writes are synchronous, so there is nothing buffered to flush
function release(): void {
	active?.destination.end();
	active = null;
}

export function getLogger(): Logger {
	const target = resolveTarget();
	const key = `${target.level}\u0000${target.file}`;
	if (active?.key === key) return active.logger;

	release();
	ensurePrivateFile(target.file);
	const destination = pino.destination({ dest: target.file, sync: true });
	const logger = pino(
		{ level: target.level, base: undefined, timestamp: pino.stdTimeFunctions.isoTime },
		destination,
	);
	active = { key, logger, destination };
	return logger;
}

/** Module loggers: `getChildLogger({ module: "reconciler" })`. */
export function getChildLogger(bindings: Bindings): Logger {
	return getLogger().child(bindings);
}

/** Tests point logging at a temp file and silence it. Null returns to config. */
export function setLoggerOverride(target: Partial<LogTarget> | null): void {
	override = target;
	release();
}

export function closeLogger(): void {
	release();
}
