import os from "node:os";
import path from "node:path";

/**
 * Parse a decimal Telegram id. Returns NaN for anything that is not an optionally
 * negative integer.
 */
export function parseTelegramId(str: string): number {
	const trimmed = str.trim();
	if (!/^-?\d+$/.test(trimmed)) {
		return Number.NaN;
	}
	return Number.parseInt(trimmed, 10);
}

/**
 * Short, log-safe form of a proxy secret.
 */
export function secretPrefix(secret: string): string {
	return `${secret.slice(0, 8)}...`;
}

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export const CONFIG_DIR = process.env.MTGATE_DATA_DIR ?? path.join(os.homedir(), ".mtgate");
