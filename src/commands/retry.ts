import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { createNotifier, createRuntime } from "../runtime.js";
import { parseTelegramId } from "../utils.js";
import { formatRecord } from "./inspect.js";

export function registerRetryCommand(program: Command): void {
	program
		.command("retry")
		.description("Re-drive a FAILED or pending credential now")
		.argument("<userId>", "Telegram user id")
		.action(async (userId: string) => {
			if (Number.isNaN(parseTelegramId(userId))) {
				console.error(`Invalid user id: ${userId}`);
				process.exitCode = 1;
				return;
			}

			const cfg = loadConfig();
			const { engine } = await createRuntime(cfg, {
				notifier: createNotifier(cfg),
				autoRetry: false,
			});

			const record = await engine.retry(userId.trim());
			if (!record) {
				console.error(`No record for user ${userId}`);
				process.exitCode = 1;
				return;
			}

			console.log(formatRecord(record));
			if (record.status === "FAILED" || record.status.startsWith("PENDING_")) {
				process.exitCode = 1;
			}
		});
}
