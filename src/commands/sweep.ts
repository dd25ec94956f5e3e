import type { Command } from "commander";

import { loadConfig, resolveRecoveryConfig } from "../config/config.js";
import { getChildLogger } from "../logging.js";
import { createNotifier, createRuntime } from "../runtime.js";

const logger = getChildLogger({ module: "cmd-sweep" });

export function registerSweepCommand(program: Command): void {
	program
		.command("sweep")
		.description("Run one recovery sweep over pending credentials and exit")
		.option("--all", "Re-drive every pending record, not only stale ones")
		.action(async (opts: { all?: boolean }) => {
			const cfg = loadConfig();
			const recovery = resolveRecoveryConfig(cfg);
			const { engine } = await createRuntime(cfg, {
				notifier: createNotifier(cfg),
				autoRetry: false,
			});

			const result = await engine.sweep(
				Date.now(),
				opts.all ? 0 : recovery.staleAfterSeconds * 1000,
			);
			logger.info(result, "manual sweep finished");

			console.log(
				`Pending: ${result.examined}, re-driven: ${result.redriven}, errors: ${result.errors}`,
			);
			if (result.errors > 0) {
				process.exitCode = 1;
			}
		});
}
