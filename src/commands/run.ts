import type { Command } from "commander";

import { loadConfig, resolveRecoveryConfig, resolveTelegramSettings } from "../config/config.js";
import { startRecoverySweep } from "../engine/sweeper.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { createRuntime } from "../runtime.js";
import { CommandRateLimiter } from "../security/rate-limit.js";
import { getDb, startCleanupTimer } from "../storage/db.js";
import { createBotApi } from "../telegram/client.js";
import { monitorMembership } from "../telegram/monitor.js";
import { TelegramNotifier } from "../telegram/notifier.js";
import { resolveReconnectPolicy } from "../telegram/reconnect.js";

const logger = getChildLogger({ module: "cmd-run" });

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Start the bot: watch channel membership and manage proxy access")
		.action(async () => {
			installUnhandledRejectionHandler("run");

			const cfg = loadConfig();
			const telegram = resolveTelegramSettings(cfg);
			const recovery = resolveRecoveryConfig(cfg);

			const notifier = new TelegramNotifier(createBotApi(telegram.botToken), telegram.adminChatIds);
			const { store, provisioner, engine } = await createRuntime(cfg, {
				notifier,
				autoRetry: true,
			});

			const sweep = startRecoverySweep(engine, {
				intervalMs: recovery.sweepIntervalSeconds * 1000,
				staleAfterMs: recovery.staleAfterSeconds * 1000,
			});
			const cleanup = startCleanupTimer();

			const controller = new AbortController();
			const shutdown = (signal: NodeJS.Signals) => {
				logger.info({ signal }, "shutting down");
				console.log(`\nReceived ${signal}, shutting down...`);
				controller.abort();
			};
			process.once("SIGINT", shutdown);
			process.once("SIGTERM", shutdown);

			console.log(`Watching ${telegram.channel}. Ctrl+C to stop.`);
			try {
				await monitorMembership({
					token: telegram.botToken,
					channel: telegram.channel,
					engine,
					commands: {
						engine,
						store,
						limiter: new CommandRateLimiter(getDb(), {
							limit: telegram.commandRateLimitPerMinute,
						}),
						adminChatIds: telegram.adminChatIds,
						queueStats: () => provisioner.queueStats(),
					},
					reconnectPolicy: resolveReconnectPolicy(cfg),
					abortSignal: controller.signal,
				});
			} finally {
				sweep.stop();
				cleanup.stop();
				await engine.stop();
				logger.info(engine.getStats(), "stopped");
			}
		});
}
