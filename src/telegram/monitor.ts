import { run } from "@grammyjs/runner";
import { GrammyError } from "grammy";

import { channelUsername } from "../config/config.js";
import type { ReconciliationEngine } from "../engine/reconciler.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { createTelegramBot } from "./client.js";
import { type ChannelBinding, type CommandDeps, registerCommands } from "./commands.js";
import { isAdminStatus, isMemberStatus, membershipEventFromUpdate } from "./membership.js";
import { type ReconnectPolicy, computeBackoff, sleepWithAbort } from "./reconnect.js";

const logger = getChildLogger({ module: "telegram-monitor" });

export type MembershipMonitorOptions = {
	token: string;
	/** Normalized channel reference (@name or numeric id). */
	channel: string;
	engine: Pick<ReconciliationEngine, "submit">;
	commands: Omit<CommandDeps, keyof ChannelBinding>;
	reconnectPolicy: ReconnectPolicy;
	keepAlive?: boolean;
	abortSignal?: AbortSignal;
};

function isUnauthorized(err: unknown): boolean {
	return err instanceof GrammyError && err.error_code === 401;
}

/**
 * Poll Telegram for chat_member updates and bot commands until aborted,
 * reconnecting with backoff when polling fails.
 */
export async function monitorMembership(options: MembershipMonitorOptions): Promise<void> {
	const { keepAlive = true, abortSignal, reconnectPolicy } = options;
	let reconnectAttempts = 0;

	while (true) {
		if (abortSignal?.aborted) break;

		try {
			const { bot, botInfo } = await createTelegramBot(options.token);

			const chat = await bot.api.getChat(options.channel);
			const channelChatId = chat.id;
			const username =
				channelUsername(options.channel) ??
				("username" in chat && typeof chat.username === "string" ? chat.username : null);

			const self = await bot.api.getChatMember(channelChatId, botInfo.id);
			if (!isAdminStatus(self)) {
				logger.warn(
					{ channel: options.channel, status: self.status },
					"bot is not a channel admin; Telegram will not deliver member updates",
				);
			}

			bot.on("chat_member", (ctx) => {
				const update = ctx.chatMember;
				if (update.chat.id !== channelChatId) return;
				const event = membershipEventFromUpdate(update);
				if (!event) return;
				logger.info({ userId: event.userId, type: event.type }, "membership change");
				options.engine.submit(event);
			});

			registerCommands(bot, {
				...options.commands,
				channelUrl: username ? `https://t.me/${username}` : null,
				channelChatId,
				channelApi: bot.api,
				botUsername: botInfo.username,
				isChannelMember: async (userId) =>
					isMemberStatus(await bot.api.getChatMember(channelChatId, userId)),
				isChannelAdmin: async (userId) =>
					isAdminStatus(await bot.api.getChatMember(channelChatId, userId)),
			});

			const runner = run(bot, {
				runner: { fetch: { allowed_updates: ["message", "callback_query", "chat_member"] } },
			});

			logger.info(
				{ botId: botInfo.id, username: botInfo.username, channelChatId },
				"listening for membership changes",
			);
			reconnectAttempts = 0;

			const task = runner.task();
			const closeReason = await Promise.race([
				task ? task.then(() => "closed" as const) : new Promise<never>(() => {}),
				abortSignal
					? new Promise<"aborted">((resolve) =>
							abortSignal.addEventListener("abort", () => resolve("aborted"), { once: true }),
						)
					: new Promise<never>(() => {}),
			]);

			if (runner.isRunning()) {
				await runner.stop();
			}

			if (closeReason === "aborted" || abortSignal?.aborted) {
				logger.info("monitor aborted by signal");
				break;
			}

			if (!keepAlive) break;

			reconnectAttempts++;
			if (reconnectPolicy.maxAttempts > 0 && reconnectAttempts >= reconnectPolicy.maxAttempts) {
				throw new Error(`Max reconnect attempts (${reconnectPolicy.maxAttempts}) reached`);
			}

			const delay = computeBackoff(reconnectPolicy, reconnectAttempts);
			logger.info({ delay, attempt: reconnectAttempts }, "reconnecting");
			await sleepWithAbort(delay, abortSignal);
		} catch (err) {
			if (abortSignal?.aborted) break;

			if (isUnauthorized(err)) {
				throw new Error("Invalid configuration: Telegram rejected the bot token (401)", {
					cause: err,
				});
			}

			const errorStr = formatErrorSafe(err);
			if (!keepAlive) throw err;

			reconnectAttempts++;
			if (reconnectPolicy.maxAttempts > 0 && reconnectAttempts >= reconnectPolicy.maxAttempts) {
				throw new Error(
					`Max reconnect attempts (${reconnectPolicy.maxAttempts}) reached: ${errorStr}`,
				);
			}

			const delay = computeBackoff(reconnectPolicy, reconnectAttempts);
			logger.error({ error: errorStr, delay }, "reconnecting after error");
			await sleepWithAbort(delay, abortSignal).catch(() => {
				logger.debug("reconnect wait aborted");
			});
		}
	}
}
