import { Api, Bot, GrammyError, HttpError } from "grammy";
import type { UserFromGetMe } from "grammy/types";
import { autoRetry } from "@grammyjs/auto-retry";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "telegram-client" });

export type TelegramBotInstance = {
	bot: Bot;
	botInfo: UserFromGetMe;
};

// Auto-retry on rate limits (429) and network errors
function useAutoRetry(api: Api): void {
	api.config.use(
		autoRetry({
			maxRetryAttempts: 5,
			maxDelaySeconds: 60,
			rethrowInternalServerErrors: false,
		}),
	);
}

/**
 * Standalone API client for outbound messages. Outlives bot reconnects.
 */
export function createBotApi(token: string): Api {
	const api = new Api(token);
	useAutoRetry(api);
	return api;
}

/**
 * Create and configure a Telegram bot instance.
 */
export async function createTelegramBot(token: string): Promise<TelegramBotInstance> {
	const bot = new Bot(token);
	useAutoRetry(bot.api);

	bot.catch((err) => {
		const ctx = err.ctx;
		const error = err.error;

		if (error instanceof GrammyError) {
			logger.error(
				{
					updateId: ctx.update.update_id,
					description: error.description,
					code: error.error_code,
				},
				"Grammy error",
			);
		} else if (error instanceof HttpError) {
			logger.error(
				{
					updateId: ctx.update.update_id,
					error: String(error),
				},
				"HTTP error",
			);
		} else {
			logger.error(
				{
					updateId: ctx.update.update_id,
					error: String(error),
				},
				"Unknown error",
			);
		}
	});

	// Get bot info to confirm token validity
	await bot.init();
	logger.info({ botId: bot.botInfo.id, username: bot.botInfo.username }, "bot authenticated");

	return { bot, botInfo: bot.botInfo };
}
