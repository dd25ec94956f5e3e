/**
 * Delivers credential notifications and operator alerts through the Bot API.
 */

import { type Api, InlineKeyboard } from "grammy";
import type { AdminAlert, NotificationMessage, Notifier } from "../credentials/types.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "notifier" });

/** The part of the Bot API the notifier needs. */
export type MessageSender = Pick<Api, "sendMessage">;

export type RenderedMessage = {
	text: string;
	keyboard?: InlineKeyboard;
};

export function renderNotification(message: NotificationMessage): RenderedMessage {
	switch (message.kind) {
		case "access_granted":
			return {
				text: [
					message.reissued ? "Welcome back! Here is your new proxy link." : "Your proxy is ready.",
					"",
					"Tap the button below to add it to Telegram. The link is personal: do not share it.",
					"",
					message.link,
				].join("\n"),
				keyboard: new InlineKeyboard().url("Connect to proxy", message.link),
			};
		case "access_revoked":
			return {
				text: "You left the channel, so your proxy link has been disabled. Join again to get a new one.",
			};
		case "provisioning_failed":
			return {
				text: "We could not set up your proxy right now. The admins have been notified and will look into it.",
			};
	}
}

/**
 * Escape text for MarkdownV2 format.
 */
export function escapeMarkdown(text: string): string {
	return text.replace(/([_*[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

export function formatAdminAlert(alert: AdminAlert): string {
	const emoji = alert.level === "error" ? "🚨" : alert.level === "warn" ? "⚠️" : "ℹ️";
	return `${emoji} *${escapeMarkdown(alert.title)}*\n\n${escapeMarkdown(alert.message)}`;
}

export class TelegramNotifier implements Notifier {
	constructor(
		private readonly api: MessageSender,
		private readonly adminChatIds: readonly number[],
	) {}

	async notify(userId: string, message: NotificationMessage): Promise<void> {
		const rendered = renderNotification(message);
		await this.api.sendMessage(userId, rendered.text, {
			link_preview_options: { is_disabled: true },
			...(rendered.keyboard ? { reply_markup: rendered.keyboard } : {}),
		});
		logger.debug({ userId, kind: message.kind }, "notification sent");
	}

	/**
	 * Send to every admin chat. Throws only if none of them got it.
	 */
	async alertAdmins(alert: AdminAlert): Promise<void> {
		if (this.adminChatIds.length === 0) {
			logger.warn({ title: alert.title }, "no admin chats configured, alert dropped");
			return;
		}

		const text = formatAdminAlert(alert);
		const errors: Error[] = [];
		for (const chatId of this.adminChatIds) {
			try {
				await this.api.sendMessage(chatId, text, { parse_mode: "MarkdownV2" });
				logger.info({ chatId, title: alert.title }, "sent admin alert");
			} catch (err) {
				logger.warn({ chatId, error: String(err) }, "failed to send admin alert");
				errors.push(err instanceof Error ? err : new Error(String(err)));
			}
		}

		if (errors.length === this.adminChatIds.length) {
			throw new Error(`Failed to send alert to any admin: ${errors[0]?.message ?? "unknown"}`);
		}
	}
}

/**
 * Notifier for CLI runs without a bot token: records what would have been sent.
 */
export class LoggingNotifier implements Notifier {
	async notify(userId: string, message: NotificationMessage): Promise<void> {
		logger.info({ userId, kind: message.kind }, "notification not sent (no bot token)");
	}

	async alertAdmins(alert: AdminAlert): Promise<void> {
		logger.warn({ title: alert.title, message: alert.message }, "admin alert (no bot token)");
	}
}
