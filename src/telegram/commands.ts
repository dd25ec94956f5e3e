/**
 * Private-chat bot commands and the /menu buttons.
 *
 * Handlers are plain functions over their dependencies and return the reply;
 * `registerCommands` binds them to a bot. Admin commands (/stats, /pin,
 * /unpin) answer configured admin chats and channel administrators, and are
 * silently ignored for everyone else.
 */

import { type Api, type Bot, InlineKeyboard } from "grammy";
import type { CredentialStore } from "../credentials/store.js";
import type { ReconciliationEngine } from "../engine/reconciler.js";
import type { BoundedQueueStats } from "../infra/bounded-queue.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { RateLimitResult } from "../security/rate-limit.js";

const logger = getChildLogger({ module: "telegram-commands" });

export type CommandReply = {
	text: string;
	keyboard?: InlineKeyboard;
};

export type ChannelApi = Pick<Api, "sendMessage" | "pinChatMessage" | "unpinAllChatMessages">;

/** What the monitor learns about the channel and the bot once connected. */
export type ChannelBinding = {
	/** Public t.me URL of the channel, when it has a username. */
	channelUrl: string | null;
	channelChatId: number;
	channelApi: ChannelApi;
	botUsername: string;
	isChannelMember: (userId: number) => Promise<boolean>;
	/** Administrator or creator of the channel. */
	isChannelAdmin: (userId: number) => Promise<boolean>;
};

export type CommandDeps = ChannelBinding & {
	engine: Pick<ReconciliationEngine, "submitAccessRequest" | "getStats">;
	store: Pick<CredentialStore, "get" | "countByStatus">;
	limiter: { consume(key: string): RateLimitResult };
	adminChatIds: readonly number[];
	queueStats?: () => BoundedQueueStats;
	now?: () => number;
};

export type CommandUser = {
	id: number;
	username?: string;
};

export const HELP_TEXT = [
	"This bot gives channel members a personal MTProto proxy link.",
	"",
	"/start - get your proxy link (join the channel first)",
	"/menu - show the buttons",
	"/status - show the state of your access",
	"/help - show this message",
	"",
	"Leaving the channel disables your link. Rejoining issues a new one.",
].join("\n");

export const PIN_TEXT = [
	"Free MTProto proxy for channel members",
	"",
	"Tap the button below and the bot sends you a personal link.",
	"Only channel members get a proxy. Do not share your link.",
].join("\n");

/** Deep link that opens the bot with `/start proxy`. */
export function accessDeepLink(botUsername: string): string {
	return `https://t.me/${botUsername}?start=proxy`;
}

const MEMBERSHIP_CHECK_FAILED = "Could not check your channel membership right now. Please try again later.";

function joinChannelReply(deps: CommandDeps, text: string, withHelp: boolean): CommandReply {
	if (!deps.channelUrl && !withHelp) return { text };
	const keyboard = new InlineKeyboard();
	if (deps.channelUrl) keyboard.url("Join channel", deps.channelUrl);
	if (withHelp) {
		if (deps.channelUrl) keyboard.row();
		keyboard.text("Help", "menu:help");
	}
	return { text, keyboard };
}

export async function handleStart(deps: CommandDeps, user: CommandUser): Promise<CommandReply> {
	// Taken before the check: a leave applied after this instant wins
	const checkedAt = (deps.now ?? Date.now)();
	let member: boolean;
	try {
		member = await deps.isChannelMember(user.id);
	} catch (err) {
		logger.warn({ userId: user.id, error: formatErrorSafe(err) }, "membership check failed");
		return { text: MEMBERSHIP_CHECK_FAILED };
	}

	if (!member) {
		return joinChannelReply(
			deps,
			"Join the channel first, then send /start again to get your proxy link.",
			false,
		);
	}

	// The engine sends the link (or re-sends it for an active user)
	deps.engine.submitAccessRequest({
		userId: String(user.id),
		checkedAt,
		username: user.username,
	});
	return { text: "You are a channel member. Your proxy link is on its way." };
}

export function handleStatus(deps: CommandDeps, userId: number): CommandReply {
	const record = deps.store.get(String(userId));
	switch (record?.status) {
		case "ACTIVE":
			return {
				text: "Your proxy access is active.",
				keyboard: record.proxyLink
					? new InlineKeyboard().url("Connect to proxy", record.proxyLink)
					: undefined,
			};
		case "PENDING_PROVISION":
			return { text: "Your proxy is being set up. You will get a message when it is ready." };
		case "PENDING_REVOKE":
			return { text: "Your proxy access is being removed." };
		case "FAILED":
			return { text: "Setting up your proxy failed. The admins have been notified." };
		default:
			return { text: "You have no active proxy. Join the channel and send /start." };
	}
}

/**
 * A configured admin chat, or an administrator of the channel. A failed
 * channel lookup counts as "no".
 */
export async function isAdmin(deps: CommandDeps, userId: number): Promise<boolean> {
	if (deps.adminChatIds.includes(userId)) return true;
	try {
		return await deps.isChannelAdmin(userId);
	} catch (err) {
		logger.warn({ userId, error: formatErrorSafe(err) }, "channel admin check failed");
		return false;
	}
}

export async function handleStats(deps: CommandDeps, userId: number): Promise<CommandReply | null> {
	if (!(await isAdmin(deps, userId))) return null;

	const stats = deps.engine.getStats();
	const counts = deps.store.countByStatus();
	const lines = [
		"Credentials",
		`  active: ${counts.ACTIVE}`,
		`  pending provision: ${counts.PENDING_PROVISION}`,
		`  pending revoke: ${counts.PENDING_REVOKE}`,
		`  failed: ${counts.FAILED}`,
		`  revoked: ${counts.REVOKED}`,
		"",
		"Since start",
		`  joins: ${stats.joins}, leaves: ${stats.leaves}, stale: ${stats.staleEvents}`,
		`  access requests: ${stats.accessRequests}`,
		`  provisioned: ${stats.provisioned}, revoked: ${stats.revoked}`,
		`  retries: ${stats.retries}, failures: ${stats.failures}`,
		`  undelivered notifications: ${stats.notificationFailures}`,
	];
	const queue = deps.queueStats?.();
	if (queue) {
		lines.push("", `Remote queue: ${queue.active} running, ${queue.queued}/${queue.maxQueueDepth} waiting`);
	}
	return { text: lines.join("\n") };
}

/**
 * Post the access message with a deep-link button to the channel and pin it.
 */
export async function handlePin(deps: CommandDeps, userId: number): Promise<CommandReply | null> {
	if (!(await isAdmin(deps, userId))) return null;

	const keyboard = new InlineKeyboard().url("Get proxy", accessDeepLink(deps.botUsername));
	try {
		const message = await deps.channelApi.sendMessage(deps.channelChatId, PIN_TEXT, {
			reply_markup: keyboard,
		});
		await deps.channelApi.pinChatMessage(deps.channelChatId, message.message_id, {
			disable_notification: true,
		});
		logger.info({ userId, messageId: message.message_id }, "access message pinned");
		return { text: `Access message posted and pinned in the channel (message ${message.message_id}).` };
	} catch (err) {
		const reason = formatErrorSafe(err);
		logger.warn({ userId, error: reason }, "could not pin access message");
		return {
			text: `Could not post to the channel: ${reason}\nThe bot must be a channel admin allowed to post and pin messages.`,
		};
	}
}

export async function handleUnpin(deps: CommandDeps, userId: number): Promise<CommandReply | null> {
	if (!(await isAdmin(deps, userId))) return null;

	try {
		await deps.channelApi.unpinAllChatMessages(deps.channelChatId);
		logger.info({ userId }, "channel messages unpinned");
		return { text: "All pinned messages in the channel were removed." };
	} catch (err) {
		const reason = formatErrorSafe(err);
		logger.warn({ userId, error: reason }, "could not unpin channel messages");
		return {
			text: `Could not unpin channel messages: ${reason}\nThe bot must be a channel admin allowed to manage messages.`,
		};
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// /menu
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Callback data format: "menu:<action>"
 */
export const MENU_ACTIONS = ["proxy", "status", "help", "pin", "unpin", "stats"] as const;

export type MenuAction = (typeof MENU_ACTIONS)[number];

export function parseMenuAction(data: string): MenuAction | null {
	if (!data.startsWith("menu:")) return null;
	const action = data.slice("menu:".length);
	return MENU_ACTIONS.find((candidate) => candidate === action) ?? null;
}

export async function handleMenu(deps: CommandDeps, user: CommandUser): Promise<CommandReply> {
	let member: boolean;
	try {
		member = await deps.isChannelMember(user.id);
	} catch (err) {
		logger.warn({ userId: user.id, error: formatErrorSafe(err) }, "membership check failed");
		return { text: MEMBERSHIP_CHECK_FAILED };
	}

	if (!member) {
		return joinChannelReply(deps, "Only channel members can get a proxy. Join the channel first.", true);
	}

	const keyboard = new InlineKeyboard()
		.text("Get my proxy", "menu:proxy")
		.row()
		.text("My status", "menu:status")
		.row()
		.text("Help", "menu:help");

	if (await isAdmin(deps, user.id)) {
		keyboard
			.row()
			.text("Pin access message", "menu:pin")
			.row()
			.text("Unpin all", "menu:unpin")
			.row()
			.text("Statistics", "menu:stats");
	}
	return { text: "Choose an option:", keyboard };
}

/**
 * Null when the user may not run the action.
 */
export async function handleMenuAction(
	deps: CommandDeps,
	user: CommandUser,
	action: MenuAction,
): Promise<CommandReply | null> {
	switch (action) {
		case "proxy":
			return handleStart(deps, user);
		case "status":
			return handleStatus(deps, user.id);
		case "help":
			return { text: HELP_TEXT };
		case "pin":
			return handlePin(deps, user.id);
		case "unpin":
			return handleUnpin(deps, user.id);
		case "stats":
			return handleStats(deps, user.id);
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registration
// ═══════════════════════════════════════════════════════════════════════════════

function replyOptions(result: CommandReply): { reply_markup: InlineKeyboard } | undefined {
	return result.keyboard ? { reply_markup: result.keyboard } : undefined;
}

export function registerCommands(bot: Bot, deps: CommandDeps): void {
	const dm = bot.chatType("private");

	const allowed = (userId: number): boolean => {
		const result = deps.limiter.consume(String(userId));
		if (!result.allowed) {
			logger.info({ userId, resetMs: result.resetMs }, "command rate limited");
		}
		return result.allowed;
	};

	dm.command("start", async (ctx) => {
		const from = ctx.from;
		if (!from) return;
		if (!allowed(from.id)) {
			await ctx.reply("Too many requests. Please wait a minute and try again.");
			return;
		}
		const result = await handleStart(deps, { id: from.id, username: from.username });
		await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("menu", async (ctx) => {
		const from = ctx.from;
		if (!from || !allowed(from.id)) return;
		const result = await handleMenu(deps, { id: from.id, username: from.username });
		await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("status", async (ctx) => {
		const from = ctx.from;
		if (!from || !allowed(from.id)) return;
		const result = handleStatus(deps, from.id);
		await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("stats", async (ctx) => {
		const result = await handleStats(deps, ctx.chat.id);
		if (result) await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("pin", async (ctx) => {
		const result = await handlePin(deps, ctx.chat.id);
		if (result) await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("unpin", async (ctx) => {
		const result = await handleUnpin(deps, ctx.chat.id);
		if (result) await ctx.reply(result.text, replyOptions(result));
	});

	dm.command("help", async (ctx) => {
		if (!ctx.from || !allowed(ctx.from.id)) return;
		await ctx.reply(HELP_TEXT);
	});

	bot.callbackQuery(/^menu:/, async (ctx) => {
		const action = parseMenuAction(ctx.callbackQuery.data);
		const from = ctx.callbackQuery.from;
		if (!action) {
			await ctx.answerCallbackQuery();
			return;
		}
		if (!allowed(from.id)) {
			await ctx.answerCallbackQuery({ text: "Too many requests. Please wait a minute." });
			return;
		}

		const result = await handleMenuAction(deps, { id: from.id, username: from.username }, action);
		if (!result) {
			await ctx.answerCallbackQuery({ text: "Admins only" });
			return;
		}
		await ctx.answerCallbackQuery();
		await ctx.reply(result.text, replyOptions(result));
	});

	// Buttons from older builds of the menu
	bot.on("callback_query:data", async (ctx) => {
		logger.debug({ data: ctx.callbackQuery.data }, "unhandled callback query");
		await ctx.answerCallbackQuery();
	});
}
