/**
 * Wires config into the store, provisioner and engine. Shared by the
 * long-running bot and the one-shot CLI commands.
 */

import type Database from "better-sqlite3";

import {
	type MtgateConfig,
	resolveProvisioningConfig,
	resolveProxyConfig,
	resolveRemoteConfig,
	resolveSystemdConfig,
} from "./config/config.js";
import { SqliteCredentialStore } from "./credentials/store.js";
import type { Notifier } from "./credentials/types.js";
import { ReconciliationEngine } from "./engine/reconciler.js";
import { getChildLogger } from "./logging.js";
import type { ProxyControlChannel } from "./proxy/channel.js";
import { CommandChannel } from "./proxy/command-channel.js";
import { RemoteProvisioner } from "./proxy/provisioner.js";
import { resolvePublicHost } from "./proxy/public-host.js";
import { SystemdServiceChannel } from "./proxy/systemd-channel.js";
import { getDb } from "./storage/db.js";
import { LoggingNotifier, TelegramNotifier } from "./telegram/notifier.js";
import { createBotApi } from "./telegram/client.js";

const logger = getChildLogger({ module: "runtime" });

export function createControlChannel(cfg: MtgateConfig): ProxyControlChannel {
	const remote = resolveRemoteConfig(cfg);
	switch (remote.mode) {
		case "systemd":
			return new SystemdServiceChannel(resolveSystemdConfig(cfg));
		case "local":
			return new CommandChannel({
				mode: "local",
				command: remote.command,
				rejectExitCodes: remote.rejectExitCodes,
			});
		case "ssh": {
			const { host, keyPath } = remote;
			if (!host || !keyPath) {
				throw new Error("Missing required config for ssh mode: remote.host, remote.keyPath");
			}
			return new CommandChannel({
				mode: "ssh",
				host,
				keyPath,
				user: remote.user,
				port: remote.port,
				command: remote.command,
				connectTimeoutSeconds: remote.connectTimeoutSeconds,
				rejectExitCodes: remote.rejectExitCodes,
			});
		}
	}
}

/**
 * Telegram notifier when a bot token is available, otherwise a logging stand-in.
 */
export function createNotifier(cfg: MtgateConfig, env: NodeJS.ProcessEnv = process.env): Notifier {
	const token = cfg.telegram?.botToken ?? env.TELEGRAM_BOT_TOKEN ?? env.BOT_TOKEN;
	if (!token) {
		return new LoggingNotifier();
	}
	const adminChatIds = (cfg.telegram?.adminChatIds ?? [])
		.map((id) => (typeof id === "number" ? id : Number.parseInt(id, 10)))
		.filter((id) => Number.isInteger(id));
	return new TelegramNotifier(createBotApi(token), adminChatIds);
}

export type Runtime = {
	store: SqliteCredentialStore;
	provisioner: RemoteProvisioner;
	engine: ReconciliationEngine;
};

export type RuntimeOptions = {
	notifier: Notifier;
	/** Timer-driven retries; off for one-shot commands. */
	autoRetry: boolean;
	db?: Database.Database;
	channel?: ProxyControlChannel;
};

export async function createRuntime(cfg: MtgateConfig, options: RuntimeOptions): Promise<Runtime> {
	const store = new SqliteCredentialStore(options.db ?? getDb());
	const proxy = resolveProxyConfig(cfg);
	const provisioning = resolveProvisioningConfig(cfg);
	const channel = options.channel ?? createControlChannel(cfg);

	const host = await resolvePublicHost(proxy.host);
	const provisioner = new RemoteProvisioner({
		channel,
		endpoint: { host, port: proxy.port, tlsDomain: proxy.tlsDomain },
		salt: store.getInstallationSalt(),
		maxConcurrent: provisioning.maxConcurrent,
		maxQueueDepth: provisioning.maxQueueDepth,
		timeoutMs: provisioning.timeoutMs,
	});

	const engine = new ReconciliationEngine({
		store,
		provisioner,
		notifier: options.notifier,
		retry: provisioning.retry,
		autoRetry: options.autoRetry,
		resendLinkOnRejoin: cfg.telegram?.resendLinkOnRejoin ?? true,
	});

	logger.info(
		{ channel: channel.name, host, port: proxy.port, tls: Boolean(proxy.tlsDomain) },
		"runtime ready",
	);
	return { store, provisioner, engine };
}
