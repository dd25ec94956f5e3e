import fs from "node:fs";
import type { Command } from "commander";

import {
	getConfigPath,
	loadConfig,
	normalizeChannelId,
	resolveProxyConfig,
	resolveRemoteConfig,
} from "../config/config.js";
import { SqliteCredentialStore } from "../credentials/store.js";
import { getChildLogger } from "../logging.js";
import { getDb, getDbPath } from "../storage/db.js";

const logger = getChildLogger({ module: "cmd-status" });

export type StatusOptions = {
	json?: boolean;
};

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Show credential counts and configuration")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusOptions) => {
			try {
				const configPath = getConfigPath();
				const hasConfig = fs.existsSync(configPath);
				const cfg = loadConfig();

				const tokenSource = cfg.telegram?.botToken
					? "config"
					: process.env.TELEGRAM_BOT_TOKEN || process.env.BOT_TOKEN
						? "env"
						: null;
				const rawChannel = cfg.telegram?.channel ?? process.env.CHANNEL_ID;
				const proxy = resolveProxyConfig(cfg);

				let remote: string;
				try {
					const resolved = resolveRemoteConfig(cfg);
					remote =
						resolved.mode === "ssh"
							? `ssh ${resolved.user}@${resolved.host}:${resolved.port}`
							: resolved.mode;
				} catch (err) {
					remote = `invalid (${err instanceof Error ? err.message : String(err)})`;
				}

				const counts = new SqliteCredentialStore(getDb()).countByStatus();

				const status = {
					config: {
						path: configPath,
						exists: hasConfig,
					},
					database: getDbPath(),
					telegram: {
						botToken: tokenSource ? `set (${tokenSource})` : "not set",
						channel: rawChannel ? normalizeChannelId(rawChannel) : null,
						admins: cfg.telegram?.adminChatIds?.length ?? 0,
					},
					proxy: {
						host: proxy.host ?? "auto (public IP)",
						port: proxy.port,
						tlsDomain: proxy.tlsDomain ?? null,
						remote,
					},
					credentials: counts,
				};

				if (opts.json) {
					console.log(JSON.stringify(status, null, 2));
					return;
				}

				console.log("=== mtgate status ===\n");

				console.log("Configuration:");
				console.log(`  Path: ${status.config.path}`);
				console.log(`  Exists: ${status.config.exists ? "yes" : "no"}`);
				console.log(`  Database: ${status.database}`);
				console.log();

				console.log("Telegram:");
				console.log(`  Bot token: ${status.telegram.botToken}`);
				console.log(`  Channel: ${status.telegram.channel ?? "not set"}`);
				console.log(`  Admin chats: ${status.telegram.admins}`);
				console.log();

				console.log("Proxy:");
				console.log(`  Host: ${status.proxy.host}`);
				console.log(`  Port: ${status.proxy.port}`);
				console.log(`  TLS domain: ${status.proxy.tlsDomain ?? "none"}`);
				console.log(`  Control: ${status.proxy.remote}`);
				console.log();

				console.log("Credentials:");
				console.log(`  Active: ${counts.ACTIVE}`);
				console.log(`  Pending provision: ${counts.PENDING_PROVISION}`);
				console.log(`  Pending revoke: ${counts.PENDING_REVOKE}`);
				console.log(`  Failed: ${counts.FAILED}`);
				console.log(`  Revoked: ${counts.REVOKED}`);
			} catch (err) {
				logger.error({ error: String(err) }, "status command failed");
				console.error(`Error: ${err}`);
				process.exitCode = 1;
			}
		});
}
