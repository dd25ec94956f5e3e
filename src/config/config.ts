import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

const TelegramConfigSchema = z.object({
	// Falls back to TELEGRAM_BOT_TOKEN
	botToken: z.string().optional(),
	// Channel or group whose membership gates access. Falls back to CHANNEL_ID.
	channel: z.string().optional(),
	// Chats that receive operator alerts and may use /stats
	adminChatIds: z.array(z.union([z.number(), z.string()])).default([]),
	resendLinkOnRejoin: z.boolean().default(true),
	commandRateLimitPerMinute: z.number().int().positive().default(5),
	// Bot reconnect backoff (maxAttempts 0 = unlimited)
	reconnect: z
		.object({
			initialMs: z.number().int().positive().optional(),
			maxMs: z.number().int().positive().optional(),
			factor: z.number().min(1).optional(),
			jitter: z.number().min(0).max(1).optional(),
			maxAttempts: z.number().int().min(0).optional(),
		})
		.optional(),
});

const ProxyConfigSchema = z.object({
	// Public host put into proxy links; resolved from api.ipify.org when unset
	host: z.string().optional(),
	port: z.number().int().positive().max(65535).default(443),
	// Fake-TLS domain; links use the "ee" prefix when set, "dd" otherwise
	tlsDomain: z.string().optional(),
});

export const RemoteModeSchema = z.enum(["ssh", "local", "systemd"]);
export type RemoteMode = z.infer<typeof RemoteModeSchema>;

const RemoteConfigSchema = z.object({
	mode: RemoteModeSchema.default("ssh"),
	host: z.string().optional(),
	user: z.string().default("root"),
	port: z.number().int().positive().max(65535).default(22),
	keyPath: z.string().optional(),
	command: z.string().default("mtgate proxyctl"),
	connectTimeoutSeconds: z.number().int().positive().default(10),
	rejectExitCodes: z.array(z.number().int()).default([2]),
});

const SystemdConfigSchema = z.object({
	serviceName: z.string().default("MTProxy"),
	serviceFile: z.string().default("/etc/systemd/system/MTProxy.service"),
	binaryPath: z.string().default("/opt/MTProxy/objs/bin/mtproto-proxy"),
	workingDirectory: z.string().default("/opt/MTProxy/objs/bin"),
	restartCooldownMs: z.number().int().min(0).default(5000),
});

const ProvisioningConfigSchema = z.object({
	maxConcurrent: z.number().int().positive().default(1),
	maxQueueDepth: z.number().int().min(0).default(50),
	timeoutMs: z.number().int().positive().default(30_000),
	retry: z
		.object({
			maxAttempts: z.number().int().positive().default(5),
			baseDelayMs: z.number().int().min(0).default(2_000),
			maxDelayMs: z.number().int().min(0).default(300_000),
		})
		.optional(),
});

const RecoveryConfigSchema = z.object({
	sweepIntervalSeconds: z.number().int().positive().default(60),
	staleAfterSeconds: z.number().int().positive().default(120),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

const MtgateConfigSchema = z.object({
	telegram: TelegramConfigSchema.optional(),
	proxy: ProxyConfigSchema.optional(),
	remote: RemoteConfigSchema.optional(),
	systemd: SystemdConfigSchema.optional(),
	provisioning: ProvisioningConfigSchema.optional(),
	recovery: RecoveryConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type MtgateConfig = z.infer<typeof MtgateConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;
export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;
export type SystemdConfig = z.infer<typeof SystemdConfigSchema>;
export type ProvisioningConfig = z.infer<typeof ProvisioningConfigSchema>;
export type RecoveryConfig = z.infer<typeof RecoveryConfigSchema>;

let cachedConfig: MtgateConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a raw config object. Exposed so callers and tests can validate without a file.
 */
export function parseConfig(raw: unknown): MtgateConfig {
	return MtgateConfigSchema.parse(raw);
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): MtgateConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT") {
			// No config file - use defaults
			return {};
		}
		throw err;
	}
}

export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

/**
 * Normalize a channel reference to the form the Bot API accepts:
 * - https://t.me/name, t.me/name, @name, name -> @name
 * - -1001234567890 -> -1001234567890 (numeric ids stay as-is)
 */
export function normalizeChannelId(channel: string): string {
	let value = channel.trim();
	if (!value) return value;

	if (/^-\d+$/.test(value)) {
		return value;
	}

	value = value.replace(/^https?:\/\//, "");
	if (value.startsWith("t.me/")) {
		value = value.slice("t.me/".length);
	}
	value = value.replace(/^@/, "").replace(/\/+$/, "");

	return `@${value}`;
}

/**
 * Channel username without the @ prefix, for t.me URLs. Null for numeric ids.
 */
export function channelUsername(normalized: string): string | null {
	return normalized.startsWith("@") ? normalized.slice(1) : null;
}

export type ResolvedTelegramSettings = {
	botToken: string;
	channel: string;
	adminChatIds: number[];
	resendLinkOnRejoin: boolean;
	commandRateLimitPerMinute: number;
};

/**
 * Resolve bot token and channel from config, falling back to the environment.
 * Throws when either is missing.
 */
export function resolveTelegramSettings(
	cfg: MtgateConfig,
	env: NodeJS.ProcessEnv = process.env,
): ResolvedTelegramSettings {
	const botToken = cfg.telegram?.botToken ?? env.TELEGRAM_BOT_TOKEN ?? env.BOT_TOKEN;
	if (!botToken) {
		throw new Error("Missing required config: telegram.botToken (or TELEGRAM_BOT_TOKEN)");
	}

	const rawChannel = cfg.telegram?.channel ?? env.CHANNEL_ID;
	if (!rawChannel) {
		throw new Error("Missing required config: telegram.channel (or CHANNEL_ID)");
	}
	const channel = normalizeChannelId(rawChannel);
	if (channel === "@" || channel === "") {
		throw new Error(`Invalid configuration: channel '${rawChannel}' is empty after normalization`);
	}

	const adminChatIds: number[] = [];
	for (const id of cfg.telegram?.adminChatIds ?? []) {
		const parsed = typeof id === "number" ? id : Number.parseInt(id, 10);
		if (Number.isInteger(parsed)) {
			adminChatIds.push(parsed);
		}
	}

	return {
		botToken,
		channel,
		adminChatIds,
		resendLinkOnRejoin: cfg.telegram?.resendLinkOnRejoin ?? true,
		commandRateLimitPerMinute: cfg.telegram?.commandRateLimitPerMinute ?? 5,
	};
}

/**
 * Fully defaulted sections. The top-level sections are optional in the file, so
 * callers go through these instead of repeating the defaults.
 */
export function resolveProxyConfig(cfg: MtgateConfig): ProxyConfig {
	return ProxyConfigSchema.parse(cfg.proxy ?? {});
}

export function resolveSystemdConfig(cfg: MtgateConfig): SystemdConfig {
	return SystemdConfigSchema.parse(cfg.systemd ?? {});
}

export function resolveProvisioningConfig(cfg: MtgateConfig): ProvisioningConfig {
	return ProvisioningConfigSchema.parse(cfg.provisioning ?? {});
}

export function resolveRecoveryConfig(cfg: MtgateConfig): RecoveryConfig {
	return RecoveryConfigSchema.parse(cfg.recovery ?? {});
}

/**
 * Remote settings with defaults applied. ssh mode needs a host and an identity file;
 * a host of localhost/127.0.0.1 means the control command runs locally.
 */
export function resolveRemoteConfig(cfg: MtgateConfig): RemoteConfig {
	const remote = RemoteConfigSchema.parse(cfg.remote ?? {});
	if (remote.mode !== "ssh") return remote;

	if (remote.host === "localhost" || remote.host === "127.0.0.1") {
		return { ...remote, mode: "local" };
	}

	const missing: string[] = [];
	if (!remote.host) missing.push("remote.host");
	if (!remote.keyPath) missing.push("remote.keyPath");
	if (missing.length > 0) {
		throw new Error(`Missing required config for ssh mode: ${missing.join(", ")}`);
	}
	return remote;
}
