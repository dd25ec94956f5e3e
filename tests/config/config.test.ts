import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";

import {
	channelUsername,
	loadConfig,
	normalizeChannelId,
	resetConfigCache,
	resolveRemoteConfig,
	resolveSystemdConfig,
	resolveTelegramSettings,
} from "../../src/config/config.js";
import { resetConfigPath, setConfigPath } from "../../src/config/path.js";

describe("config", () => {
	let dir: string;
	let configPath: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "mtgate-config-"));
		configPath = path.join(dir, "mtgate.json");
		setConfigPath(configPath);
		resetConfigCache();
	});

	afterEach(() => {
		resetConfigPath();
		resetConfigCache();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe("loadConfig", () => {
		it("returns an empty config when the file does not exist", () => {
			expect(loadConfig()).toEqual({});
		});

		it("parses JSON5 and applies section defaults", () => {
			fs.writeFileSync(
				configPath,
				`{
					// comments and trailing commas are fine
					telegram: { channel: "t.me/proxyclub", adminChatIds: [777], },
					proxy: { host: "203.0.113.7" },
				}`,
			);

			const cfg = loadConfig();

			expect(cfg.telegram).toEqual({
				channel: "t.me/proxyclub",
				adminChatIds: [777],
				resendLinkOnRejoin: true,
				commandRateLimitPerMinute: 5,
			});
			expect(cfg.proxy).toEqual({ host: "203.0.113.7", port: 443 });
		});

		it("rejects values of the wrong type", () => {
			fs.writeFileSync(configPath, `{ proxy: { port: "443" } }`);
			expect(() => loadConfig()).toThrow(ZodError);
		});

		it("rereads the file after it changes", () => {
			fs.writeFileSync(configPath, `{ proxy: { port: 443 } }`);
			expect(loadConfig().proxy?.port).toBe(443);

			fs.writeFileSync(configPath, `{ proxy: { port: 8443 } }`);
			const later = new Date(Date.now() + 5_000);
			fs.utimesSync(configPath, later, later);

			expect(loadConfig().proxy?.port).toBe(8443);
		});
	});

	describe("normalizeChannelId", () => {
		it.each([
			["https://t.me/proxyclub/", "@proxyclub"],
			["t.me/proxyclub", "@proxyclub"],
			["@proxyclub", "@proxyclub"],
			["proxyclub", "@proxyclub"],
			["-1001234567890", "-1001234567890"],
		])("%s -> %s", (input, expected) => {
			expect(normalizeChannelId(input)).toBe(expected);
		});

		it("gives a username only for public channels", () => {
			expect(channelUsername("@proxyclub")).toBe("proxyclub");
			expect(channelUsername("-1001234567890")).toBeNull();
		});
	});

	describe("resolveTelegramSettings", () => {
		it("falls back to the environment", () => {
			expect(
				resolveTelegramSettings({}, { TELEGRAM_BOT_TOKEN: "test-token", CHANNEL_ID: "proxyclub" }),
			).toEqual({
				botToken: "test-token",
				channel: "@proxyclub",
				adminChatIds: [],
				resendLinkOnRejoin: true,
				commandRateLimitPerMinute: 5,
			});
		});

		it("keeps only numeric admin chat ids", () => {
			const settings = resolveTelegramSettings(
				{
					telegram: {
						botToken: "test-token",
						channel: "@proxyclub",
						adminChatIds: ["123", "not-a-chat", 456],
						resendLinkOnRejoin: false,
						commandRateLimitPerMinute: 2,
					},
				},
				{},
			);
			expect(settings.adminChatIds).toEqual([123, 456]);
			expect(settings.resendLinkOnRejoin).toBe(false);
		});

		it("requires a token and a channel", () => {
			expect(() => resolveTelegramSettings({}, {})).toThrow(
				"Missing required config: telegram.botToken (or TELEGRAM_BOT_TOKEN)",
			);
			expect(() => resolveTelegramSettings({}, { TELEGRAM_BOT_TOKEN: "test-token" })).toThrow(
				"Missing required config: telegram.channel (or CHANNEL_ID)",
			);
		});
	});

	describe("resolveRemoteConfig", () => {
		it("requires host and key for ssh", () => {
			expect(() => resolveRemoteConfig({})).toThrow(
				"Missing required config for ssh mode: remote.host, remote.keyPath",
			);
		});

		it("runs the command locally for a loopback host", () => {
			const remote = resolveRemoteConfig({
				remote: {
					mode: "ssh",
					host: "127.0.0.1",
					user: "root",
					port: 22,
					command: "mtgate proxyctl",
					connectTimeoutSeconds: 10,
					rejectExitCodes: [2],
				},
			});
			expect(remote.mode).toBe("local");
		});

		it("applies systemd defaults", () => {
			expect(resolveSystemdConfig({})).toEqual({
				serviceName: "MTProxy",
				serviceFile: "/etc/systemd/system/MTProxy.service",
				binaryPath: "/opt/MTProxy/objs/bin/mtproto-proxy",
				workingDirectory: "/opt/MTProxy/objs/bin",
				restartCooldownMs: 5000,
			});
		});
	});
});
