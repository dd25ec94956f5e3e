/**
 * Reading and writing the MTProxy systemd unit.
 *
 * The proxy takes its secrets on the command line (one `-S` per secret), so the
 * unit's ExecStart line is the authoritative secret set on the host.
 */

import type { SystemdConfig } from "../config/config.js";
import { SECRET_PATTERN } from "./secret.js";

export type ProxyServiceSettings = {
	port: number;
	secrets: string[];
	/** Advertising tag from @MTProxybot, 32 hex chars. */
	tag: string | null;
	tlsDomain: string | null;
	workers: number;
};

export const DEFAULT_SERVICE_SETTINGS: ProxyServiceSettings = {
	port: 8888,
	secrets: [],
	tag: null,
	tlsDomain: "www.cloudflare.com",
	workers: 1,
};

const EXEC_START = /^ExecStart=(.*)$/m;

/**
 * Pull the ExecStart command out of a unit file. Null when the unit has none.
 */
export function extractExecStart(unit: string): string | null {
	const match = EXEC_START.exec(unit);
	return match?.[1]?.trim() ?? null;
}

/**
 * Parse proxy settings from an ExecStart command line. Flags that are absent
 * keep their defaults; duplicate secrets are collapsed.
 */
export function parseExecStart(execStart: string): ProxyServiceSettings {
	const tokens = execStart.split(/\s+/).filter(Boolean);
	const settings: ProxyServiceSettings = { ...DEFAULT_SERVICE_SETTINGS, secrets: [] };

	for (let i = 0; i < tokens.length - 1; i++) {
		const flag = tokens[i];
		const value = tokens[i + 1] ?? "";
		switch (flag) {
			case "-H": {
				const port = Number.parseInt(value, 10);
				if (Number.isInteger(port) && port > 0) settings.port = port;
				break;
			}
			case "-S":
				if (SECRET_PATTERN.test(value) && !settings.secrets.includes(value)) {
					settings.secrets.push(value);
				}
				break;
			case "-P":
				if (SECRET_PATTERN.test(value)) settings.tag = value;
				break;
			case "-D":
				settings.tlsDomain = value;
				break;
			case "-M": {
				const workers = Number.parseInt(value, 10);
				if (Number.isInteger(workers) && workers >= 0) settings.workers = workers;
				break;
			}
		}
	}

	return settings;
}

export function parseServiceFile(unit: string): ProxyServiceSettings | null {
	const execStart = extractExecStart(unit);
	return execStart === null ? null : parseExecStart(execStart);
}

export function renderExecStart(
	settings: ProxyServiceSettings,
	binaryPath: SystemdConfig["binaryPath"],
): string {
	const parts = [binaryPath, "-u", "nobody", "-H", String(settings.port)];
	for (const secret of settings.secrets) {
		parts.push("-S", secret);
	}
	if (settings.tag) parts.push("-P", settings.tag);
	if (settings.tlsDomain) parts.push("-D", settings.tlsDomain);
	parts.push("-M", String(settings.workers), "--aes-pwd", "proxy-secret", "proxy-multi.conf");
	return parts.join(" ");
}

/**
 * Render the whole unit. When `existing` is given only its ExecStart line is
 * replaced, so operator edits elsewhere in the file survive.
 */
export function renderServiceFile(
	settings: ProxyServiceSettings,
	systemd: Pick<SystemdConfig, "binaryPath" | "workingDirectory">,
	existing?: string,
): string {
	const execStart = renderExecStart(settings, systemd.binaryPath);

	if (existing && EXEC_START.test(existing)) {
		return existing.replace(EXEC_START, () => `ExecStart=${execStart}`);
	}

	return [
		"[Unit]",
		"Description=MTProxy",
		"After=network.target",
		"",
		"[Service]",
		"Type=simple",
		`WorkingDirectory=${systemd.workingDirectory}`,
		`ExecStart=${execStart}`,
		"Restart=on-failure",
		"StartLimitBurst=0",
		"",
		"[Install]",
		"WantedBy=multi-user.target",
		"",
	].join("\n");
}
