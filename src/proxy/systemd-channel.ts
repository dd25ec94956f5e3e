/**
 * Control channel for an MTProxy managed by systemd on this host.
 *
 * Each change rewrites the unit's ExecStart and restarts the service. Restarts
 * are spaced by `restartCooldownMs`, measured from the unit file's mtime so the
 * spacing also holds across separate `mtgate proxyctl` invocations.
 */

import fs from "node:fs";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import type { SystemdConfig } from "../config/config.js";
import { FatalRemoteError, RetryableTransportError } from "../errors.js";
import { type ExecResult, execCapture } from "../infra/exec.js";
import { KeyedMutex } from "../infra/keyed-lock.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { secretPrefix } from "../utils.js";
import type { ProxyControlChannel } from "./channel.js";
import { isValidSecret } from "./secret.js";
import { type ProxyServiceSettings, parseServiceFile, renderServiceFile } from "./service-file.js";

const logger = getChildLogger({ module: "proxy-systemd" });

type Exec = typeof execCapture;

export class SystemdServiceChannel implements ProxyControlChannel {
	readonly name: string;
	private readonly exec: Exec;
	private readonly now: () => number;
	// One rewrite+restart at a time
	private readonly mutex = new KeyedMutex();

	constructor(
		private readonly config: SystemdConfig,
		deps: { exec?: Exec; now?: () => number } = {},
	) {
		this.exec = deps.exec ?? execCapture;
		this.now = deps.now ?? Date.now;
		this.name = `systemd:${config.serviceName}`;
	}

	addSecret(secret: string, signal: AbortSignal): Promise<void> {
		return this.change(secret, signal, (secrets) =>
			secrets.includes(secret) ? null : [...secrets, secret],
		);
	}

	removeSecret(secret: string, signal: AbortSignal): Promise<void> {
		return this.change(secret, signal, (secrets) =>
			secrets.includes(secret) ? secrets.filter((s) => s !== secret) : null,
		);
	}

	async listSecrets(_signal: AbortSignal): Promise<string[]> {
		const { settings } = await this.readUnit();
		return settings.secrets;
	}

	/**
	 * `edit` returns the new secret list, or null when nothing needs to change.
	 */
	private change(
		secret: string,
		signal: AbortSignal,
		edit: (secrets: string[]) => string[] | null,
	): Promise<void> {
		if (!isValidSecret(secret)) {
			return Promise.reject(new FatalRemoteError("secret must be 32 lowercase hex characters", 2));
		}

		return this.mutex.run("unit", async () => {
			signal.throwIfAborted();
			const { raw, settings } = await this.readUnit();
			const next = edit(settings.secrets);
			if (next === null) {
				logger.debug({ secret: secretPrefix(secret) }, "secret set already up to date");
				return;
			}

			await this.waitForCooldown(signal);

			const updated: ProxyServiceSettings = { ...settings, secrets: next };
			await this.writeUnit(renderServiceFile(updated, this.config, raw));
			try {
				await this.systemctl(["daemon-reload"], signal);
				await this.systemctl(["restart", this.config.serviceName], signal);
			} catch (err) {
				// Put the old unit back so a retry sees the change as not yet applied
				await this.writeUnit(raw);
				throw err;
			}

			logger.info(
				{ secret: secretPrefix(secret), secrets: next.length },
				`${this.config.serviceName} restarted with updated secrets`,
			);
		});
	}

	private async readUnit(): Promise<{ raw: string; settings: ProxyServiceSettings }> {
		let raw: string;
		try {
			raw = await fs.promises.readFile(this.config.serviceFile, "utf-8");
		} catch (err) {
			throw new FatalRemoteError(
				`cannot read ${this.config.serviceFile}: ${formatErrorSafe(err)}`,
				null,
				{ cause: err },
			);
		}
		const settings = parseServiceFile(raw);
		if (!settings) {
			throw new FatalRemoteError(`${this.config.serviceFile} has no ExecStart line`);
		}
		return { raw, settings };
	}

	private async writeUnit(content: string): Promise<void> {
		const file = this.config.serviceFile;
		const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
		try {
			await fs.promises.writeFile(tmp, content, { mode: 0o644 });
			await fs.promises.rename(tmp, file);
		} catch (err) {
			await fs.promises.rm(tmp, { force: true });
			throw new RetryableTransportError(`cannot write ${file}: ${formatErrorSafe(err)}`, {
				cause: err,
			});
		}
	}

	private async waitForCooldown(signal: AbortSignal): Promise<void> {
		const stat = await fs.promises.stat(this.config.serviceFile);
		const wait = this.config.restartCooldownMs - (this.now() - stat.mtimeMs);
		if (wait > 0) {
			logger.debug({ waitMs: Math.round(wait) }, "waiting for restart cooldown");
			await delay(wait, undefined, { signal });
		}
	}

	private async systemctl(args: string[], signal: AbortSignal): Promise<void> {
		let result: ExecResult;
		try {
			result = await this.exec("systemctl", args, { signal });
		} catch (err) {
			throw new RetryableTransportError(`systemctl ${args.join(" ")}: ${formatErrorSafe(err)}`, {
				cause: err,
			});
		}
		if (result.code !== 0) {
			throw new RetryableTransportError(
				`systemctl ${args.join(" ")} exited ${result.code ?? result.signal}: ${result.stderr.trim()}`,
			);
		}
	}
}
