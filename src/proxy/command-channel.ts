/**
 * Control channel that runs a management command for every change, either over
 * ssh on the proxy host or directly on this machine.
 *
 *   <command> add <secret>      exit 0 when the secret is (now) present
 *   <command> remove <secret>   exit 0 when the secret is (now) absent
 *   <command> list              one secret per line
 *
 * `mtgate proxyctl` implements this contract for a systemd-managed MTProxy.
 */

import { FatalRemoteError, RetryableTransportError } from "../errors.js";
import { type ExecResult, execCapture } from "../infra/exec.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { secretPrefix } from "../utils.js";
import type { ProxyControlChannel } from "./channel.js";
import { isValidSecret } from "./secret.js";

const logger = getChildLogger({ module: "proxy-command" });

/** ssh exits 255 when it could not connect or authenticate. */
const SSH_TRANSPORT_EXIT = 255;

export type CommandChannelOptions =
	| {
			mode: "ssh";
			host: string;
			user: string;
			port: number;
			keyPath: string;
			command: string;
			connectTimeoutSeconds: number;
			rejectExitCodes: number[];
	  }
	| {
			mode: "local";
			command: string;
			rejectExitCodes: number[];
	  };

export type ExitClassification = "ok" | "retryable" | "fatal";

/**
 * Map an exit status to an outcome. A process killed by a signal (code null) is
 * treated as a transport problem.
 */
export function classifyExit(
	code: number | null,
	opts: { viaSsh: boolean; rejectExitCodes: readonly number[] },
): ExitClassification {
	if (code === 0) return "ok";
	if (code === null) return "retryable";
	if (opts.viaSsh && code === SSH_TRANSPORT_EXIT) return "retryable";
	if (opts.rejectExitCodes.includes(code)) return "fatal";
	return "retryable";
}

type Exec = typeof execCapture;

export class CommandChannel implements ProxyControlChannel {
	readonly name: string;
	private readonly exec: Exec;

	constructor(
		private readonly options: CommandChannelOptions,
		deps: { exec?: Exec } = {},
	) {
		this.exec = deps.exec ?? execCapture;
		this.name = options.mode === "ssh" ? `ssh:${options.user}@${options.host}` : "local";
	}

	async addSecret(secret: string, signal: AbortSignal): Promise<void> {
		await this.invoke("add", secret, signal);
	}

	async removeSecret(secret: string, signal: AbortSignal): Promise<void> {
		await this.invoke("remove", secret, signal);
	}

	async listSecrets(signal: AbortSignal): Promise<string[]> {
		const result = await this.invoke("list", null, signal);
		return result.stdout
			.split("\n")
			.map((line) => line.trim())
			.filter(isValidSecret);
	}

	/**
	 * argv for one invocation. Exposed for tests.
	 */
	buildArgv(action: "add" | "remove" | "list", secret: string | null): [string, string[]] {
		if (secret !== null && !isValidSecret(secret)) {
			// Never let anything but hex reach a remote shell
			throw new FatalRemoteError(`refusing malformed secret for ${action}`);
		}
		const tail = secret === null ? [action] : [action, secret];
		const opts = this.options;

		if (opts.mode === "ssh") {
			return [
				"ssh",
				[
					"-i",
					opts.keyPath,
					"-p",
					String(opts.port),
					"-o",
					"BatchMode=yes",
					"-o",
					`ConnectTimeout=${opts.connectTimeoutSeconds}`,
					"-o",
					"StrictHostKeyChecking=accept-new",
					`${opts.user}@${opts.host}`,
					[opts.command, ...tail].join(" "),
				],
			];
		}

		const [program, ...rest] = opts.command.trim().split(/\s+/);
		if (!program) {
			throw new FatalRemoteError("remote.command is empty");
		}
		return [program, [...rest, ...tail]];
	}

	private async invoke(
		action: "add" | "remove" | "list",
		secret: string | null,
		signal: AbortSignal,
	): Promise<ExecResult> {
		const [program, args] = this.buildArgv(action, secret);
		const viaSsh = this.options.mode === "ssh";
		const label = secret ? `${action} ${secretPrefix(secret)}` : action;

		let result: ExecResult;
		try {
			result = await this.exec(program, args, { signal });
		} catch (err) {
			throw new RetryableTransportError(
				`${this.name}: ${label} could not run: ${formatErrorSafe(err)}`,
				{ cause: err },
			);
		}

		const outcome = classifyExit(result.code, {
			viaSsh,
			rejectExitCodes: this.options.rejectExitCodes,
		});
		const detail = result.stderr.trim().split("\n").slice(-1)[0] ?? "";

		switch (outcome) {
			case "ok":
				logger.debug({ channel: this.name, action }, `${label} ok`);
				return result;
			case "fatal":
				logger.warn({ channel: this.name, action, code: result.code }, `${label} rejected`);
				throw new FatalRemoteError(
					`${this.name}: ${label} rejected (exit ${result.code})${detail ? `: ${detail}` : ""}`,
					result.code,
				);
			case "retryable":
				logger.warn(
					{ channel: this.name, action, code: result.code, signal: result.signal },
					`${label} failed`,
				);
				throw new RetryableTransportError(
					`${this.name}: ${label} failed (exit ${result.code ?? result.signal})${detail ? `: ${detail}` : ""}`,
				);
		}
	}
}
