import type { Command } from "commander";

import { loadConfig, resolveSystemdConfig } from "../config/config.js";
import { FatalRemoteError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { isValidSecret } from "../proxy/secret.js";
import { SystemdServiceChannel } from "../proxy/systemd-channel.js";

const logger = getChildLogger({ module: "cmd-proxyctl" });

/** Exit code for rejected input; remote callers treat it as non-retryable. */
export const EXIT_REJECTED = 2;

const ACTIONS = ["add", "remove", "list"] as const;
type ProxyctlAction = (typeof ACTIONS)[number];

function isAction(value: string): value is ProxyctlAction {
	return ACTIONS.some((action) => action === value);
}

export function registerProxyctlCommand(program: Command): void {
	program
		.command("proxyctl")
		.description("Manage secrets of the local systemd MTProxy service (run on the proxy host)")
		.argument("<action>", "add | remove | list")
		.argument("[secret]", "32 hex characters")
		.action(async (action: string, secret: string | undefined) => {
			if (!isAction(action)) {
				console.error(`Unknown action '${action}' (expected add, remove or list)`);
				process.exitCode = EXIT_REJECTED;
				return;
			}
			if (action !== "list" && (!secret || !isValidSecret(secret))) {
				console.error("A secret of 32 lowercase hex characters is required");
				process.exitCode = EXIT_REJECTED;
				return;
			}

			const channel = new SystemdServiceChannel(resolveSystemdConfig(loadConfig()));
			const signal = new AbortController().signal;

			try {
				if (action === "list") {
					for (const value of await channel.listSecrets(signal)) {
						console.log(value);
					}
				} else if (secret) {
					if (action === "add") {
						await channel.addSecret(secret, signal);
					} else {
						await channel.removeSecret(secret, signal);
					}
				}
			} catch (err) {
				logger.error({ action, error: formatErrorSafe(err) }, "proxyctl failed");
				console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
				// Exit 2 marks the change as rejected for remote callers
				process.exitCode = err instanceof FatalRemoteError ? EXIT_REJECTED : 1;
			}
		});
}
