/**
 * The `mtgate` command line. Global options are applied in a preAction hook,
 * before any command loads config or opens the log file.
 */

import fs from "node:fs";
import { Command } from "commander";
import { z } from "zod";

import { registerInspectCommand } from "../commands/inspect.js";
import { registerProxyctlCommand } from "../commands/proxyctl.js";
import { registerRetryCommand } from "../commands/retry.js";
import { registerRunCommand } from "../commands/run.js";
import { registerStatusCommand } from "../commands/status.js";
import { registerSweepCommand } from "../commands/sweep.js";
import { setConfigPath } from "../config/path.js";
import { setVerbose } from "../globals.js";
import { getLogger } from "../logging.js";

export type GlobalOptions = {
	config?: string;
	verbose?: boolean;
};

const COMMANDS: ReadonlyArray<(program: Command) => void> = [
	registerRunCommand,
	registerStatusCommand,
	registerInspectCommand,
	registerSweepCommand,
	registerRetryCommand,
	registerProxyctlCommand,
];

const PackageManifestSchema = z.object({ version: z.string() });

/**
 * Version from the nearest package.json above src/cli (or dist/src/cli).
 */
export function readPackageVersion(moduleUrl: string = import.meta.url): string {
	for (const relative of ["../../package.json", "../../../package.json"]) {
		const manifest = new URL(relative, moduleUrl);
		if (!fs.existsSync(manifest)) continue;
		const parsed = PackageManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifest, "utf8")));
		if (parsed.success) return parsed.data.version;
	}
	return "0.0.0";
}

export function applyGlobalOptions(options: GlobalOptions): void {
	if (options.config) setConfigPath(options.config);
	if (options.verbose) setVerbose(true);
	// Built after the config path is known, so the `logging` section applies
	getLogger();
}

export function createProgram(): Command {
	const program = new Command("mtgate")
		.description("Channel-gated MTProto proxy access manager")
		.version(readPackageVersion())
		.option("-v, --verbose", "log at debug level")
		.option("-c, --config <path>", "config file (default: ~/.mtgate/mtgate.json)");

	for (const register of COMMANDS) {
		register(program);
	}

	program.hook("preAction", (command) => {
		applyGlobalOptions(command.opts<GlobalOptions>());
	});
	return program;
}
