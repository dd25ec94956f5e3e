import { spawn } from "node:child_process";

export type ExecResult = {
	code: number | null;
	signal: NodeJS.Signals | null;
	stdout: string;
	stderr: string;
};

export type ExecOptions = {
	signal?: AbortSignal;
	/** Cap on captured output per stream. Default: 64 KiB. */
	maxOutputBytes?: number;
};

/**
 * Run a process to completion and capture its output.
 *
 * Resolves with the exit status whatever it is; rejects only when the process
 * could not be started or `signal` aborted it.
 */
export function execCapture(
	command: string,
	args: readonly string[],
	options: ExecOptions = {},
): Promise<ExecResult> {
	const maxOutput = options.maxOutputBytes ?? 64 * 1024;

	return new Promise((resolve, reject) => {
		const proc = spawn(command, [...args], {
			stdio: ["ignore", "pipe", "pipe"],
			signal: options.signal,
		});

		let stdout = "";
		let stderr = "";
		proc.stdout.on("data", (chunk: Buffer) => {
			if (stdout.length < maxOutput) stdout += chunk.toString("utf8");
		});
		proc.stderr.on("data", (chunk: Buffer) => {
			if (stderr.length < maxOutput) stderr += chunk.toString("utf8");
		});

		proc.on("error", reject);
		proc.on("close", (code, signal) => {
			resolve({
				code,
				signal,
				stdout: stdout.slice(0, maxOutput),
				stderr: stderr.slice(0, maxOutput),
			});
		});
	});
}
