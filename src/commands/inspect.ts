import type { Command } from "commander";

import { SqliteCredentialStore } from "../credentials/store.js";
import type { UserCredentialRecord } from "../credentials/types.js";
import { getDb } from "../storage/db.js";
import { parseTelegramId, secretPrefix } from "../utils.js";

function formatTime(ms: number | null): string {
	return ms === null ? "-" : new Date(ms).toISOString();
}

export function formatRecord(record: UserCredentialRecord): string {
	return [
		`User: ${record.userId}${record.username ? ` (@${record.username})` : ""}`,
		`  Status: ${record.status} (target: ${record.target})`,
		`  Generation: ${record.generation}`,
		`  Secret: ${record.secret ? secretPrefix(record.secret) : "-"}`,
		`  Link: ${record.proxyLink ? "issued" : "-"}`,
		`  Failures: ${record.failureCount}${record.failedOperation ? ` (${record.failedOperation} failed)` : ""}`,
		`  Last error: ${record.lastError ?? "-"}`,
		`  Last event: ${record.lastEventType ?? "-"} at ${formatTime(record.lastEventAt)}`,
		`  Next attempt: ${formatTime(record.nextAttemptAt)}`,
		`  Created: ${formatTime(record.createdAt)}`,
		`  Updated: ${formatTime(record.updatedAt)}`,
	].join("\n");
}

export function registerInspectCommand(program: Command): void {
	program
		.command("inspect")
		.description("Show the credential record of one user")
		.argument("<userId>", "Telegram user id")
		.option("--json", "Output as JSON (secret and link included)")
		.action((userId: string, opts: { json?: boolean }) => {
			if (Number.isNaN(parseTelegramId(userId))) {
				console.error(`Invalid user id: ${userId}`);
				process.exitCode = 1;
				return;
			}

			const record = new SqliteCredentialStore(getDb()).get(userId.trim());
			if (!record) {
				console.error(`No record for user ${userId}`);
				process.exitCode = 1;
				return;
			}

			console.log(opts.json ? JSON.stringify(record, null, 2) : formatRecord(record));
		});
}
