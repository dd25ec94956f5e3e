#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { closeLogger } from "./logging.js";
import { closeDb } from "./storage/db.js";

createProgram()
	.parseAsync()
	.catch((err: unknown) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// The SQLite handle and the log file would otherwise keep the process alive
		closeDb();
		closeLogger();
	});
