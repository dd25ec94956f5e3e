import fs from "node:fs";
import { afterEach, describe, expect, it } from "vitest";

import { applyGlobalOptions, createProgram, readPackageVersion } from "../../src/cli/program.js";
import { resetConfigPath, resolveConfigPath } from "../../src/config/path.js";

describe("cli/program", () => {
	afterEach(() => {
		resetConfigPath();
	});

	it("registers every mtgate command", () => {
		const names = createProgram().commands.map((command) => command.name());
		expect(names).toEqual(["run", "status", "inspect", "sweep", "retry", "proxyctl"]);
	});

	it("reports the version from package.json", () => {
		const manifest = JSON.parse(fs.readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
		expect(readPackageVersion()).toBe(manifest.version);
		expect(createProgram().version()).toBe(manifest.version);
	});

	it("falls back when no package.json is found", () => {
		expect(readPackageVersion("file:///nowhere/a/b/c/src/cli/program.js")).toBe("0.0.0");
	});

	it("applies --config before the logger is built", () => {
		applyGlobalOptions({ config: "/tmp/mtgate-cli-test.json" });
		expect(resolveConfigPath()).toBe("/tmp/mtgate-cli-test.json");
	});
});
