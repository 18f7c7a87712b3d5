import { test, suite, afterEach } from "node:test";
import assert from "node:assert";
import { join } from "path";
import { getDataPath, getLogPath, getSafeRootDirectory } from "./path.js";

suite("utils/path.ts", () => {
	const original = process.env.PARLANCE_ROOT;

	afterEach(() => {
		if (original === undefined) delete process.env.PARLANCE_ROOT;
		else process.env.PARLANCE_ROOT = original;
	});

	test("should fall back to the working directory", () => {
		delete process.env.PARLANCE_ROOT;
		assert.strictEqual(getSafeRootDirectory(), process.cwd());
		assert.strictEqual(getLogPath(), join(process.cwd(), "logs"));
	});

	test("should resolve logs and data under PARLANCE_ROOT", () => {
		process.env.PARLANCE_ROOT = join("srv", "game");
		assert.strictEqual(getLogPath("app.log"), join("srv", "game", "logs", "app.log"));
		assert.strictEqual(getDataPath("config.yaml"), join("srv", "game", "data", "config.yaml"));
	});
});
