import { suite, test, before, after, beforeEach } from "node:test";
import assert from "node:assert";
import { readFile, writeFile, mkdtemp, rm } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import YAML from "js-yaml";
import { loadConfig, mergeConfig } from "./config.js";
import { CONFIG, CONFIG_DEFAULT, resetConfig } from "../registry/config.js";

suite("package/config.ts", () => {
	let directory: string;

	before(async () => {
		directory = await mkdtemp(join(tmpdir(), "config-spec-"));
	});

	after(async () => {
		await rm(directory, { recursive: true, force: true });
		resetConfig();
	});

	beforeEach(() => {
		resetConfig();
	});

	test("should make default config file if none present", async () => {
		const path = join(directory, "nested", "config.yaml");

		const config = await loadConfig(path);

		assert.ok(existsSync(path), "Config file should be created");
		assert.ok(!existsSync(`${path}.tmp`), "Temporary file should be gone");
		const content = await readFile(path, "utf-8");
		assert.deepStrictEqual(YAML.load(content), CONFIG_DEFAULT);
		assert.deepStrictEqual(config, CONFIG_DEFAULT);
	});

	test("should successfully read config file", async () => {
		const path = join(directory, "custom.yaml");
		await writeFile(
			path,
			YAML.dump(
				{
					commands: { check_coverage: false },
					records: { dump_defaults: true },
				},
				{ noRefs: true, lineWidth: 120 }
			),
			"utf-8"
		);

		await loadConfig(path);

		assert.strictEqual(CONFIG.commands.check_coverage, false);
		assert.strictEqual(CONFIG.records.dump_defaults, true);
	});

	test("should keep defaults for missing sections", async () => {
		const path = join(directory, "partial.yaml");
		await writeFile(path, "records:\n  dump_defaults: true\n", "utf-8");

		await loadConfig(path);

		assert.strictEqual(CONFIG.commands.check_coverage, true);
		assert.strictEqual(CONFIG.records.dump_defaults, true);
	});

	test("should reject a file that is not YAML", async () => {
		const path = join(directory, "broken.yaml");
		await writeFile(path, "commands: [unclosed\n", "utf-8");

		await assert.rejects(loadConfig(path));
		assert.strictEqual(
			await readFile(path, "utf-8"),
			"commands: [unclosed\n",
			"A broken file must not be overwritten"
		);
	});

	suite("mergeConfig()", () => {
		test("should ignore unknown keys", () => {
			const merged = mergeConfig({
				commands: { check_coverage: false, verbose: true },
				server: { port: 8080 },
			});
			assert.deepStrictEqual(merged, {
				commands: { check_coverage: false },
				records: { dump_defaults: false },
			});
		});

		test("should ignore values of the wrong type", () => {
			const merged = mergeConfig({
				commands: { check_coverage: "no" },
				records: "yes",
			});
			assert.deepStrictEqual(merged, {
				commands: { check_coverage: true },
				records: { dump_defaults: false },
			});
		});

		test("should fall back to defaults for non-mapping documents", () => {
			assert.deepStrictEqual(mergeConfig(null), CONFIG_DEFAULT);
			assert.deepStrictEqual(mergeConfig(["a"]), CONFIG_DEFAULT);
		});
	});
});
