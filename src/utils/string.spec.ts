import { test, suite } from "node:test";
import assert from "node:assert";
import { isIdentifier, toSnakeCase } from "./string.js";

suite("utils/string.ts", () => {
	suite("toSnakeCase()", () => {
		test("should split camelCase and PascalCase names", () => {
			assert.strictEqual(toSnakeCase("camelCaseString"), "camel_case_string");
			assert.strictEqual(toSnakeCase("PascalCase"), "pascal_case");
			assert.strictEqual(toSnakeCase("PlayerProfile"), "player_profile");
		});

		test("should replace spaces and hyphens", () => {
			assert.strictEqual(toSnakeCase("some mixed_string"), "some_mixed_string");
			assert.strictEqual(toSnakeCase("skill-type"), "skill_type");
		});

		test("should keep acronyms together", () => {
			assert.strictEqual(toSnakeCase("HTTPRequest"), "http_request");
			assert.strictEqual(toSnakeCase("NPC"), "npc");
		});

		test("should leave lowercase names untouched", () => {
			assert.strictEqual(toSnakeCase("item"), "item");
		});
	});

	suite("isIdentifier()", () => {
		test("should accept letters, digits and underscores", () => {
			assert.strictEqual(isIdentifier("speed"), true);
			assert.strictEqual(isIdentifier("_hidden2"), true);
		});

		test("should reject leading digits and punctuation", () => {
			assert.strictEqual(isIdentifier("2fast"), false);
			assert.strictEqual(isIdentifier("max-hp"), false);
			assert.strictEqual(isIdentifier(""), false);
		});
	});
});
