import { suite, test } from "node:test";
import assert from "node:assert";
import { isPlainObject } from "./object.js";

suite("utils/object.ts", () => {
	test("isPlainObject() should accept mappings only", () => {
		assert.strictEqual(isPlainObject({ a: 1 }), true);
		assert.strictEqual(isPlainObject(Object.create(null)), true);
		assert.strictEqual(isPlainObject([]), false);
		assert.strictEqual(isPlainObject(null), false);
		assert.strictEqual(isPlainObject("a"), false);
		assert.strictEqual(isPlainObject(new Map()), false);
		assert.strictEqual(isPlainObject(new Date(0)), false);
	});
});
