import { suite, test } from "node:test";
import assert from "node:assert";
import { tokenize } from "./tokenize.js";

suite("tokenize.ts", () => {
	test("should split on whitespace", () => {
		assert.deepStrictEqual(tokenize("add 5 7"), ["add", "5", "7"]);
		assert.deepStrictEqual(tokenize("  look \t north  "), ["look", "north"]);
	});

	test("should return no tokens for empty or blank input", () => {
		assert.deepStrictEqual(tokenize(""), []);
		assert.deepStrictEqual(tokenize("   \t  "), []);
	});

	test("should keep whitespace inside quotes and strip the quotes", () => {
		assert.deepStrictEqual(tokenize('say "hello there"'), [
			"say",
			"hello there",
		]);
		assert.deepStrictEqual(tokenize("give 'old sword' bob"), [
			"give",
			"old sword",
			"bob",
		]);
	});

	test("should keep escaped quotes inside a quoted token", () => {
		assert.deepStrictEqual(tokenize('say "hello \\"world\\""'), [
			"say",
			'hello "world"',
		]);
	});

	test("should treat the other quote character literally inside quotes", () => {
		assert.deepStrictEqual(tokenize(`say "it's fine"`), ["say", "it's fine"]);
	});

	test("should join quoted runs with adjacent characters", () => {
		assert.deepStrictEqual(tokenize('a"b c"d'), ["ab cd"]);
	});

	test("should escape whitespace and backslashes", () => {
		assert.deepStrictEqual(tokenize("open big\\ door"), ["open", "big door"]);
		assert.deepStrictEqual(tokenize("path a\\\\b"), ["path", "a\\b"]);
	});

	test("should run an unterminated quote to the end of the line", () => {
		assert.deepStrictEqual(tokenize('say "never closed  here'), [
			"say",
			"never closed  here",
		]);
	});

	test("should drop a trailing escape character", () => {
		assert.deepStrictEqual(tokenize("say hi\\"), ["say", "hi"]);
	});

	test("should not produce a token for an empty quoted string", () => {
		assert.deepStrictEqual(tokenize('say ""'), ["say"]);
	});
});
