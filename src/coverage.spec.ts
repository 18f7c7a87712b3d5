import { suite, test } from "node:test";
import assert from "node:assert";
import { ArgumentTypeRegistry } from "./argument-type.js";
import { CommandPattern } from "./pattern.js";
import { findCoverage, formatCoverageWarning } from "./coverage.js";

const types = new ArgumentTypeRegistry();

function covered(later: string, earlier: string): boolean {
	return new CommandPattern(later, types).isCoveredBy(
		new CommandPattern(earlier, types)
	);
}

function patterns(...sources: string[]): CommandPattern[] {
	return sources.map((source) => new CommandPattern(source, types));
}

suite("coverage.ts", () => {
	suite("isCoveredBy()", () => {
		test("should cover a literal with a str slot", () => {
			assert.strictEqual(covered("go home", "go <dir:str>"), true);
			assert.strictEqual(covered("go <dir:str>", "go home"), false);
		});

		test("should cover a literal only with a slot type that accepts it", () => {
			assert.strictEqual(covered("take 5", "take <n:int>"), true);
			assert.strictEqual(covered("take all", "take <n:int>"), false);
		});

		test("should require equal literals", () => {
			assert.strictEqual(covered("look", "look"), true);
			assert.strictEqual(covered("look", "examine"), false);
		});

		test("should never cover a slot with a literal", () => {
			assert.strictEqual(covered("go <dir>", "go north"), false);
		});

		test("should cover a slot with the same type or str", () => {
			assert.strictEqual(covered("take <n:int>", "take <count:int>"), true);
			assert.strictEqual(covered("take <n:int>", "take <what:str>"), true);
			assert.strictEqual(covered("take <n:int>", "take <n:num>"), false);
			assert.strictEqual(covered("take <what:str>", "take <n:int>"), false);
		});

		test("should not cover a required slot with an optional one", () => {
			assert.strictEqual(covered("set <x:int>", "set [x:int]"), false);
			// only the required-under-optional pairing is ruled out
			assert.strictEqual(covered("set [x:int]", "set <x:int>"), true);
			assert.strictEqual(covered("set [x:int]", "set [y:int]"), true);
		});

		test("should allow trailing optional slots on the earlier pattern", () => {
			assert.strictEqual(covered("hello", "hello [content]"), true);
			assert.strictEqual(covered("hello", "hello <content>"), false);
		});

		test("should not cover a longer pattern", () => {
			assert.strictEqual(covered("add <a:int> <b:int>", "add <a:int>"), false);
		});
	});

	suite("findCoverage()", () => {
		test("should report a shadowed later pattern", () => {
			const warnings = findCoverage("go", patterns("go <dir:str>", "go home"));
			assert.deepStrictEqual(warnings, [
				{
					command: "go",
					pattern: "go home",
					coveredBy: "go <dir:str>",
					patternIndex: 1,
					coveredByIndex: 0,
				},
			]);
		});

		test("should report nothing when the specific pattern comes first", () => {
			assert.deepStrictEqual(
				findCoverage("go", patterns("go home", "go <dir:str>")),
				[]
			);
		});

		test("should compare each pattern with every earlier one", () => {
			const warnings = findCoverage(
				"take",
				patterns("take <what>", "take <n:int>", "take all")
			);
			assert.deepStrictEqual(
				warnings.map((w) => [w.patternIndex, w.coveredByIndex]),
				[
					[1, 0],
					[2, 0],
				]
			);
		});

		test("should format a warning with 1-based positions", () => {
			const [warning] = findCoverage("go", patterns("go <dir:str>", "go home"));
			assert.strictEqual(
				formatCoverageWarning(warning),
				"Pattern 1 ('go <dir:str>') fully covers pattern 2 ('go home') of command 'go'"
			);
		});
	});
});
