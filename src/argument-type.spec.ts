import { suite, test } from "node:test";
import assert from "node:assert";
import {
	ArgumentTypeRegistry,
	BOOL,
	INT,
	NUM,
	STR,
	convertBoolean,
	defineArgumentType,
} from "./argument-type.js";
import { PatternError } from "./errors.js";

suite("argument-type.ts", () => {
	suite("built-in types", () => {
		test("int should accept signed integers only", () => {
			assert.strictEqual(INT.isValid("42"), true);
			assert.strictEqual(INT.isValid("-7"), true);
			assert.strictEqual(INT.isValid("+3"), true);
			assert.strictEqual(INT.isValid("4.2"), false);
			assert.strictEqual(INT.isValid("12abc"), false);
			assert.strictEqual(INT.isValid(""), false);
			assert.strictEqual(INT.convert("-7"), -7);
			assert.strictEqual(INT.convert("+3"), 3);
		});

		test("int should reject integers it cannot hold exactly", () => {
			assert.strictEqual(INT.isValid("9007199254740991"), true);
			assert.strictEqual(INT.isValid("-9007199254740991"), true);
			assert.strictEqual(INT.isValid("9007199254740992"), false);
			assert.strictEqual(INT.isValid("-9007199254740993"), false);
			assert.strictEqual(INT.convert("9007199254740991"), Number.MAX_SAFE_INTEGER);
		});

		test("num should accept decimal forms", () => {
			assert.strictEqual(NUM.isValid("3.14"), true);
			assert.strictEqual(NUM.isValid(".5"), true);
			assert.strictEqual(NUM.isValid("5."), true);
			assert.strictEqual(NUM.isValid("-2"), true);
			assert.strictEqual(NUM.isValid("."), false);
			assert.strictEqual(NUM.isValid("1e5"), false);
			assert.strictEqual(NUM.convert(".5"), 0.5);
			assert.strictEqual(NUM.convert("5."), 5);
			assert.strictEqual(NUM.convert("-2.25"), -2.25);
		});

		test("bool should accept the literal set case-insensitively", () => {
			for (const text of ["1", "true", "YES", "y", "T"]) {
				assert.strictEqual(BOOL.isValid(text), true, text);
				assert.strictEqual(BOOL.convert(text), true, text);
			}
			for (const text of ["0", "False", "no", "N", "f"]) {
				assert.strictEqual(BOOL.isValid(text), true, text);
				assert.strictEqual(BOOL.convert(text), false, text);
			}
			assert.strictEqual(BOOL.isValid("maybe"), false);
			assert.strictEqual(BOOL.isValid("yess"), false);
		});

		test("str should accept any non-empty token", () => {
			assert.strictEqual(STR.isValid("anything goes"), true);
			assert.strictEqual(STR.isValid("line\nbreak"), true);
			assert.strictEqual(STR.isValid(""), false);
			assert.strictEqual(STR.convert("home"), "home");
		});

		test("convertBoolean should reject other text", () => {
			assert.throws(() => convertBoolean("maybe"), TypeError);
		});
	});

	suite("ArgumentTypeRegistry", () => {
		test("should resolve a missing type name to str", () => {
			const types = new ArgumentTypeRegistry();
			assert.strictEqual(types.resolve(undefined, "content"), STR);
			assert.strictEqual(types.resolve("int", "n"), INT);
		});

		test("should name the slot when the type is unknown", () => {
			const types = new ArgumentTypeRegistry();
			assert.throws(
				() => types.resolve("float", "speed"),
				(error: unknown) =>
					error instanceof PatternError &&
					error.code === "UNKNOWN_TYPE" &&
					error.message === "Unknown type 'float' in argument speed:float"
			);
		});

		test("should accept extension types per registry", () => {
			const direction = defineArgumentType(
				"dir",
				/north|south|east|west/i,
				(text) => text.toLowerCase()
			);
			const extended = new ArgumentTypeRegistry([direction]);
			const plain = new ArgumentTypeRegistry();

			assert.strictEqual(extended.has("dir"), true);
			assert.strictEqual(plain.has("dir"), false);
			assert.strictEqual(extended.resolve("dir").isValid("North"), true);
			assert.strictEqual(extended.resolve("dir").isValid("northwest"), false);
			assert.strictEqual(extended.resolve("dir").convert("North"), "north");
			assert.deepStrictEqual(extended.names(), [
				"int",
				"num",
				"bool",
				"str",
				"dir",
			]);
		});

		test("should reject duplicate type names", () => {
			const types = new ArgumentTypeRegistry();
			assert.throws(
				() => types.register(defineArgumentType("int", /\d+/, Number)),
				(error: unknown) =>
					error instanceof PatternError && error.code === "DUPLICATE_TYPE"
			);
		});
	});
});
