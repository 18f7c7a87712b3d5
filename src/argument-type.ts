/**
 * Argument types for command pattern slots.
 *
 * An argument type recognizes a single token (full regular-expression match)
 * and converts it into a typed value. Every `ArgumentTypeRegistry` starts out
 * with the four built-in types and can be extended per engine:
 *
 * - `int`: optionally signed decimal integer (`"-12"` -> `-12`) within
 *   `Number.MAX_SAFE_INTEGER`
 * - `num`: optionally signed decimal or float (`".5"` -> `0.5`, `"3."` -> `3`)
 * - `bool`: `1, true, yes, y, t` / `0, false, no, n, f` (case-insensitive)
 * - `str`: any non-empty token, unchanged (the default for untyped slots)
 *
 * @example
 * ```typescript
 * const types = new ArgumentTypeRegistry();
 * types.register(
 *   defineArgumentType("dir", /north|south|east|west/, (text) => text)
 * );
 * types.resolve("dir", "where").isValid("north"); // true
 * ```
 *
 * @module argument-type
 */

import { PatternError } from "./errors.js";

/** Values a slot can bind once its token is converted. */
export type ArgumentValue = string | number | boolean;

/**
 * A named scalar type usable in `<name:type>` and `[name:type]` slots.
 */
export interface ArgumentType<T extends ArgumentValue = ArgumentValue> {
	readonly name: string;
	/** Whether the whole token belongs to this type. */
	isValid(text: string): boolean;
	/** Convert a token already accepted by `isValid()`. */
	convert(text: string): T;
}

/**
 * Build an argument type from a recognition pattern and a converter.
 * The pattern must match the entire token; anchors are added here.
 */
export function defineArgumentType<T extends ArgumentValue>(
	name: string,
	pattern: RegExp,
	convert: (text: string) => T
): ArgumentType<T> {
	const flags = pattern.flags.replace(/[gy]/g, "");
	const anchored = new RegExp(`^(?:${pattern.source})$`, flags);
	return Object.freeze({
		name,
		isValid: (text: string) => anchored.test(text),
		convert,
	});
}

export const TRUE_LITERALS: readonly string[] = ["1", "true", "yes", "y", "t"];
export const FALSE_LITERALS: readonly string[] = ["0", "false", "no", "n", "f"];

/**
 * Convert a boolean literal (see {@link TRUE_LITERALS} and
 * {@link FALSE_LITERALS}) into a boolean.
 *
 * @throws {TypeError} If the text is not a boolean literal
 */
export function convertBoolean(text: string): boolean {
	const lowered = text.toLowerCase();
	if (TRUE_LITERALS.includes(lowered)) return true;
	if (FALSE_LITERALS.includes(lowered)) return false;
	throw new TypeError(`Invalid boolean literal: ${text}`);
}

const INT_DIGITS = defineArgumentType("int", /[+-]?\d+/, (text) =>
	parseInt(text, 10)
);
export const INT: ArgumentType<number> = Object.freeze({
	...INT_DIGITS,
	// tokens past Number.MAX_SAFE_INTEGER would bind a rounded value
	isValid: (text: string) =>
		INT_DIGITS.isValid(text) && Number.isSafeInteger(INT_DIGITS.convert(text)),
});
export const NUM = defineArgumentType(
	"num",
	/[+-]?(?:\d*\.?\d+|\d+\.?\d*)/,
	(text) => parseFloat(text)
);
export const BOOL = defineArgumentType(
	"bool",
	new RegExp([...TRUE_LITERALS, ...FALSE_LITERALS].join("|"), "i"),
	convertBoolean
);
export const STR = defineArgumentType("str", /[\s\S]+/, (text) => text);

/** Name of the type untyped slots resolve to. */
export const DEFAULT_ARGUMENT_TYPE = STR.name;

/**
 * Registry of the argument types a command engine understands.
 *
 * Each `CommandRegistry` owns one, so engines can extend their types without
 * affecting each other.
 */
export class ArgumentTypeRegistry {
	private types = new Map<string, ArgumentType>();

	constructor(extra: Iterable<ArgumentType> = []) {
		for (const type of [INT, NUM, BOOL, STR]) this.register(type);
		for (const type of extra) this.register(type);
	}

	/**
	 * Add a type. Names are unique within a registry.
	 *
	 * @throws {PatternError} DUPLICATE_TYPE when the name is taken
	 */
	register(type: ArgumentType): void {
		if (this.types.has(type.name)) {
			throw new PatternError(
				"DUPLICATE_TYPE",
				`Argument type '${type.name}' is already registered`,
				{ type: type.name }
			);
		}
		this.types.set(type.name, type);
	}

	get(name: string): ArgumentType | undefined {
		return this.types.get(name);
	}

	has(name: string): boolean {
		return this.types.has(name);
	}

	names(): string[] {
		return [...this.types.keys()];
	}

	/**
	 * Resolve the type written in a slot. A missing type name means `str`.
	 *
	 * @param typeName - The type as written after the colon, if any
	 * @param slotName - The slot being declared, used in the error message
	 * @throws {PatternError} UNKNOWN_TYPE when the name is not registered
	 */
	resolve(typeName: string | undefined, slotName = "?"): ArgumentType {
		const name = typeName ?? DEFAULT_ARGUMENT_TYPE;
		const type = this.types.get(name);
		if (!type) {
			throw new PatternError(
				"UNKNOWN_TYPE",
				`Unknown type '${name}' in argument ${slotName}:${name}`,
				{ slot: slotName, type: name }
			);
		}
		return type;
	}
}
