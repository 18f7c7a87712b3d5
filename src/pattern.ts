/**
 * Command pattern grammar.
 *
 * A pattern is a whitespace-separated list of elements:
 * - `<name>` or `<name:type>` - required slot, consumes exactly one token
 * - `[name]` or `[name:type]` - optional slot, consumes a token only if it fits
 * - anything else - literal word that must appear verbatim
 *
 * Untyped slots are `str`. Literals come first, then required slots, then
 * optional slots, and slot names are unique within a pattern:
 *
 * ```
 * set speed <speed:num> [sprint:bool]   ok
 * get coord <player>                    ok
 * <target> attack                       literal after slot
 * give [item] <target>                  required after optional
 * ```
 *
 * @module pattern
 */

import type { ArgumentType, ArgumentTypeRegistry } from "./argument-type.js";
import { PatternError } from "./errors.js";
import { matchPattern, type ParsedArgs } from "./matcher.js";
import { isCoveredBy } from "./coverage.js";

export interface LiteralElement {
	readonly kind: "literal";
	readonly word: string;
}

export interface SlotElement {
	readonly kind: "slot";
	readonly name: string;
	readonly type: ArgumentType;
	readonly optional: boolean;
}

export type PatternElement = LiteralElement | SlotElement;

const ELEMENT_REGEX =
	/<(?<reqname>[A-Za-z_]\w*)(?::(?<reqtype>[A-Za-z_]\w*))?>|\[(?<optname>[A-Za-z_]\w*)(?::(?<opttype>[A-Za-z_]\w*))?\]|(?<word>\S+)/g;

/**
 * Parse a pattern string into its elements, validating element order and
 * slot names in a single left-to-right scan.
 *
 * @throws {PatternError} LITERAL_AFTER_SLOT, REQUIRED_AFTER_OPTIONAL,
 * DUPLICATE_SLOT, UNKNOWN_TYPE or EMPTY_PATTERN
 */
export function parsePattern(
	pattern: string,
	types: ArgumentTypeRegistry
): PatternElement[] {
	const elements: PatternElement[] = [];
	const slotNames = new Set<string>();
	let sawSlot = false;
	let sawOptional = false;

	for (const match of pattern.matchAll(ELEMENT_REGEX)) {
		const groups = match.groups ?? {};
		if (groups.word !== undefined) {
			if (sawSlot) {
				throw new PatternError(
					"LITERAL_AFTER_SLOT",
					`Literal '${groups.word}' found after an argument in pattern '${pattern}'`,
					{ pattern, element: groups.word }
				);
			}
			elements.push({ kind: "literal", word: groups.word });
			continue;
		}

		const optional = groups.optname !== undefined;
		const name = groups.optname ?? groups.reqname ?? "";
		const typeName = optional ? groups.opttype : groups.reqtype;
		sawSlot = true;

		if (!optional && sawOptional) {
			throw new PatternError(
				"REQUIRED_AFTER_OPTIONAL",
				`Required argument '${name}' found after an optional argument in pattern '${pattern}'`,
				{ pattern, element: match[0] }
			);
		}
		if (slotNames.has(name)) {
			throw new PatternError(
				"DUPLICATE_SLOT",
				`Duplicate argument name '${name}' in pattern '${pattern}'`,
				{ pattern, element: match[0] }
			);
		}
		const type = types.resolve(typeName, name);

		slotNames.add(name);
		if (optional) sawOptional = true;
		elements.push({ kind: "slot", name, type, optional });
	}

	if (elements.length === 0) {
		throw new PatternError("EMPTY_PATTERN", "Pattern has no elements", {
			pattern,
		});
	}
	return elements;
}

/**
 * Render a parsed element the way it is written in a pattern.
 */
export function formatElement(element: PatternElement): string {
	if (element.kind === "literal") return element.word;
	const inner = `${element.name}:${element.type.name}`;
	return element.optional ? `[${inner}]` : `<${inner}>`;
}

/**
 * A parsed command pattern. Immutable once constructed.
 *
 * @example
 * ```typescript
 * const pattern = new CommandPattern("add <a:int> <b:int>", types);
 * pattern.match(["add", "5", "7"]); // Map { "a" => 5, "b" => 7 }
 * pattern.match(["add", "5"]);      // undefined
 * ```
 */
export class CommandPattern {
	readonly source: string;
	readonly elements: readonly PatternElement[];

	constructor(source: string, types: ArgumentTypeRegistry) {
		this.source = source;
		this.elements = Object.freeze(parsePattern(source, types));
	}

	/**
	 * Match tokens against this pattern.
	 * @returns The bound slot values, or undefined when the tokens don't match
	 */
	match(tokens: readonly string[]): ParsedArgs | undefined {
		return matchPattern(this.elements, tokens);
	}

	/**
	 * Whether `other`, tried before this pattern, would accept every input
	 * this pattern accepts.
	 */
	isCoveredBy(other: CommandPattern): boolean {
		return isCoveredBy(this.elements, other.elements);
	}

	/** The pattern with every slot's resolved type spelled out. */
	describe(): string {
		return this.elements.map(formatElement).join(" ");
	}

	toString(): string {
		return this.source;
	}
}
