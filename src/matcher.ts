/**
 * Token matcher for parsed command patterns.
 *
 * Walks pattern elements and tokens in lockstep:
 * - a literal needs the next token to equal its word exactly
 * - a required slot needs the next token to fit its type
 * - an optional slot takes the next token only if it fits its type,
 *   otherwise it binds `undefined` and consumes nothing
 *
 * Every token must be consumed. Matching is greedy and never backtracks, so
 * `set [x:int]` rejects `set abc`: the optional slot binds `undefined` and
 * `abc` is left over. That limitation is kept on purpose; order or type your
 * patterns accordingly.
 *
 * @module matcher
 */

import type { ArgumentValue } from "./argument-type.js";
import type { PatternElement } from "./pattern.js";

/**
 * Slot values bound by a successful match, keyed by slot name. Optional slots
 * that consumed nothing are present with the value `undefined`.
 */
export type ParsedArgs = Map<string, ArgumentValue | undefined>;

export function matchPattern(
	elements: readonly PatternElement[],
	tokens: readonly string[]
): ParsedArgs | undefined {
	const args: ParsedArgs = new Map();
	let index = 0;

	for (const element of elements) {
		const token = index < tokens.length ? tokens[index] : undefined;

		if (element.kind === "literal") {
			if (token !== element.word) return undefined;
			index++;
			continue;
		}

		if (token !== undefined && element.type.isValid(token)) {
			args.set(element.name, element.type.convert(token));
			index++;
		} else if (element.optional) {
			args.set(element.name, undefined);
		} else {
			return undefined;
		}
	}

	if (index !== tokens.length) return undefined;
	return args;
}
