/**
 * Input tokenizer for the command engine.
 *
 * Splits a line of user input on unquoted whitespace. Quoted runs keep their
 * interior whitespace and lose the quote characters; a backslash escapes the
 * next character. Malformed input never throws: an unterminated quote runs to
 * the end of the line and a trailing backslash is dropped.
 *
 * @example
 * ```typescript
 * tokenize('say "hello \\"world\\""'); // ["say", 'hello "world"']
 * tokenize("give 'old sword' bob");    // ["give", "old sword", "bob"]
 * ```
 *
 * @module tokenize
 */

const QUOTE_CHARACTERS = new Set(["'", '"']);
const ESCAPE_CHARACTER = "\\";

export function tokenize(text: string): string[] {
	const tokens: string[] = [];
	let buffer = "";
	let quote: string | undefined;
	let escaped = false;

	for (const ch of text) {
		if (escaped) {
			buffer += ch;
			escaped = false;
			continue;
		}
		if (ch === ESCAPE_CHARACTER) {
			escaped = true;
			continue;
		}
		if (quote !== undefined) {
			if (ch === quote) quote = undefined;
			else buffer += ch;
			continue;
		}
		if (QUOTE_CHARACTERS.has(ch)) {
			quote = ch;
			continue;
		}
		if (/\s/.test(ch)) {
			if (buffer) {
				tokens.push(buffer);
				buffer = "";
			}
			continue;
		}
		buffer += ch;
	}

	if (buffer) tokens.push(buffer);
	return tokens;
}
