/**
 * Whether `value` is a plain mapping (an object literal or a null-prototype
 * object), as produced by YAML/JSON parsers.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}
