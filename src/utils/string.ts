/**
 * String helpers shared by the command engine and schema records.
 */

/**
 * Convert a display name into the snake_case form used for record type tags.
 *
 * Spaces and hyphens become underscores, and word boundaries inside
 * camelCase / PascalCase names are split, keeping acronyms together.
 *
 * @example
 * ```typescript
 * toSnakeCase("PlayerProfile") // "player_profile"
 * toSnakeCase("camelCaseString") // "camel_case_string"
 * toSnakeCase("some mixed_string") // "some_mixed_string"
 * toSnakeCase("HTTPRequest") // "http_request"
 * ```
 */
export function toSnakeCase(name: string): string {
	return name
		.replace(/[- ]/g, "_")
		.replace(/([^_])([A-Z][a-z]+)/g, "$1_$2")
		.replace(/([a-z0-9])([A-Z])/g, "$1_$2")
		.toLowerCase();
}

/**
 * Whether `name` is a valid identifier for slots and fields
 * (letters, digits and underscores, not starting with a digit).
 */
export function isIdentifier(name: string): boolean {
	return /^[A-Za-z_]\w*$/.test(name);
}
