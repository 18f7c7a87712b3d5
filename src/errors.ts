/**
 * Error types raised by the command engine and the schema record system.
 *
 * Every error carries a stable `code` so callers can react to the rule that
 * was broken without parsing messages.
 *
 * - `PatternError`: a command pattern or argument type declaration is malformed
 * - `CommandError`: the command registry was misused (duplicate names, ...)
 * - `SchemaError`: a field or record definition is malformed
 * - `ValidationError`: data handed to a record does not fit its definition
 *
 * Matching a line of input that no pattern accepts is not an error; see
 * `CommandRegistry.dispatch()`.
 *
 * @module errors
 */

export type PatternErrorCode =
	| "LITERAL_AFTER_SLOT"
	| "REQUIRED_AFTER_OPTIONAL"
	| "DUPLICATE_SLOT"
	| "UNKNOWN_TYPE"
	| "DUPLICATE_TYPE"
	| "EMPTY_PATTERN";

export type CommandErrorCode =
	| "DUPLICATE_COMMAND"
	| "INVALID_COMMAND_NAME"
	| "NO_PATTERNS";

export type SchemaErrorCode =
	| "INVALID_NAME"
	| "RESERVED_NAME"
	| "DEFAULT_CONFLICT"
	| "MUTABLE_DEFAULT"
	| "NO_DEFAULT"
	| "DUPLICATE_FIELD"
	| "REQUIRED_AFTER_OPTIONAL"
	| "INVALID_KIND"
	| "DUPLICATE_KIND"
	| "UNKNOWN_KIND";

export type ValidationErrorCode =
	| "TOO_MANY_ARGUMENTS"
	| "UNEXPECTED_ARGUMENT"
	| "DUPLICATE_ARGUMENT"
	| "MISSING_ARGUMENT"
	| "WRONG_TYPE"
	| "INVALID_VALUE"
	| "NOT_A_MAPPING"
	| "MISSING_TYPE_TAG"
	| "TYPE_TAG_MISMATCH"
	| "MISSING_FIELD"
	| "UNKNOWN_FIELD";

/**
 * Base class for every error this library throws.
 */
export class ParlanceError extends Error {
	constructor(
		public readonly code: string,
		message: string,
		public readonly details?: Record<string, unknown>
	) {
		super(message);
		this.name = "ParlanceError";
		Error.captureStackTrace(this, this.constructor);
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			details: this.details,
		};
	}
}

/**
 * A command pattern or argument type could not be declared.
 */
export class PatternError extends ParlanceError {
	declare readonly code: PatternErrorCode;

	constructor(
		code: PatternErrorCode,
		message: string,
		details?: Record<string, unknown>
	) {
		super(code, message, details);
		this.name = "PatternError";
	}
}

export class CommandError extends ParlanceError {
	declare readonly code: CommandErrorCode;

	constructor(
		code: CommandErrorCode,
		message: string,
		details?: Record<string, unknown>
	) {
		super(code, message, details);
		this.name = "CommandError";
	}
}

/**
 * A field or record definition breaks one of the definition rules.
 */
export class SchemaError extends ParlanceError {
	declare readonly code: SchemaErrorCode;

	constructor(
		code: SchemaErrorCode,
		message: string,
		details?: Record<string, unknown>
	) {
		super(code, message, details);
		this.name = "SchemaError";
	}
}

/**
 * Values handed to a record (arguments, assignments or serialized data)
 * do not fit the record's definition.
 */
export class ValidationError extends ParlanceError {
	declare readonly code: ValidationErrorCode;

	constructor(
		code: ValidationErrorCode,
		message: string,
		details?: Record<string, unknown>
	) {
		super(code, message, details);
		this.name = "ValidationError";
	}
}
