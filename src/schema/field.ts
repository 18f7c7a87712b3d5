/**
 * Field declarations for schema records.
 *
 * A field names one value of a record, the type it must have and, for
 * optional fields, where its default comes from. Fields with a `default` or a
 * `defaultFactory` are optional; all others are required.
 *
 * @example
 * ```typescript
 * const fields = [
 *   field("name", TYPE.string),
 *   field("damage", TYPE.integer, { validator: (value) => value !== 0 }),
 *   field("knockback", TYPE.integer, { default: 0 }),
 *   field("lores", TYPE.list(TYPE.string), { defaultFactory: () => [] }),
 * ];
 * ```
 *
 * @module schema/field
 */

import { SchemaError } from "../errors.js";
import { isIdentifier } from "../utils/string.js";
import {
	dumpValue,
	isScalar,
	loadValue,
	type DumpOptions,
	type FieldValue,
	type PlainData,
	type TypeDescriptor,
} from "./type-descriptor.js";

/**
 * Names used by records themselves: the serialized type tag and the
 * attributes of a definition.
 */
export const RESERVED_FIELD_NAMES: readonly string[] = [
	"type",
	"kind",
	"fields",
	"dumpDefaults",
];

export interface FieldOptions {
	/**
	 * Default for an optional field. Must be a string, number, boolean or
	 * null; use `defaultFactory` for lists, maps and records.
	 */
	default?: FieldValue;
	/** Builds a fresh default every time one is needed. */
	defaultFactory?: () => FieldValue;
	/** Extra check run after the type check. */
	validator?: (value: FieldValue) => boolean;
	/** Converts serialized data into the field's value. */
	load?: (data: unknown) => unknown;
	/** Converts the field's value into serialized data. */
	dump?: (value: FieldValue) => PlainData;
}

export class Field {
	readonly name: string;
	readonly type: TypeDescriptor;
	/** Whether the field has a default and may be left unbound. */
	readonly optional: boolean;
	private readonly options: FieldOptions;

	/**
	 * @throws {SchemaError} INVALID_NAME, RESERVED_NAME, DEFAULT_CONFLICT or
	 * MUTABLE_DEFAULT
	 */
	constructor(name: string, type: TypeDescriptor, options: FieldOptions = {}) {
		options = { ...options };
		if (!isIdentifier(name)) {
			throw new SchemaError(
				"INVALID_NAME",
				`Field name must contain only letters, non-leading digits and underscores, not '${name}'`,
				{ field: name }
			);
		}
		if (RESERVED_FIELD_NAMES.includes(name)) {
			throw new SchemaError(
				"RESERVED_NAME",
				`Field name '${name}' is reserved for records`,
				{ field: name }
			);
		}

		const hasDefault = options.default !== undefined;
		const hasFactory = options.defaultFactory !== undefined;
		if (hasDefault && hasFactory) {
			throw new SchemaError(
				"DEFAULT_CONFLICT",
				`Field '${name}' declares both default and defaultFactory`,
				{ field: name }
			);
		}
		if (hasDefault && !isScalar(options.default)) {
			throw new SchemaError(
				"MUTABLE_DEFAULT",
				`Field '${name}' has a mutable default; use defaultFactory instead`,
				{ field: name }
			);
		}

		this.name = name;
		this.type = type;
		this.optional = hasDefault || hasFactory;
		this.options = options;
	}

	/**
	 * The default of an optional field, built fresh when it comes from a
	 * factory.
	 *
	 * @throws {SchemaError} NO_DEFAULT for required fields
	 */
	defaultValue(): FieldValue {
		const { default: literal, defaultFactory } = this.options;
		if (defaultFactory) return defaultFactory();
		if (literal !== undefined) return literal;
		throw new SchemaError(
			"NO_DEFAULT",
			`Field '${this.name}' has no default value`,
			{ field: this.name }
		);
	}

	validate(value: FieldValue): boolean {
		return this.options.validator ? this.options.validator(value) : true;
	}

	load(data: unknown): unknown {
		return this.options.load
			? this.options.load(data)
			: loadValue(data, this.type);
	}

	dump(value: FieldValue, options?: DumpOptions): PlainData {
		return this.options.dump
			? this.options.dump(value)
			: dumpValue(value, options);
	}
}

/**
 * Shorthand for `new Field(name, type, options)`.
 */
export function field(
	name: string,
	type: TypeDescriptor,
	options?: FieldOptions
): Field {
	return new Field(name, type, options);
}
