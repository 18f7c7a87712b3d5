/**
 * Schema records: declarative, typed, self-validating data.
 *
 * A record definition lists its fields in order. Instances are built from
 * positional and named arguments (checked against the field types and
 * validators) or loaded from serialized mappings that carry the record's
 * type tag.
 *
 * Serialized form
 * - A flat mapping with the reserved `type` entry holding the definition's
 *   `kind`, plus one entry per field
 * - Fields equal to their default are left out unless dump-defaults is on
 *   (per call, then per definition, then `records.dump_defaults` in config)
 *
 * @example
 * ```typescript
 * const Sword = defineRecord({
 *   name: "Sword",
 *   fields: [
 *     field("name", TYPE.string),
 *     field("damage", TYPE.integer),
 *     field("knockback", TYPE.integer, { default: 0 }),
 *     field("lores", TYPE.list(TYPE.string), { defaultFactory: () => [] }),
 *   ],
 * });
 *
 * const errata = Sword.create(["Errata", 133]);
 * errata.dumps(); // { type: "sword", name: "Errata", damage: 133 }
 * Sword.loads({ type: "sword", name: "Byakko", damage: 100 }).getNumber("damage"); // 100
 * ```
 *
 * @module schema/record
 */

import { isDeepStrictEqual } from "util";
import logger from "../logger.js";
import { CONFIG } from "../registry/config.js";
import { SchemaError, ValidationError } from "../errors.js";
import { isIdentifier, toSnakeCase } from "../utils/string.js";
import { isPlainObject } from "../utils/object.js";
import type { Field } from "./field.js";
import {
	describeType,
	isScalar,
	matchesType,
	type DumpOptions,
	type FieldValue,
	type PlainMap,
} from "./type-descriptor.js";

export interface RecordOptions {
	/** Display name, used in messages and `toString()`. */
	name: string;
	/** Type tag written to the `type` entry. Defaults to snake_case of `name`. */
	kind?: string;
	fields: readonly Field[];
	/** Serialize fields even when they hold their default value. */
	dumpDefaults?: boolean;
}

/** Kinds are a single non-empty word. */
const KIND_REGEX = /^\S+$/;

function describeValue(value: unknown): string {
	if (value instanceof SchemaRecord) return value.toString();
	if (value === undefined) return "undefined";
	if (typeof value === "function") return "a function";
	if (typeof value === "bigint") return `${value}n`;
	return JSON.stringify(value) ?? String(value);
}

function formatValue(value: FieldValue): string {
	if (value instanceof SchemaRecord || isScalar(value)) {
		return describeValue(value);
	}
	if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
	const entries = Object.entries(value).map(
		([key, item]) => `${key}: ${formatValue(item)}`
	);
	return `{${entries.join(", ")}}`;
}

/**
 * A record type: its name, type tag and ordered fields.
 *
 * Build one with {@link defineRecord}.
 */
export class RecordDefinition {
	readonly name: string;
	readonly kind: string;
	readonly fields: readonly Field[];
	readonly dumpDefaults?: boolean;
	private byName = new Map<string, Field>();

	/**
	 * @throws {SchemaError} INVALID_NAME, INVALID_KIND, DUPLICATE_FIELD or
	 * REQUIRED_AFTER_OPTIONAL
	 */
	constructor(options: RecordOptions) {
		if (!isIdentifier(options.name)) {
			throw new SchemaError(
				"INVALID_NAME",
				`Record name must be an identifier, not '${options.name}'`,
				{ record: options.name }
			);
		}
		const kind = options.kind ?? toSnakeCase(options.name);
		if (!KIND_REGEX.test(kind)) {
			throw new SchemaError(
				"INVALID_KIND",
				`Record kind must be a single word, not '${kind}'`,
				{ record: options.name, kind }
			);
		}

		let seenOptional = false;
		for (const field of options.fields) {
			if (this.byName.has(field.name)) {
				throw new SchemaError(
					"DUPLICATE_FIELD",
					`${options.name} contains multiple fields named '${field.name}'`,
					{ record: options.name, field: field.name }
				);
			}
			if (seenOptional && !field.optional) {
				throw new SchemaError(
					"REQUIRED_AFTER_OPTIONAL",
					`Field without a default follows a field with a default: '${field.name}'`,
					{ record: options.name, field: field.name }
				);
			}
			seenOptional ||= field.optional;
			this.byName.set(field.name, field);
		}

		this.name = options.name;
		this.kind = kind;
		this.fields = Object.freeze([...options.fields]);
		this.dumpDefaults = options.dumpDefaults;
	}

	field(name: string): Field | undefined {
		return this.byName.get(name);
	}

	isInstance(value: unknown): value is SchemaRecord {
		return value instanceof SchemaRecord && value.definition === this;
	}

	/**
	 * Type-check and validate a value for one of the fields.
	 *
	 * @throws {ValidationError} WRONG_TYPE or INVALID_VALUE
	 */
	checkValue(field: Field, value: unknown): FieldValue {
		if (!matchesType(value, field.type)) {
			throw new ValidationError(
				"WRONG_TYPE",
				`Expected ${describeType(field.type)} for field '${field.name}' of ${this.name}, got ${describeValue(value)}`,
				{ record: this.name, field: field.name }
			);
		}
		if (!field.validate(value)) {
			throw new ValidationError(
				"INVALID_VALUE",
				`Invalid value for field '${field.name}' of ${this.name}: ${describeValue(value)}`,
				{ record: this.name, field: field.name }
			);
		}
		return value;
	}

	/**
	 * Build an instance. Positional values bind fields in declaration order,
	 * named values bind fields by name, and unbound optional fields get a
	 * fresh default.
	 *
	 * @throws {ValidationError} TOO_MANY_ARGUMENTS, WRONG_TYPE, INVALID_VALUE,
	 * UNEXPECTED_ARGUMENT, DUPLICATE_ARGUMENT or MISSING_ARGUMENT
	 */
	create(
		positional: readonly unknown[] = [],
		named: Readonly<Record<string, unknown>> = {}
	): SchemaRecord {
		const given = positional.length + Object.keys(named).length;
		if (given > this.fields.length) {
			throw new ValidationError(
				"TOO_MANY_ARGUMENTS",
				`${this.name}() takes at most ${this.fields.length} arguments (${given} given)`,
				{ record: this.name }
			);
		}

		const values = new Map<string, FieldValue>();
		positional.forEach((value, index) => {
			const field = this.fields[index];
			values.set(field.name, this.checkValue(field, value));
		});

		for (const [name, value] of Object.entries(named)) {
			const field = this.byName.get(name);
			if (!field) {
				throw new ValidationError(
					"UNEXPECTED_ARGUMENT",
					`${this.name}() got an unexpected argument '${name}'`,
					{ record: this.name, field: name }
				);
			}
			if (values.has(name)) {
				throw new ValidationError(
					"DUPLICATE_ARGUMENT",
					`${this.name}() got multiple values for argument '${name}'`,
					{ record: this.name, field: name }
				);
			}
			values.set(name, this.checkValue(field, value));
		}

		this.fields.forEach((field, index) => {
			if (values.has(field.name)) return;
			if (!field.optional) {
				throw new ValidationError(
					"MISSING_ARGUMENT",
					`${this.name}() missing required argument '${field.name}' (pos ${index + 1})`,
					{ record: this.name, field: field.name, position: index + 1 }
				);
			}
			values.set(field.name, field.defaultValue());
		});

		const ordered = new Map<string, FieldValue>();
		for (const field of this.fields) {
			const value = values.get(field.name);
			if (value !== undefined) ordered.set(field.name, value);
		}
		return new SchemaRecord(this, ordered);
	}

	/**
	 * Shorthand for `create([], named)`.
	 */
	from(named: Readonly<Record<string, unknown>>): SchemaRecord {
		return this.create([], named);
	}

	/**
	 * Build an instance from its serialized form.
	 *
	 * Entries that name no field are ignored. Missing optional fields get
	 * their default; the loaded values then go through the same checks as
	 * {@link create}.
	 *
	 * @throws {ValidationError} NOT_A_MAPPING, MISSING_TYPE_TAG,
	 * TYPE_TAG_MISMATCH, MISSING_FIELD, or any error of `create()`
	 */
	loads(data: unknown): SchemaRecord {
		if (!isPlainObject(data)) {
			throw new ValidationError(
				"NOT_A_MAPPING",
				`Expected a mapping for ${this.name}, got ${describeValue(data)}`,
				{ record: this.name }
			);
		}
		if (!Object.hasOwn(data, "type")) {
			throw new ValidationError(
				"MISSING_TYPE_TAG",
				`Type tag missing from ${this.name} data`,
				{ record: this.name }
			);
		}
		if (data.type !== this.kind) {
			throw new ValidationError(
				"TYPE_TAG_MISMATCH",
				`Expected type tag '${this.kind}', got ${describeValue(data.type)}`,
				{ record: this.name, expected: this.kind }
			);
		}

		const values = this.fields.map((field) => {
			if (Object.hasOwn(data, field.name)) return field.load(data[field.name]);
			if (field.optional) return field.defaultValue();
			throw new ValidationError(
				"MISSING_FIELD",
				`Field '${field.name}' not found in ${this.name} data`,
				{ record: this.name, field: field.name }
			);
		});
		const record = this.create(values);
		logger.debug(`Loaded ${this.kind} record`);
		return record;
	}

	/**
	 * Whether {@link loads} would accept `data`.
	 */
	isValid(data: unknown): boolean {
		try {
			this.loads(data);
			return true;
		} catch (error) {
			logger.debug(
				`Rejected ${this.name} data: ${error instanceof Error ? error.message : String(error)}`
			);
			return false;
		}
	}
}

/**
 * Declare a record type.
 *
 * @throws {SchemaError} When the definition breaks a field ordering or naming
 * rule
 */
export function defineRecord(options: RecordOptions): RecordDefinition {
	return new RecordDefinition(options);
}

/**
 * One value of a record definition. Build instances through the definition
 * (`create()`, `from()` or `loads()`), never directly.
 */
export class SchemaRecord {
	readonly definition: RecordDefinition;
	private readonly fieldValues: Map<string, FieldValue>;

	constructor(definition: RecordDefinition, values: Map<string, FieldValue>) {
		this.definition = definition;
		this.fieldValues = values;
	}

	get kind(): string {
		return this.definition.kind;
	}

	private requireField(name: string): Field {
		const field = this.definition.field(name);
		if (!field) {
			throw new ValidationError(
				"UNKNOWN_FIELD",
				`${this.definition.name} has no field '${name}'`,
				{ record: this.definition.name, field: name }
			);
		}
		return field;
	}

	get(name: string): FieldValue {
		const field = this.requireField(name);
		const value = this.fieldValues.get(field.name);
		// every declared field is bound at construction
		return value === undefined ? null : value;
	}

	private wrongType(name: string, expected: string): ValidationError {
		return new ValidationError(
			"WRONG_TYPE",
			`Field '${name}' of ${this.definition.name} is not a ${expected}`,
			{ record: this.definition.name, field: name }
		);
	}

	getString(name: string): string {
		const value = this.get(name);
		if (typeof value !== "string") throw this.wrongType(name, "string");
		return value;
	}

	getNumber(name: string): number {
		const value = this.get(name);
		if (typeof value !== "number") throw this.wrongType(name, "number");
		return value;
	}

	getBoolean(name: string): boolean {
		const value = this.get(name);
		if (typeof value !== "boolean") throw this.wrongType(name, "boolean");
		return value;
	}

	getList(name: string): FieldValue[] {
		const value = this.get(name);
		if (!Array.isArray(value)) throw this.wrongType(name, "list");
		return value;
	}

	getRecord(name: string): SchemaRecord {
		const value = this.get(name);
		if (!(value instanceof SchemaRecord)) throw this.wrongType(name, "record");
		return value;
	}

	/**
	 * Replace the value of a field, with the same checks as construction.
	 *
	 * @throws {ValidationError} UNKNOWN_FIELD, WRONG_TYPE or INVALID_VALUE
	 */
	set(name: string, value: unknown): void {
		const field = this.requireField(name);
		this.fieldValues.set(name, this.definition.checkValue(field, value));
	}

	/** Field values by name, in declaration order. */
	values(): Record<string, FieldValue> {
		return Object.fromEntries(this.fieldValues);
	}

	/**
	 * Serialize to a flat mapping tagged with the record's kind.
	 */
	dumps(options: DumpOptions = {}): PlainMap {
		const dumpDefaults =
			options.dumpDefaults ??
			this.definition.dumpDefaults ??
			CONFIG.records.dump_defaults;
		const result: PlainMap = { type: this.kind };
		for (const field of this.definition.fields) {
			const dumped = field.dump(this.get(field.name), options);
			if (
				!dumpDefaults &&
				field.optional &&
				isDeepStrictEqual(dumped, field.dump(field.defaultValue(), options))
			) {
				continue;
			}
			result[field.name] = dumped;
		}
		return result;
	}

	/**
	 * Whether both records have the same definition and field values.
	 */
	equals(other: SchemaRecord): boolean {
		return (
			this.definition === other.definition &&
			isDeepStrictEqual(
				this.dumps({ dumpDefaults: true }),
				other.dumps({ dumpDefaults: true })
			)
		);
	}

	toString(): string {
		const fields = this.definition.fields.map(
			(field) => `${field.name}=${formatValue(this.get(field.name))}`
		);
		return `${this.definition.name}(${fields.join(", ")})`;
	}
}
