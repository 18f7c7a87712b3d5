/**
 * Type descriptors for schema record fields.
 *
 * A descriptor is a small immutable value describing what a field may hold.
 * Descriptors compose, and a single recursive matcher checks values against
 * them:
 *
 * - `TYPE.string`, `TYPE.number`, `TYPE.integer`, `TYPE.boolean`, `TYPE.null`
 * - `TYPE.any` - any field value
 * - `TYPE.literal(value)` - exactly one scalar value
 * - `TYPE.list(of)` - array whose items match `of`
 * - `TYPE.map(of)` - string-keyed mapping whose values match `of`
 * - `TYPE.union(...of)` - any of the variants
 * - `TYPE.record(definition)` - an instance of a record definition
 * - `TYPE.optional(of)` - shorthand for `TYPE.union(of, TYPE.null)`
 *
 * @example
 * ```typescript
 * const lores = TYPE.list(TYPE.string);
 * matchesType(["It was worth the wait."], lores); // true
 * matchesType([1, 2], lores);                      // false
 * describeType(TYPE.optional(TYPE.integer));        // "integer | null"
 * ```
 *
 * @module schema/type-descriptor
 */

import { SchemaRecord, type RecordDefinition } from "./record.js";
import { isPlainObject } from "../utils/object.js";

export type Scalar = string | number | boolean | null;

/** Serialized data: what `dumps()` produces and `loads()` accepts. */
export type PlainData = Scalar | PlainData[] | PlainMap;

export interface PlainMap {
	[key: string]: PlainData;
}

/** Anything a record field can hold. */
export type FieldValue = Scalar | SchemaRecord | FieldValue[] | FieldMap;

export interface FieldMap {
	[key: string]: FieldValue;
}

export type ScalarName =
	| "string"
	| "number"
	| "integer"
	| "boolean"
	| "null"
	| "any";

export interface ScalarDescriptor {
	readonly kind: "scalar";
	readonly name: ScalarName;
}

export interface LiteralDescriptor {
	readonly kind: "literal";
	readonly value: Scalar;
}

export interface ListDescriptor {
	readonly kind: "list";
	readonly of: TypeDescriptor;
}

export interface MapDescriptor {
	readonly kind: "map";
	readonly of: TypeDescriptor;
}

export interface UnionDescriptor {
	readonly kind: "union";
	readonly of: readonly TypeDescriptor[];
}

export interface RecordDescriptor {
	readonly kind: "record";
	readonly definition: RecordDefinition;
}

export type TypeDescriptor =
	| ScalarDescriptor
	| LiteralDescriptor
	| ListDescriptor
	| MapDescriptor
	| UnionDescriptor
	| RecordDescriptor;

function scalar(name: ScalarName): ScalarDescriptor {
	return Object.freeze({ kind: "scalar", name });
}

function union(...of: TypeDescriptor[]): UnionDescriptor {
	return Object.freeze({ kind: "union", of: Object.freeze(of) });
}

/**
 * Descriptor builders.
 */
export const TYPE = Object.freeze({
	string: scalar("string"),
	number: scalar("number"),
	integer: scalar("integer"),
	boolean: scalar("boolean"),
	null: scalar("null"),
	any: scalar("any"),
	literal(value: Scalar): LiteralDescriptor {
		return Object.freeze({ kind: "literal", value });
	},
	list(of: TypeDescriptor): ListDescriptor {
		return Object.freeze({ kind: "list", of });
	},
	map(of: TypeDescriptor): MapDescriptor {
		return Object.freeze({ kind: "map", of });
	},
	union,
	record(definition: RecordDefinition): RecordDescriptor {
		return Object.freeze({ kind: "record", definition });
	},
	optional(of: TypeDescriptor): UnionDescriptor {
		return union(of, scalar("null"));
	},
});

export function isScalar(value: unknown): value is Scalar {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	);
}

export function isPlainData(value: unknown): value is PlainData {
	if (isScalar(value)) return true;
	if (Array.isArray(value)) return value.every(isPlainData);
	if (isPlainObject(value)) return Object.values(value).every(isPlainData);
	return false;
}

export function isFieldValue(value: unknown): value is FieldValue {
	if (isScalar(value) || value instanceof SchemaRecord) return true;
	if (Array.isArray(value)) return value.every(isFieldValue);
	if (isPlainObject(value)) return Object.values(value).every(isFieldValue);
	return false;
}

function matchesScalar(value: unknown, name: ScalarName): boolean {
	switch (name) {
		case "string":
			return typeof value === "string";
		case "number":
			return typeof value === "number";
		case "integer":
			return Number.isInteger(value);
		case "boolean":
			return typeof value === "boolean";
		case "null":
			return value === null;
		case "any":
			return isFieldValue(value);
	}
}

/**
 * Whether `value` fits `descriptor`.
 */
export function matchesType(
	value: unknown,
	descriptor: TypeDescriptor
): value is FieldValue {
	switch (descriptor.kind) {
		case "scalar":
			return matchesScalar(value, descriptor.name);
		case "literal":
			return value === descriptor.value;
		case "list":
			return (
				Array.isArray(value) &&
				value.every((item) => matchesType(item, descriptor.of))
			);
		case "map":
			return (
				isPlainObject(value) &&
				Object.values(value).every((item) => matchesType(item, descriptor.of))
			);
		case "union":
			return descriptor.of.some((variant) => matchesType(value, variant));
		case "record":
			return descriptor.definition.isInstance(value);
	}
}

/**
 * Readable name of a descriptor, used in error messages.
 */
export function describeType(descriptor: TypeDescriptor): string {
	switch (descriptor.kind) {
		case "scalar":
			return descriptor.name;
		case "literal":
			return JSON.stringify(descriptor.value);
		case "list":
			return `list<${describeType(descriptor.of)}>`;
		case "map":
			return `map<${describeType(descriptor.of)}>`;
		case "union":
			return descriptor.of.map(describeType).join(" | ");
		case "record":
			return descriptor.definition.name;
	}
}

/**
 * Whether serialized `data` has the shape `descriptor` loads from. Records
 * are recognized by their type tag.
 */
function matchesSerialized(data: unknown, descriptor: TypeDescriptor): boolean {
	switch (descriptor.kind) {
		case "record":
			return (
				isPlainObject(data) && data.type === descriptor.definition.kind
			);
		case "list":
			return (
				Array.isArray(data) &&
				data.every((item) => matchesSerialized(item, descriptor.of))
			);
		case "map":
			return (
				isPlainObject(data) &&
				Object.values(data).every((item) =>
					matchesSerialized(item, descriptor.of)
				)
			);
		case "union":
			return descriptor.of.some((variant) =>
				matchesSerialized(data, variant)
			);
		default:
			return matchesType(data, descriptor);
	}
}

function mapValues(
	data: Record<string, unknown>,
	convert: (item: unknown) => unknown
): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, item] of Object.entries(data)) result[key] = convert(item);
	return result;
}

/**
 * Turn serialized data into field values as directed by `descriptor`.
 *
 * Plain data passes through unchanged; mappings in record position are
 * loaded through their definition's `loads()`. For unions the first variant
 * whose serialized shape fits is used. Data that fits nowhere is returned
 * as-is for the caller's type check to reject.
 */
export function loadValue(data: unknown, descriptor: TypeDescriptor): unknown {
	switch (descriptor.kind) {
		case "record":
			return isPlainObject(data) ? descriptor.definition.loads(data) : data;
		case "list":
			return Array.isArray(data)
				? data.map((item) => loadValue(item, descriptor.of))
				: data;
		case "map":
			return isPlainObject(data)
				? mapValues(data, (item) => loadValue(item, descriptor.of))
				: data;
		case "union": {
			const variant = descriptor.of.find((candidate) =>
				matchesSerialized(data, candidate)
			);
			return variant ? loadValue(data, variant) : data;
		}
		default:
			return data;
	}
}

export interface DumpOptions {
	/** Serialize fields even when they hold their default value. */
	dumpDefaults?: boolean;
}

/**
 * Turn a field value into serialized data. Records are dumped through their
 * own `dumps()`, everything else is copied as plain data.
 */
export function dumpValue(value: FieldValue, options: DumpOptions = {}): PlainData {
	if (value instanceof SchemaRecord) return value.dumps(options);
	if (Array.isArray(value)) return value.map((item) => dumpValue(item, options));
	if (isScalar(value)) return value;
	const result: PlainMap = {};
	for (const [key, item] of Object.entries(value)) {
		result[key] = dumpValue(item, options);
	}
	return result;
}
