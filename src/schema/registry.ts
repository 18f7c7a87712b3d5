/**
 * Registry of record definitions keyed by their type tag.
 *
 * Loads serialized records whose definition is only known from the data,
 * such as a file holding one of several record kinds.
 *
 * @example
 * ```typescript
 * const records = new RecordRegistry([Sword, Shield]);
 * const item = records.loads({ type: "shield", armor: 4 });
 * item.definition === Shield; // true
 * ```
 *
 * @module schema/registry
 */

import logger from "../logger.js";
import { SchemaError, ValidationError } from "../errors.js";
import { isPlainObject } from "../utils/object.js";
import type { RecordDefinition, SchemaRecord } from "./record.js";

export class RecordRegistry {
	private definitions = new Map<string, RecordDefinition>();

	constructor(definitions: Iterable<RecordDefinition> = []) {
		for (const definition of definitions) this.register(definition);
	}

	/**
	 * @throws {SchemaError} DUPLICATE_KIND when another definition uses the kind
	 */
	register(definition: RecordDefinition): void {
		if (this.definitions.has(definition.kind)) {
			throw new SchemaError(
				"DUPLICATE_KIND",
				`Record kind '${definition.kind}' is already registered`,
				{ kind: definition.kind }
			);
		}
		this.definitions.set(definition.kind, definition);
		logger.debug(`Registered record kind '${definition.kind}'`);
	}

	get(kind: string): RecordDefinition | undefined {
		return this.definitions.get(kind);
	}

	has(kind: string): boolean {
		return this.definitions.has(kind);
	}

	kinds(): string[] {
		return [...this.definitions.keys()];
	}

	/**
	 * Load serialized data with the definition its type tag names.
	 *
	 * @throws {ValidationError} NOT_A_MAPPING or MISSING_TYPE_TAG
	 * @throws {SchemaError} UNKNOWN_KIND when no definition uses the tag
	 */
	loads(data: unknown): SchemaRecord {
		if (!isPlainObject(data)) {
			throw new ValidationError("NOT_A_MAPPING", "Expected a mapping of record data");
		}
		if (!Object.hasOwn(data, "type")) {
			throw new ValidationError(
				"MISSING_TYPE_TAG",
				"Type tag missing from record data"
			);
		}
		const kind = String(data.type);
		const definition = this.definitions.get(kind);
		if (!definition) {
			throw new SchemaError(
				"UNKNOWN_KIND",
				`No record definition for type tag '${kind}'`,
				{ kind }
			);
		}
		return definition.loads(data);
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
				`Rejected record data: ${error instanceof Error ? error.message : String(error)}`
			);
			return false;
		}
	}
}
