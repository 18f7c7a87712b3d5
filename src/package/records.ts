/**
 * Package: records - YAML persistence of schema records
 *
 * Writes records as YAML documents holding their `dumps()` mapping and reads
 * them back through a record definition, or through a record registry when
 * the kind is only known from the file.
 *
 * Saving is atomic: the document is written to `<path>.tmp` and renamed over
 * the target, and the temporary file is removed when writing fails.
 *
 * @example
 * ```ts
 * import { saveRecord, loadRecord } from "./package/records.js";
 *
 * await saveRecord(getDataPath("items", "errata.yaml"), errata);
 * const loaded = await loadRecord(getDataPath("items", "errata.yaml"), Sword);
 * loaded.equals(errata); // true
 * ```
 *
 * @module package/records
 */
import { readFile, writeFile, rename, unlink, mkdir } from "fs/promises";
import { dirname } from "path";
import YAML from "js-yaml";
import logger from "../logger.js";
import type { DumpOptions } from "../schema/type-descriptor.js";
import type { RecordDefinition, SchemaRecord } from "../schema/record.js";
import type { RecordRegistry } from "../schema/registry.js";

/** Anything that can turn serialized data into a record. */
export type RecordSource = RecordDefinition | RecordRegistry;

export function serializeRecord(
	record: SchemaRecord,
	options?: DumpOptions
): string {
	return YAML.dump(record.dumps(options), {
		noRefs: true,
		lineWidth: 120,
	});
}

/**
 * Parse a YAML document and load it as a record.
 */
export function deserializeRecord(
	text: string,
	source: RecordSource
): SchemaRecord {
	return source.loads(YAML.load(text));
}

export async function saveRecord(
	path: string,
	record: SchemaRecord,
	options?: DumpOptions
): Promise<void> {
	const content = serializeRecord(record, options);
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first, then atomically rename
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, path);
		logger.debug(`Saved ${record.kind} record to ${path}`);
	} catch (error) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
		});
		logger.error(`Failed to save ${record.kind} record to ${path}: ${error}`);
		throw error;
	}
}

export async function loadRecord(
	path: string,
	source: RecordSource
): Promise<SchemaRecord> {
	const content = await readFile(path, "utf-8");
	const record = deserializeRecord(content, source);
	logger.debug(`Loaded ${record.kind} record from ${path}`);
	return record;
}
