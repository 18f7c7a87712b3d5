/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml` (or the given path)
 * - Merges only known keys with the expected type; unknown keys are ignored
 * - If the file does not exist, writes `CONFIG_DEFAULT` to disk atomically
 * - A file that exists but cannot be parsed is an error
 *
 * @example
 * import { loadConfig } from "./package/config.js";
 * import { CONFIG } from "./registry/config.js";
 * await loadConfig();
 * console.log(CONFIG.commands.check_coverage);
 *
 * @module package/config
 */
import { readFile, writeFile, rename, unlink, mkdir } from "fs/promises";
import { dirname } from "path";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getDataPath } from "../utils/path.js";
import { isPlainObject } from "../utils/object.js";
import { CONFIG_DEFAULT, setConfig, type Config } from "../registry/config.js";

export const CONFIG_PATH = getDataPath("config.yaml");

function readBoolean(
	section: Record<string, unknown>,
	sectionName: string,
	key: string,
	fallback: boolean
): boolean {
	if (!Object.hasOwn(section, key)) return fallback;
	const value = section[key];
	if (typeof value !== "boolean") {
		logger.warn(
			`Ignoring ${sectionName}.${key}: expected a boolean, got ${JSON.stringify(value)}`
		);
		return fallback;
	}
	if (value === fallback) logger.debug(`DEFAULT ${sectionName}.${key} = ${value}`);
	else logger.debug(`Set ${sectionName}.${key} = ${value}`);
	return value;
}

function readSection(
	parsed: Record<string, unknown>,
	name: string
): Record<string, unknown> {
	const section = parsed[name];
	if (section === undefined || section === null) return {};
	if (!isPlainObject(section)) {
		logger.warn(`Ignoring config section '${name}': expected a mapping`);
		return {};
	}
	return section;
}

/**
 * Merge parsed YAML over the defaults, keeping only known keys.
 */
export function mergeConfig(parsed: unknown): Config {
	const source = isPlainObject(parsed) ? parsed : {};
	for (const key of Object.keys(source)) {
		if (!(key in CONFIG_DEFAULT)) logger.debug(`Ignoring unknown config section '${key}'`);
	}

	const commands = readSection(source, "commands");
	const records = readSection(source, "records");
	return {
		commands: {
			check_coverage: readBoolean(
				commands,
				"commands",
				"check_coverage",
				CONFIG_DEFAULT.commands.check_coverage
			),
		},
		records: {
			dump_defaults: readBoolean(
				records,
				"records",
				"dump_defaults",
				CONFIG_DEFAULT.records.dump_defaults
			),
		},
	};
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first, then atomically rename
		await writeFile(tempPath, defaultContent, "utf-8");
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
		});
		throw writeError;
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load the configuration file into `CONFIG` and return the merged result.
 */
export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
	logger.debug(`Loading config from ${path}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await writeDefaultConfig(path);
		const config = mergeConfig(undefined);
		setConfig(config);
		return config;
	}

	const config = mergeConfig(YAML.load(content));
	setConfig(config);
	logger.info("Config loaded successfully");
	return config;
}
