/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for reading engine configuration.
 * The CONFIG object is updated by `loadConfig()` in package/config.
 *
 * @module registry/config
 */

export { READONLY_CONFIG as CONFIG };

/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

export type CommandsConfig = {
	/** Log a warning when an earlier pattern makes a later one unreachable */
	check_coverage: boolean;
};

export type RecordsConfig = {
	/** Serialize fields even when they hold their default value */
	dump_defaults: boolean;
};

export type Config = {
	commands: CommandsConfig;
	records: RecordsConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	commands: {
		check_coverage: true,
	},
	records: {
		dump_defaults: false,
	},
} as const;

// make a copy of the default, don't reference it directly
const CONFIG: Config = {
	commands: { ...CONFIG_DEFAULT.commands },
	records: { ...CONFIG_DEFAULT.records },
};

const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Replace the active configuration.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.commands = { ...config.commands };
	CONFIG.records = { ...config.records };
}

/**
 * Restore the built-in defaults.
 */
export function resetConfig() {
	setConfig({
		commands: { ...CONFIG_DEFAULT.commands },
		records: { ...CONFIG_DEFAULT.records },
	});
}
