import { join } from "path";

/**
 * Returns the directory runtime files (logs, data) are resolved against.
 * Prefers the `PARLANCE_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const rootDir = process.env.PARLANCE_ROOT;

	if (rootDir) {
		return rootDir;
	}

	return process.cwd();
}

/**
 * Resolve a path inside the `data` directory of the runtime root.
 */
export function getDataPath(...segments: string[]): string {
	return join(getSafeRootDirectory(), "data", ...segments);
}

/**
 * Resolve a path inside the `logs` directory of the runtime root.
 */
export function getLogPath(...segments: string[]): string {
	return join(getSafeRootDirectory(), "logs", ...segments);
}
