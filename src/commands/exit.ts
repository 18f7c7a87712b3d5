/**
 * Exit command.
 *
 * Signals that the user wants to leave. The command itself does nothing; the
 * application reacts to the `exit` result.
 *
 * @example
 * ```
 * exit
 * quit
 * ```
 *
 * **Patterns:**
 * - `exit`
 * - `quit`
 * @module commands/exit
 */

import type { CommandObject, ExitResult } from "../command.js";

export const EXIT_DESCRIPTION = "Exit the current process.";

export function createExitCommand<C>(): CommandObject<C> {
	return {
		name: "exit",
		patterns: ["exit", "quit"],
		description: EXIT_DESCRIPTION,
		execute(): ExitResult {
			return { type: "exit" };
		},
	};
}
