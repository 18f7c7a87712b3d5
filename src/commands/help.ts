/**
 * Help command listing the registered commands.
 *
 * Without an argument, lists every command of the registry by name. With a
 * command name, shows the patterns of that command followed by its
 * description.
 *
 * @example
 * ```
 * help        // lists the available commands
 * help set    // shows the patterns and description of "set"
 * ```
 *
 * **Pattern:** `help [command:str]`
 * @module commands/help
 */

import type {
	Command,
	CommandObject,
	CommandRegistry,
	HelpResult,
} from "../command.js";

export const HELP_DESCRIPTION =
	"List the available commands or show help for command if specified.";

/**
 * Text shown for `help` without an argument.
 */
export function formatCommandList<C>(commands: readonly Command<C>[]): string {
	const names = commands.map((command) => command.name).sort();
	return [
		"Available commands:",
		...names.map((name) => `- ${name}`),
		"",
		"Type 'help <command>' for details.",
	].join("\n");
}

/**
 * Text shown for `help <command>`.
 */
export function formatCommandHelp<C>(command: Command<C>): string {
	const lines = [
		`Help for command '${command.name}':`,
		...command.patterns.map((pattern) => `- ${pattern.source}`),
	];
	if (command.description) lines.push("", command.description);
	return lines.join("\n");
}

/**
 * Build the help command for a registry. The command reads the registry at
 * execution time, so it lists commands registered after it.
 */
export function createHelpCommand<C>(
	registry: CommandRegistry<C>
): CommandObject<C> {
	return {
		name: "help",
		patterns: ["help [command:str]"],
		description: HELP_DESCRIPTION,
		execute(_context, args): HelpResult {
			const name = args.get("command");
			if (name === undefined) {
				return {
					type: "help",
					content: formatCommandList(registry.getCommands()),
				};
			}

			const command = registry.getCommand(String(name));
			if (!command) {
				return { type: "help", content: `No such command '${name}'` };
			}
			return { type: "help", content: formatCommandHelp(command) };
		},
	};
}
