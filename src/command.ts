/**
 * Pattern-based command system.
 *
 * Provides a small framework to declare commands with human-readable patterns,
 * parse user input into typed arguments, and dispatch to the matching command.
 *
 * What you get
 * - `Command`: abstract base class with pattern parsing and an `execute()` hook
 * - `FunctionCommand`: adapts a plain {@link CommandObject} into a `Command`
 * - `CommandRegistry`: register commands and dispatch user input centrally
 * - Result types: `CommandResult`, `HelpResult`, `ExitResult`,
 *   `UnknownCommandResult`
 *
 * Pattern basics
 * - Required slots: `<name>` or `<name:type>`
 * - Optional slots: `[name]` or `[name:type]`
 * - Everything else is a literal word
 * - Built-in types: `int`, `num`, `bool`, `str` (the default)
 *
 * Quick start
 * ```ts
 * import { CommandRegistry } from "./command.js";
 *
 * interface Session { speed: number }
 *
 * const registry = new CommandRegistry<Session>();
 * registry.addCommand({
 *   name: "set",
 *   patterns: ["set speed <speed:num> [sprint:bool]"],
 *   description: "Change how fast you move.",
 *   execute(session, args) {
 *     const speed = args.get("speed");
 *     if (typeof speed === "number") session.speed = speed;
 *     return { type: "ok" };
 *   },
 * });
 *
 * registry.dispatch("set speed 2.5 yes", { speed: 1 }); // { type: "ok" }
 * registry.dispatch("fly", { speed: 1 });
 * // { type: "unknown_command", text: "fly", command: "fly" }
 * ```
 *
 * Notes
 * - Commands are tried in registration order, and each command tries its
 *   patterns in declaration order. The first match wins.
 * - Every registry starts out with the `help` and `exit` commands.
 * - Input no pattern accepts is reported through the result, never thrown.
 *
 * @module command
 */

import { ArgumentTypeRegistry } from "./argument-type.js";
import { CommandPattern } from "./pattern.js";
import type { ParsedArgs } from "./matcher.js";
import {
	findCoverage,
	formatCoverageWarning,
	type CoverageWarning,
} from "./coverage.js";
import { tokenize } from "./tokenize.js";
import { CommandError } from "./errors.js";
import { CONFIG } from "./registry/config.js";
import { createHelpCommand } from "./commands/help.js";
import { createExitCommand } from "./commands/exit.js";
import logger from "./logger.js";

/**
 * Tagged value returned by every command.
 *
 * `type` names the outcome; any other properties are payload the caller can
 * inspect once it has narrowed on `type`.
 */
export type CommandResult = {
	type: string;
	[key: string]: unknown;
};

/** Result of the built-in `help` command. */
export interface HelpResult extends CommandResult {
	type: "help";
	content: string;
}

/** Result of the built-in `exit` command. The caller decides what to do. */
export interface ExitResult extends CommandResult {
	type: "exit";
}

/**
 * Result of dispatching input that no registered command accepts.
 *
 * @property text - The raw input line
 * @property command - The first token of the input, or `""` when there is none
 */
export interface UnknownCommandResult extends CommandResult {
	type: "unknown_command";
	text: string;
	command: string;
}

/**
 * Plain-object form of a command, the way most commands are written.
 *
 * @example
 * ```typescript
 * const look: CommandObject<Session> = {
 *   name: "look",
 *   patterns: ["look", "look at <target>"],
 *   execute(session, args) {
 *     return { type: "look", target: args.get("target") };
 *   },
 * };
 * ```
 */
export interface CommandObject<C = void> {
	name: string;
	patterns: string[];
	description?: string;
	execute: (context: C, args: ParsedArgs) => CommandResult;
}

export interface CommandOptions {
	name: string;
	patterns: readonly string[];
	description?: string;
	/** Types available to the patterns. A fresh registry when omitted. */
	types?: ArgumentTypeRegistry;
}

/** Command names are a single non-empty word. */
const COMMAND_NAME_REGEX = /^\S+$/;

/**
 * Base class for all commands.
 *
 * A command owns an ordered list of patterns. The first pattern that matches
 * a line of tokens decides the arguments handed to {@link execute}.
 *
 * Patterns are parsed once at construction, so a malformed pattern fails
 * immediately with a `PatternError`. Any pattern an earlier one shadows is
 * recorded in {@link coverage}.
 *
 * @example
 * ```typescript
 * class Add extends Command {
 *   constructor() {
 *     super({ name: "add", patterns: ["add <a:int> <b:int>"] });
 *   }
 *
 *   execute(_context: void, args: ParsedArgs): CommandResult {
 *     const a = args.get("a");
 *     const b = args.get("b");
 *     if (typeof a !== "number" || typeof b !== "number") {
 *       return { type: "error" };
 *     }
 *     return { type: "sum", value: a + b };
 *   }
 * }
 * ```
 */
export abstract class Command<C = void> {
	readonly name: string;
	readonly patterns: readonly CommandPattern[];
	readonly description?: string;
	/** Patterns that can never match because an earlier one shadows them. */
	readonly coverage: readonly CoverageWarning[];

	/**
	 * @throws {CommandError} INVALID_COMMAND_NAME or NO_PATTERNS
	 * @throws {PatternError} When a pattern is malformed
	 */
	constructor(options: CommandOptions) {
		if (!COMMAND_NAME_REGEX.test(options.name)) {
			throw new CommandError(
				"INVALID_COMMAND_NAME",
				`Invalid command name '${options.name}'`,
				{ command: options.name }
			);
		}
		if (options.patterns.length === 0) {
			throw new CommandError(
				"NO_PATTERNS",
				`Command '${options.name}' declares no patterns`,
				{ command: options.name }
			);
		}

		const types = options.types ?? new ArgumentTypeRegistry();
		this.name = options.name;
		this.description = options.description;
		this.patterns = Object.freeze(
			options.patterns.map((source) => new CommandPattern(source, types))
		);
		this.coverage = Object.freeze(findCoverage(this.name, this.patterns));
	}

	/**
	 * Match tokens against the patterns in declaration order.
	 * @returns The arguments bound by the first matching pattern, or undefined
	 */
	match(tokens: readonly string[]): ParsedArgs | undefined {
		for (const pattern of this.patterns) {
			const args = pattern.match(tokens);
			if (args) return args;
		}
		return undefined;
	}

	/**
	 * Run the command.
	 *
	 * @param context - Whatever the application passes to `dispatch()`
	 * @param args - Slot values bound by the matching pattern. Optional slots
	 * that consumed nothing are present with the value `undefined`.
	 */
	abstract execute(context: C, args: ParsedArgs): CommandResult;
}

/**
 * Adapts a {@link CommandObject} into a {@link Command}.
 */
export class FunctionCommand<C = void> extends Command<C> {
	private executeFunction: CommandObject<C>["execute"];

	constructor(object: CommandObject<C>, types?: ArgumentTypeRegistry) {
		super({
			name: object.name,
			patterns: object.patterns,
			description: object.description,
			types,
		});
		this.executeFunction = object.execute;
	}

	execute(context: C, args: ParsedArgs): CommandResult {
		return this.executeFunction(context, args);
	}
}

export interface CommandRegistryOptions {
	/** Types for the patterns of commands added through `addCommand()`. */
	types?: ArgumentTypeRegistry;
	/**
	 * Log a warning for every shadowed pattern on registration.
	 * Defaults to `CONFIG.commands.check_coverage`.
	 */
	checkCoverage?: boolean;
}

/**
 * A command matched by {@link CommandRegistry.resolve}, not yet executed.
 */
export interface ResolvedCommand<C> {
	command: Command<C>;
	args: ParsedArgs;
}

/**
 * Ordered set of commands sharing one argument type registry.
 *
 * Registries are independent of each other: each owns its commands and its
 * types, so one application can run several command sets side by side.
 *
 * @example
 * ```typescript
 * const registry = new CommandRegistry();
 * registry.addCommand({
 *   name: "foo",
 *   patterns: ["foo <n:int>"],
 *   execute: (_context, args) => ({ type: "foo", n: args.get("n") }),
 * });
 *
 * registry.dispatch("foo 3");  // { type: "foo", n: 3 }
 * registry.dispatch("help");   // { type: "help", content: "Available commands:..." }
 * ```
 */
export class CommandRegistry<C = void> {
	readonly types: ArgumentTypeRegistry;
	readonly checkCoverage: boolean;
	private commands = new Map<string, Command<C>>();

	constructor(options: CommandRegistryOptions = {}) {
		this.types = options.types ?? new ArgumentTypeRegistry();
		this.checkCoverage =
			options.checkCoverage ?? CONFIG.commands.check_coverage;
		this.addCommand(createHelpCommand(this));
		this.addCommand(createExitCommand<C>());
	}

	/**
	 * Register a command in this registry.
	 *
	 * Commands are tried in the order they were registered. Coverage warnings
	 * computed by the command are logged here and never block registration.
	 *
	 * @throws {CommandError} DUPLICATE_COMMAND when the name is taken
	 */
	register(command: Command<C>): void {
		if (this.commands.has(command.name)) {
			throw new CommandError(
				"DUPLICATE_COMMAND",
				`Command '${command.name}' is already registered`,
				{ command: command.name }
			);
		}
		this.commands.set(command.name, command);
		logger.debug(
			`Registered command '${command.name}' with ${command.patterns.length} pattern(s)`
		);
		if (this.checkCoverage) {
			for (const warning of command.coverage) {
				logger.warn(formatCoverageWarning(warning));
			}
		}
	}

	/**
	 * Build a command from a plain object, using this registry's types, and
	 * register it.
	 */
	addCommand(object: CommandObject<C>): Command<C> {
		const command = new FunctionCommand(object, this.types);
		this.register(command);
		return command;
	}

	/**
	 * Remove a command by name.
	 * @returns Whether a command was removed
	 */
	unregister(name: string): boolean {
		const removed = this.commands.delete(name);
		if (removed) logger.debug(`Unregistered command '${name}'`);
		return removed;
	}

	getCommand(name: string): Command<C> | undefined {
		return this.commands.get(name);
	}

	/** All commands, in registration order. */
	getCommands(): Command<C>[] {
		return [...this.commands.values()];
	}

	/**
	 * Find the command a line of input would run, without running it.
	 */
	resolve(input: string): ResolvedCommand<C> | undefined {
		return this.resolveTokens(tokenize(input));
	}

	private resolveTokens(
		tokens: readonly string[]
	): ResolvedCommand<C> | undefined {
		for (const command of this.commands.values()) {
			const args = command.match(tokens);
			if (args) return { command, args };
		}
		return undefined;
	}

	/**
	 * Tokenize a line of input and execute the first command that accepts it.
	 *
	 * Input no command accepts yields an {@link UnknownCommandResult}.
	 * Errors thrown by a command's `execute()` propagate to the caller.
	 */
	dispatch(input: string, context: C): CommandResult {
		const tokens = tokenize(input);
		const resolved = this.resolveTokens(tokens);
		if (!resolved) {
			logger.debug(`No command accepts input: ${JSON.stringify(input)}`);
			const result: UnknownCommandResult = {
				type: "unknown_command",
				text: input,
				command: tokens[0] ?? "",
			};
			return result;
		}
		logger.debug(`Dispatching input to command '${resolved.command.name}'`);
		return resolved.command.execute(context, resolved.args);
	}
}
