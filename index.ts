/**
 * parlance - a pattern-based command language and self-validating schema
 * records for text-driven applications.
 *
 * Importing the library opens its log files under `<root>/logs`, where the
 * root is `PARLANCE_ROOT` or the working directory.
 *
 * @example
 * ```ts
 * import { CommandRegistry, defineRecord, field, TYPE } from "parlance";
 *
 * const commands = new CommandRegistry();
 * commands.addCommand({
 *   name: "add",
 *   patterns: ["add <a:int> <b:int>"],
 *   execute: (_context, args) => ({ type: "sum", a: args.get("a"), b: args.get("b") }),
 * });
 * commands.dispatch("add 5 7"); // { type: "sum", a: 5, b: 7 }
 *
 * const Sword = defineRecord({
 *   name: "Sword",
 *   fields: [field("name", TYPE.string), field("damage", TYPE.integer)],
 * });
 * Sword.create(["Errata", 133]).dumps(); // { type: "sword", name: "Errata", damage: 133 }
 * ```
 *
 * @module parlance
 */

export { tokenize } from "./src/tokenize.js";
export {
	ArgumentTypeRegistry,
	BOOL,
	DEFAULT_ARGUMENT_TYPE,
	FALSE_LITERALS,
	INT,
	NUM,
	STR,
	TRUE_LITERALS,
	convertBoolean,
	defineArgumentType,
	type ArgumentType,
	type ArgumentValue,
} from "./src/argument-type.js";
export {
	CommandPattern,
	formatElement,
	parsePattern,
	type LiteralElement,
	type PatternElement,
	type SlotElement,
} from "./src/pattern.js";
export { matchPattern, type ParsedArgs } from "./src/matcher.js";
export {
	findCoverage,
	formatCoverageWarning,
	isCoveredBy,
	type CoverageWarning,
} from "./src/coverage.js";
export {
	Command,
	CommandRegistry,
	FunctionCommand,
	type CommandObject,
	type CommandOptions,
	type CommandRegistryOptions,
	type CommandResult,
	type ExitResult,
	type HelpResult,
	type ResolvedCommand,
	type UnknownCommandResult,
} from "./src/command.js";
export {
	TYPE,
	describeType,
	dumpValue,
	isFieldValue,
	isPlainData,
	loadValue,
	matchesType,
	type DumpOptions,
	type FieldMap,
	type FieldValue,
	type PlainData,
	type PlainMap,
	type Scalar,
	type TypeDescriptor,
} from "./src/schema/type-descriptor.js";
export {
	Field,
	RESERVED_FIELD_NAMES,
	field,
	type FieldOptions,
} from "./src/schema/field.js";
export {
	RecordDefinition,
	SchemaRecord,
	defineRecord,
	type RecordOptions,
} from "./src/schema/record.js";
export { RecordRegistry } from "./src/schema/registry.js";
export {
	deserializeRecord,
	loadRecord,
	saveRecord,
	serializeRecord,
	type RecordSource,
} from "./src/package/records.js";
export { loadConfig } from "./src/package/config.js";
export {
	CONFIG,
	CONFIG_DEFAULT,
	resetConfig,
	setConfig,
	type Config,
} from "./src/registry/config.js";
export {
	CommandError,
	ParlanceError,
	PatternError,
	SchemaError,
	ValidationError,
} from "./src/errors.js";
export { default as logger } from "./src/logger.js";
