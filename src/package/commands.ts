/**
 * Package: commands - built-in command loader
 *
 * Loads every command module in `src/commands` (or `dist/src/commands` when
 * running the build) and registers it with a `CommandRegistry`.
 *
 * Each command file default-exports a plain object:
 * - `pattern: string` - the command pattern
 * - `aliases?: string[]` - optional alias patterns
 * - `requiresAuth?: boolean` - false for commands usable before login
 * - `description?: string` - one line for `help`
 * - `execute(context, args)` - handler function
 * - `onError?(context, result)` - optional parse error handler
 *
 * Files beginning with `_` are helpers and are skipped, as are tests.
 *
 * @example
 * // src/commands/shout.ts
 * export default {
 *   pattern: "shout <message:text>",
 *   execute(ctx, args) { ctx.publish(ctx.world.shout(ctx.actor.id, args.get("message") ?? "")); },
 * } satisfies CommandObject;
 *
 * @module package/commands
 */
import { readdir } from "fs/promises";
import { dirname, join, relative } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import {
	Command,
	CommandArgs,
	CommandContext,
	CommandRegistry,
	ParseResult,
} from "../core/command.js";
import logger from "../logger.js";
import { getSafeRootDirectory } from "../utils/path.js";

export interface CommandObject {
	pattern: string;
	aliases?: string[];
	requiresAuth?: boolean;
	description?: string;
	execute: (context: CommandContext, args: CommandArgs) => void;
	onError?: (context: CommandContext, result: ParseResult) => void;
}

/**
 * Wraps a `CommandObject` in the `Command` class the registry expects.
 */
export class ObjectCommand extends Command {
	private executeFunction: (context: CommandContext, args: CommandArgs) => void;
	private errorFunction?: (context: CommandContext, result: ParseResult) => void;

	constructor(commandObj: CommandObject) {
		super({
			pattern: commandObj.pattern,
			aliases: commandObj.aliases,
			requiresAuth: commandObj.requiresAuth,
			description: commandObj.description,
		});
		this.executeFunction = commandObj.execute;
		this.errorFunction = commandObj.onError;
	}

	execute(context: CommandContext, args: CommandArgs): void {
		this.executeFunction(context, args);
	}

	onError(context: CommandContext, result: ParseResult): void {
		if (this.errorFunction) this.errorFunction(context, result);
		else context.reply(this.usage());
	}
}

function isCommandObject(value: unknown): value is CommandObject {
	return (
		typeof value === "object" &&
		value !== null &&
		"pattern" in value &&
		typeof value.pattern === "string" &&
		"execute" in value &&
		typeof value.execute === "function"
	);
}

function isCommandFile(file: string): boolean {
	if (file.startsWith("_")) return false;
	if (file.endsWith(".d.ts")) return false;
	if (/\.(spec|test)\.[jt]s$/.test(file)) return false;
	return file.endsWith(".ts") || file.endsWith(".js");
}

/** Directory holding the built-in commands, beside this package. */
export const COMMAND_DIRECTORY = join(
	dirname(fileURLToPath(import.meta.url)),
	"..",
	"commands"
);

/**
 * Import every command module in `directory` and register it.
 *
 * @returns The number of commands registered.
 */
export async function loadCommands(
	registry: CommandRegistry,
	directory: string = COMMAND_DIRECTORY
): Promise<number> {
	const root = getSafeRootDirectory();
	logger.info(`Loading commands from ${relative(root, directory)}`);

	const files = (await readdir(directory)).filter(isCommandFile).sort();
	let count = 0;
	for (const file of files) {
		const filePath = join(directory, file);
		const commandModule: unknown = await import(pathToFileURL(filePath).href);
		const commandObj =
			typeof commandModule === "object" &&
			commandModule !== null &&
			"default" in commandModule
				? commandModule.default
				: undefined;

		if (!isCommandObject(commandObj)) {
			logger.warn(
				`Command file ${relative(root, filePath)} must default-export a command object`
			);
			continue;
		}

		registry.register(new ObjectCommand(commandObj));
		count++;
		logger.debug(
			`Loaded command "${commandObj.pattern}" from ${relative(root, filePath)}`
		);
		if (commandObj.aliases && commandObj.aliases.length > 0)
			logger.debug(`  Aliases: ${commandObj.aliases.join(", ")}`);
	}

	logger.info(`Loaded ${count} commands`);
	return count;
}
