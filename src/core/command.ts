/**
 * Pattern-based command system.
 *
 * Commands declare a human-readable pattern; the registry matches the first
 * word of a line against every registered verb and alias, parses the rest of
 * the line into named string arguments and executes the command against the
 * world. Output is collected rather than written: `dispatch()` returns the
 * direct replies for the issuing session and the events to broadcast.
 *
 * What you get
 * - `Command`: abstract base class with pattern parsing and `execute()` hook
 * - `CommandRegistry`: register commands and dispatch input lines
 * - `ARGUMENT_TYPE`: argument types (`text`, `word`, `direction`)
 * - Types: `CommandContext`, `CommandActor`, `ParseResult`, `DispatchResult`
 *
 * Pattern basics
 * - The first word is the verb: `say <message:text>`
 * - Placeholders: `<name:type>` (required), `<name:type?>` (optional)
 * - Aliases are full patterns of their own: `["l"]`, `["go <direction:direction>"]`
 *
 * Quick start
 * ```ts
 * class Shout extends Command {
 *   constructor() {
 *     super({ pattern: "shout <message:text>" });
 *   }
 *   execute(ctx: CommandContext, args: CommandArgs) {
 *     ctx.publish(ctx.world.shout(ctx.actor.id, args.get("message") ?? ""));
 *   }
 * }
 *
 * const registry = new CommandRegistry();
 * registry.register(new Shout());
 * registry.dispatch(actor, "shout hello", world);
 * ```
 *
 * @module core/command
 */

import { text2dir } from "../direction.js";
import logger from "../logger.js";
import { InvariantViolation, NotAuthenticatedError, UserFacingError } from "./errors.js";
import { GameEvent } from "./event.js";
import type { World } from "./world.js";

/**
 * The session a command runs on behalf of.
 */
export interface CommandActor {
	readonly id: string;
	readonly username?: string;
	readonly authenticated: boolean;
}

/**
 * Context provided to command execution.
 *
 * Commands never write to a connection; they `reply()` to the actor and
 * `publish()` events for everyone else. Both are flushed by the caller of
 * `dispatch()` once the command has returned.
 */
export interface CommandContext {
	actor: CommandActor;
	world: World;
	registry: CommandRegistry;
	reply(text: string): void;
	publish(event: GameEvent): void;
	disconnect(): void;
}

export type CommandArgs = Map<string, string>;

/**
 * Result of parsing a command pattern against user input.
 */
export interface ParseResult {
	success: boolean;
	args: CommandArgs;
	error?: string;
}

/**
 * Supported argument types for command patterns.
 *
 * - TEXT: all remaining input (greedy). Should be the last argument.
 * - WORD: a single token; `"quoted phrases"` count as one token.
 * - DIRECTION: a direction name or shortcut, normalized to its full name.
 */
export enum ARGUMENT_TYPE {
	TEXT = "text",
	WORD = "word",
	DIRECTION = "direction",
}

export interface ArgumentConfig {
	name: string;
	type: ARGUMENT_TYPE;
	required: boolean;
}

export interface CommandOptions {
	pattern: string;
	aliases?: string[];
	/** Commands that work before login (`help`, `quit`) set this to false. */
	requiresAuth?: boolean;
	/** One-line description shown by `help`. */
	description?: string;
}

/**
 * Output of a single dispatched line.
 */
export interface DispatchResult {
	replies: string[];
	events: GameEvent[];
	disconnect: boolean;
}

const NO_MATCH = "Input does not match pattern";

interface CachedPattern {
	verb: string;
	pattern: string;
	regex: RegExp;
	argConfigs: ArgumentConfig[];
}

function isArgumentType(value: string): value is ARGUMENT_TYPE {
	return (
		value === ARGUMENT_TYPE.TEXT ||
		value === ARGUMENT_TYPE.WORD ||
		value === ARGUMENT_TYPE.DIRECTION
	);
}

/**
 * Base class for all commands.
 *
 * Parsing errors are reported as:
 * - "Missing required argument: <name>"
 * - "Could not parse argument: <name>"
 *
 * Implement `onError()` to turn them into something friendlier; otherwise
 * the dispatcher replies with the command's usage line.
 */
export abstract class Command {
	readonly pattern: string;
	readonly aliases: readonly string[];
	readonly requiresAuth: boolean;
	readonly description?: string;

	private patternCache: CachedPattern[] = [];

	constructor(options: CommandOptions) {
		this.pattern = options.pattern;
		this.aliases = options.aliases ?? [];
		this.requiresAuth = options.requiresAuth ?? true;
		this.description = options.description;
		this.buildPatternCache();
	}

	/**
	 * Every verb that selects this command, lowercase, pattern first.
	 */
	get verbs(): string[] {
		return this.patternCache.map((cached) => cached.verb);
	}

	abstract execute(context: CommandContext, args: CommandArgs): void;

	onError?(context: CommandContext, result: ParseResult): void;

	/**
	 * Human-readable usage line derived from the main pattern.
	 *
	 * @example
	 * ```typescript
	 * // pattern "talk <npc:word> <keyword:text?>"
	 * command.usage(); // "Usage: talk <npc> [keyword]"
	 * ```
	 */
	usage(): string {
		const shape = this.pattern
			.replace(/<([^:>]+):[^>?]+\?>/g, "[$1]")
			.replace(/<([^:>]+):[^>]+>/g, "<$1>");
		return `Usage: ${shape}`;
	}

	/**
	 * Parse a line whose first word is `verb` against the pattern that owns
	 * that verb.
	 */
	parse(verb: string, rest: string): ParseResult {
		const key = verb.toLowerCase();
		const input = rest.length > 0 ? `${key} ${rest}` : key;
		let lastError = NO_MATCH;

		for (const cached of this.patternCache) {
			if (cached.verb !== key) continue;
			const result = this.parseWithCachedPattern(cached, input);
			if (result.success) return result;
			if (result.error && result.error !== NO_MATCH) lastError = result.error;
		}

		return { success: false, args: new Map(), error: lastError };
	}

	private buildPatternCache(): void {
		for (const pattern of [this.pattern, ...this.aliases]) {
			const verb = pattern.trim().split(/\s+/)[0].toLowerCase();
			this.patternCache.push({
				verb,
				pattern,
				regex: this.buildRegex(pattern),
				argConfigs: this.extractArgumentConfigs(pattern),
			});
		}
	}

	private parseWithCachedPattern(
		cached: CachedPattern,
		input: string
	): ParseResult {
		const args: CommandArgs = new Map();
		const match = input.match(cached.regex);
		if (!match) return { success: false, args, error: NO_MATCH };

		for (let i = 0; i < cached.argConfigs.length; i++) {
			const config = cached.argConfigs[i];
			const rawValue = match[i + 1];

			if (rawValue === undefined || rawValue.trim() === "") {
				if (config.required) {
					return {
						success: false,
						args,
						error: `Missing required argument: ${config.name}`,
					};
				}
				continue;
			}

			const parsed = this.parseArgument(rawValue.trim(), config);
			if (parsed === undefined) {
				return {
					success: false,
					args,
					error: `Could not parse argument: ${config.name}`,
				};
			}
			args.set(config.name, parsed);
		}

		return { success: true, args };
	}

	private extractArgumentConfigs(pattern: string): ArgumentConfig[] {
		const configs: ArgumentConfig[] = [];
		const argRegex = /<([^:>]+):([^>?]+)(\?)?>/g;
		let match;

		while ((match = argRegex.exec(pattern)) !== null) {
			const [, name, typeStr, optional] = match;
			if (!isArgumentType(typeStr))
				throw new Error(`Unknown argument type '${typeStr}' in "${pattern}"`);
			configs.push({ name, type: typeStr, required: !optional });
		}

		return configs;
	}

	/**
	 * Every placeholder becomes optional in the regex so a missing argument
	 * is reported by name rather than as a mismatch.
	 *
	 * @example
	 * Pattern: "say <message:text>"
	 * Regex: /^say(?: (.+))?$/i
	 */
	private buildRegex(pattern: string): RegExp {
		let regexStr = pattern
			.replace(/<[^:>]+:text\??>/g, "___TEXT___")
			.replace(/<[^:>]+:[^>]+>/g, "___WORD___");

		regexStr = regexStr.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

		const wordTokenPattern = `(?:"[^"]+"|'[^']+'|\\S+)`;
		regexStr = regexStr
			.replace(/ ___TEXT___/g, "(?: (.+))?")
			.replace(/ ___WORD___/g, `(?: (${wordTokenPattern}))?`)
			.replace(/___TEXT___/g, "(?:(.+))?")
			.replace(/___WORD___/g, `(?:(${wordTokenPattern}))?`);

		return new RegExp(`^${regexStr}$`, "i");
	}

	private parseArgument(
		value: string,
		config: ArgumentConfig
	): string | undefined {
		switch (config.type) {
			case ARGUMENT_TYPE.TEXT:
				return value;
			case ARGUMENT_TYPE.WORD: {
				const quoted = value.match(/^"([^"]+)"$|^'([^']+)'$/);
				if (quoted) return quoted[1] ?? quoted[2];
				return value;
			}
			case ARGUMENT_TYPE.DIRECTION:
				return text2dir(value);
		}
	}
}

/**
 * Split a raw line into its verb and the rest, on the first whitespace run.
 */
export function splitVerb(line: string): { verb: string; rest: string } {
	const trimmed = line.trim();
	const match = trimmed.match(/^(\S+)\s*([\s\S]*)$/);
	if (!match) return { verb: "", rest: "" };
	return { verb: match[1], rest: match[2].trim() };
}

export class CommandRegistry {
	private commands: Command[] = [];
	private verbs = new Map<string, Command>();

	/**
	 * Register a command under its pattern verb and every alias verb.
	 *
	 * @throws {Error} if one of its verbs is already taken
	 */
	register(command: Command): void {
		for (const verb of command.verbs) {
			const existing = this.verbs.get(verb);
			if (existing && existing !== command)
				throw new Error(
					`Verb '${verb}' of "${command.pattern}" is already used by "${existing.pattern}"`
				);
		}
		for (const verb of command.verbs) this.verbs.set(verb, command);
		this.commands.push(command);
	}

	unregister(command: Command): void {
		const index = this.commands.indexOf(command);
		if (index === -1) return;
		this.commands.splice(index, 1);
		for (const verb of command.verbs) {
			if (this.verbs.get(verb) === command) this.verbs.delete(verb);
		}
	}

	/**
	 * Find the command a verb selects. Case-insensitive, whole word.
	 */
	lookup(verb: string): Command | undefined {
		return this.verbs.get(verb.toLowerCase());
	}

	/**
	 * Registered commands in registration order.
	 */
	getCommands(): Command[] {
		return [...this.commands];
	}

	/**
	 * Parse and execute one input line on behalf of `actor`.
	 *
	 * - Blank lines produce no output.
	 * - Unknown verbs get a reply pointing at `help`.
	 * - Authenticated-only commands from an anonymous actor are refused.
	 * - `UserFacingError` from the world becomes the reply. Anything else is
	 *   logged and answered with a generic failure; events the command queued
	 *   before failing are discarded.
	 *
	 * @example
	 * ```typescript
	 * const { replies, events } = registry.dispatch(actor, "get hist", world);
	 * ```
	 */
	dispatch(actor: CommandActor, rawLine: string, world: World): DispatchResult {
		const result: DispatchResult = { replies: [], events: [], disconnect: false };
		const line = rawLine.trim();
		if (line.length === 0) return result;

		const { verb, rest } = splitVerb(line);
		const command = this.lookup(verb);
		if (!command) {
			result.replies.push(
				`Unknown command: ${line}`,
				"Type 'help' for available commands."
			);
			return result;
		}

		if (command.requiresAuth && !actor.authenticated) {
			result.replies.push(new NotAuthenticatedError().message);
			return result;
		}

		const events: GameEvent[] = [];
		const context: CommandContext = {
			actor,
			world,
			registry: this,
			reply: (text) => {
				result.replies.push(text);
			},
			publish: (event) => {
				events.push(event);
			},
			disconnect: () => {
				result.disconnect = true;
			},
		};

		const parsed = command.parse(verb, rest);
		if (!parsed.success) {
			if (command.onError) command.onError(context, parsed);
			else result.replies.push(command.usage());
			return result;
		}

		try {
			command.execute(context, parsed.args);
			result.events.push(...events);
		} catch (error) {
			if (error instanceof UserFacingError) {
				result.replies.push(error.message);
			} else if (error instanceof InvariantViolation) {
				logger.error(
					`Invariant violation in "${line}" from ${actor.username ?? actor.id}: ${error.message}`
				);
				result.replies.push("Something went wrong. Please try again.");
			} else {
				logger.error(
					`Command "${line}" from ${actor.username ?? actor.id} failed: ${error}`
				);
				result.replies.push("Something went wrong. Please try again.");
			}
		}

		return result;
	}
}
