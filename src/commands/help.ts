/**
 * Help command - lists the available commands.
 *
 * Commands are listed in registration order with their usage and
 * description; before login only the commands usable then are shown.
 *
 * @module commands/help
 */

import { CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "help",
	requiresAuth: false,
	description: "Show this help",
	execute(context: CommandContext): void {
		const { actor, registry } = context;
		context.reply("=== AVAILABLE COMMANDS ===");
		if (!actor.authenticated) {
			context.reply("  login - Sign in to an existing account");
			context.reply("  signup - Create a new account");
		}
		for (const command of registry.getCommands()) {
			if (command.requiresAuth && !actor.authenticated) continue;
			const usage = command.usage().replace(/^Usage: /, "");
			const aliases = command.verbs.slice(1);
			const shown = aliases.length > 0 ? `${usage} (${aliases.join("/")})` : usage;
			context.reply(
				command.description ? `  ${shown} - ${command.description}` : `  ${shown}`
			);
		}
		if (actor.authenticated) {
			context.reply("");
			context.reply("TIP: Most commands work with partial names!");
			context.reply(
				"    Example: 'get guitar' instead of 'get a tortoiseshell guitar pick'"
			);
		}
	},
} satisfies CommandObject;
