/**
 * Who command - lists players currently in the game, in login order.
 *
 * @module commands/who
 */

import { CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "who",
	description: "Show online players",
	execute(context: CommandContext): void {
		context.reply(`Online players: ${context.world.who().join(", ")}`);
	},
} satisfies CommandObject;
