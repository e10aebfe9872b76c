/**
 * @module commands/where
 */

import { CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "where",
	description: "Show your current location",
	execute(context: CommandContext): void {
		const room = context.world.whereIs(context.actor.id);
		context.reply(`You are at ${room.name}`);
	},
} satisfies CommandObject;
