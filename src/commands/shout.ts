/**
 * Shout to every player in the world, the shouter included.
 *
 * **Pattern:** `shout <message:text>`
 * @module commands/shout
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "shout <message:text>",
	description: "Send a message to all players",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		context.publish(world.shout(actor.id, args.get("message") ?? ""));
	},
} satisfies CommandObject;
