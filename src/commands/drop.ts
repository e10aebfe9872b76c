/**
 * Drop an item from the inventory into the current room.
 *
 * **Pattern:** `drop <item:text>`
 * @module commands/drop
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { roomEvent } from "../core/event.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "drop <item:text>",
	description: "Drop an item from your inventory",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const item = world.dropItem(actor.id, args.get("item") ?? "");
		const room = world.whereIs(actor.id);
		context.reply(`You drop ${item.name}.`);
		context.publish(
			roomEvent(room.id, `${actor.username ?? actor.id} drops ${item.name}.`, actor.id)
		);
	},
} satisfies CommandObject;
