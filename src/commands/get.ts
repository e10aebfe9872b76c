/**
 * Get command for picking up items.
 *
 * Items are matched by partial name, so `get hist` picks up "a historic
 * brochure" when nothing else in the room matches.
 *
 * @example
 * ```
 * get brochure
 * take guitar pick
 * ```
 *
 * **Aliases:** `take`
 * @module commands/get
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { roomEvent } from "../core/event.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "get <item:text>",
	aliases: ["take <item:text>"],
	description: "Pick up an item from the room",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const item = world.takeItem(actor.id, args.get("item") ?? "");
		const room = world.whereIs(actor.id);
		context.reply(`You get ${item.name}.`);
		context.publish(
			roomEvent(room.id, `${actor.username ?? actor.id} gets ${item.name}.`, actor.id)
		);
	},
} satisfies CommandObject;
