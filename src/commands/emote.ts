/**
 * Emote command - describe an action to the room.
 *
 * @example
 * ```
 * emote waves hello.
 * // everyone in the room: "alice waves hello."
 * ```
 *
 * @module commands/emote
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { roomEvent } from "../core/event.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "emote <action:text>",
	description: "Act out something for the room",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const text = `${actor.username ?? actor.id} ${args.get("action") ?? ""}`;
		context.reply(text);
		context.publish(roomEvent(world.whereIs(actor.id).id, text, actor.id));
	},
} satisfies CommandObject;
