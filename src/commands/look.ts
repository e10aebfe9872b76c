/**
 * Look command for viewing the current room or the room beyond an exit.
 *
 * @example
 * ```
 * look
 * l
 * look north
 * l n
 * ```
 *
 * **Aliases:** `l`
 * **Pattern:** `look <direction:direction?>`
 * @module commands/look
 */

import { CommandArgs, CommandContext, ParseResult } from "../core/command.js";
import { text2dir } from "../direction.js";
import { RoomView } from "../core/world.js";
import { CommandObject } from "../package/commands.js";

/**
 * Render a room the way `look` shows it.
 */
export function showRoom(view: RoomView): string[] {
	const lines = [view.name, view.description];

	lines.push(
		view.exits.length > 0
			? `Exits: ${view.exits.join(", ")}`
			: "No obvious exits"
	);

	lines.push(
		view.otherOccupantNames.length > 0
			? `Players here: ${view.otherOccupantNames.join(", ")}`
			: "Players here: none"
	);

	if (view.npcs.length > 0) {
		lines.push("NPCs here:");
		for (const npc of view.npcs)
			lines.push(`  ${npc.name} - ${npc.description}`);
	} else lines.push("NPCs here: none");

	if (view.items.length > 0) {
		lines.push("Items here:");
		for (const item of view.items)
			lines.push(`  ${item.name} - ${item.description}`);
	} else lines.push("Items here: none");

	return lines;
}

export default {
	pattern: "look <direction:direction?>",
	aliases: ["l <direction:direction?>"],
	description: "Show the room, or the room beyond an exit",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const direction = text2dir(args.get("direction") ?? "");
		const view =
			direction !== undefined
				? world.peek(actor.id, direction)
				: world.lookAt(actor.id);
		for (const line of showRoom(view)) context.reply(line);
	},

	onError(context: CommandContext, result: ParseResult): void {
		if (result.error === "Could not parse argument: direction") {
			context.reply("That's not a direction you can look.");
			return;
		}
		context.reply("Usage: look [direction]");
	},
} satisfies CommandObject;
