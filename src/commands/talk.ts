/**
 * Talk to an NPC in the current room, optionally about a topic.
 *
 * The NPC is matched by partial name and the topic by keyword; without a
 * topic, or with one the NPC doesn't know, the NPC gives its greeting.
 * Others in the room overhear the exchange.
 *
 * @example
 * ```
 * talk maria
 * talk maria history
 * talk "chef isabella" food
 * ```
 *
 * **Pattern:** `talk <npc:word> <keyword:text?>`
 * @module commands/talk
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { roomEvent } from "../core/event.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "talk <npc:word> <keyword:text?>",
	description: "Talk to an NPC (try keywords like history, food, music)",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const line = world.talk(actor.id, args.get("npc") ?? "", args.get("keyword"));
		const said = `${line.npc.name} says: "${line.text}"`;
		const name = actor.username ?? actor.id;
		const topic = line.keyword ? ` about ${line.keyword}` : "";

		context.reply(said);
		context.publish(
			roomEvent(
				world.whereIs(actor.id).id,
				`${name} talks to ${line.npc.name}${topic}.\n${said}`,
				actor.id
			)
		);
	},
} satisfies CommandObject;
