/**
 * Say command for speech within the current room.
 *
 * The speaker sees their own line; everyone else in the room receives it as
 * an event. When nobody else is present the speaker is told so.
 *
 * @example
 * ```
 * say Hello, traveler!
 * ```
 *
 * **Pattern:** `say <message:text>`
 * @module commands/say
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "say <message:text>",
	description: "Talk to people in the same room",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const event = world.say(actor.id, args.get("message") ?? "");
		const room = world.whereIs(actor.id);
		const listeners = world
			.playersIn(room.id)
			.filter((sessionId) => sessionId !== actor.id);

		context.reply(event.text);
		if (listeners.length === 0)
			context.reply("(No one else is here to hear you)");
		context.publish(event);
	},
} satisfies CommandObject;
