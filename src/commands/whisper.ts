/**
 * Whisper command - private message to one online player, anywhere.
 *
 * Nothing is kept for players who are offline.
 *
 * @example
 * ```
 * whisper bob meet me at the Pearl
 * ```
 *
 * **Pattern:** `whisper <target:word> <message:text>`
 * @module commands/whisper
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { PlayerNotOnlineError } from "../core/errors.js";
import { directEvent } from "../core/event.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "whisper <target:word> <message:text>",
	description: "Send a private message to a player",
	execute(context: CommandContext, args: CommandArgs): void {
		const { actor, world } = context;
		const targetName = args.get("target") ?? "";
		const message = args.get("message") ?? "";
		const target = world.findPlayer(targetName);
		if (!target) throw new PlayerNotOnlineError(targetName);

		context.reply(`You whisper to ${target.username}: ${message}`);
		if (target.sessionId !== actor.id)
			context.publish(
				directEvent(
					target.sessionId,
					`${actor.username ?? actor.id} whispers to you: ${message}`
				)
			);
	},
} satisfies CommandObject;
