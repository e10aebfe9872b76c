/**
 * Shared movement command execution logic.
 *
 * @module commands/_movement
 */

import { CommandContext } from "../core/command.js";
import { roomEvent } from "../core/event.js";
import { dir2reverse } from "../direction.js";
import { showRoom } from "./look.js";

/**
 * Moves the actor through an exit, replies with the new room and tells both
 * rooms about it.
 *
 * @param direction Direction name or shortcut, as typed
 */
export function executeMovement(
	context: CommandContext,
	direction: string
): void {
	const { actor, world } = context;
	const result = world.move(actor.id, direction);
	const name = actor.username ?? actor.id;

	context.reply(`You head ${result.direction}.`);
	context.reply("");
	for (const line of showRoom(result.to)) context.reply(line);

	context.publish(
		roomEvent(result.from.id, `${name} leaves ${result.direction}.`)
	);
	context.publish(
		roomEvent(
			result.to.id,
			`${name} arrives from the ${dir2reverse(result.direction)}.`,
			actor.id
		)
	);
}
