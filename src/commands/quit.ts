/**
 * Quit command - leave the game and close the connection.
 *
 * Works before login as well. The player's location is saved during
 * teardown; anything carried is left on the floor of that room.
 *
 * @module commands/quit
 */

import { CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "quit",
	requiresAuth: false,
	description: "Exit the game",
	execute(context: CommandContext): void {
		const { actor, world } = context;
		if (!actor.authenticated) {
			context.reply("Goodbye!");
			context.disconnect();
			return;
		}
		const carried = world.inventoryOf(actor.id).map((item) => item.name);
		if (carried.length > 0)
			context.reply(`You leave behind ${carried.join(", ")}.`);
		context.reply("Goodbye! Your location has been saved.");
		context.disconnect();
	},
} satisfies CommandObject;
