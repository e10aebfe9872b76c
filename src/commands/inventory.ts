/**
 * Inventory command - lists what the actor is carrying.
 *
 * **Aliases:** `inv`, `i`
 * @module commands/inventory
 */

import { CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";

export default {
	pattern: "inventory",
	aliases: ["inv", "i"],
	description: "Show what you're carrying",
	execute(context: CommandContext): void {
		const items = context.world.inventoryOf(context.actor.id);
		if (items.length === 0) {
			context.reply("You're not carrying anything.");
			return;
		}
		context.reply("You are carrying:");
		for (const item of items)
			context.reply(`  ${item.name} - ${item.description}`);
	},
} satisfies CommandObject;
