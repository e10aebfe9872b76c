/**
 * Move south.
 *
 * **Aliases:** `s`
 * @module commands/south
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "south",
	aliases: ["s"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.SOUTH);
	},
} satisfies CommandObject;
