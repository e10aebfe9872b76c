/**
 * Move east.
 *
 * **Aliases:** `e`
 * @module commands/east
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "east",
	aliases: ["e"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.EAST);
	},
} satisfies CommandObject;
