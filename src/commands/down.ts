/**
 * Move down.
 *
 * **Aliases:** `d`
 * @module commands/down
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "down",
	aliases: ["d"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.DOWN);
	},
} satisfies CommandObject;
