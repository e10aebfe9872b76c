/**
 * Move up.
 *
 * **Aliases:** `u`
 * @module commands/up
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "up",
	aliases: ["u"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.UP);
	},
} satisfies CommandObject;
