/**
 * Move southeast.
 *
 * **Aliases:** `se`
 * @module commands/southeast
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "southeast",
	aliases: ["se"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.SOUTHEAST);
	},
} satisfies CommandObject;
