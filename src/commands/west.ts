/**
 * Move west.
 *
 * **Aliases:** `w`
 * @module commands/west
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "west",
	aliases: ["w"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.WEST);
	},
} satisfies CommandObject;
