/**
 * Move southwest.
 *
 * **Aliases:** `sw`
 * @module commands/southwest
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "southwest",
	aliases: ["sw"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.SOUTHWEST);
	},
} satisfies CommandObject;
