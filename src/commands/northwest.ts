/**
 * Move northwest.
 *
 * **Aliases:** `nw`
 * @module commands/northwest
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "northwest",
	aliases: ["nw"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.NORTHWEST);
	},
} satisfies CommandObject;
