/**
 * Move north.
 *
 * **Aliases:** `n`
 * @module commands/north
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "north",
	aliases: ["n"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.NORTH);
	},
} satisfies CommandObject;
