/**
 * Move northeast.
 *
 * **Aliases:** `ne`
 * @module commands/northeast
 */

import { CommandContext } from "../core/command.js";
import { DIRECTION } from "../direction.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "northeast",
	aliases: ["ne"],
	execute(context: CommandContext): void {
		executeMovement(context, DIRECTION.NORTHEAST);
	},
} satisfies CommandObject;
