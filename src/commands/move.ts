/**
 * Move in any direction by name.
 *
 * @example
 * ```
 * move north
 * go e
 * ```
 *
 * **Aliases:** `go`
 * @module commands/move
 */

import { CommandArgs, CommandContext } from "../core/command.js";
import { CommandObject } from "../package/commands.js";
import { executeMovement } from "./_movement.js";

export default {
	pattern: "move <direction:word>",
	aliases: ["go <direction:word>"],
	description: "Move to another room",
	execute(context: CommandContext, args: CommandArgs): void {
		executeMovement(context, args.get("direction") ?? "");
	},
} satisfies CommandObject;
