/**
 * Broadcast router: turns a scoped event into deliveries.
 *
 * Recipients are resolved against the live world and session registry at the
 * moment `publish()` runs. Each delivery is independent; a session that
 * cannot take the text is closed and the rest still receive it.
 *
 * @module core/broadcast
 */

import logger from "../logger.js";
import { TransportError } from "./errors.js";
import { EventScope, GameEvent } from "./event.js";
import { LINEBREAK } from "./io.js";
import { Session } from "./session.js";
import type { World } from "./world.js";

export const PROMPT = "> ";

/**
 * Render lines of output followed by the prompt.
 *
 * @example
 * ```typescript
 * render(["[Room] bob: hi"]); // "[Room] bob: hi\r\n> "
 * ```
 */
export function render(lines: readonly string[]): string {
	if (lines.length === 0) return PROMPT;
	const flat = lines.flatMap((line) => line.split("\n"));
	return flat.join(LINEBREAK) + LINEBREAK + PROMPT;
}

/**
 * Read access to the live sessions, by id.
 */
export interface SessionLookup {
	get(sessionId: string): Session | undefined;
}

export class BroadcastRouter {
	private readonly world: World;
	private readonly sessions: SessionLookup;

	constructor(world: World, sessions: SessionLookup) {
		this.world = world;
		this.sessions = sessions;
	}

	/**
	 * Deliver an event to every session its scope currently covers.
	 * Never throws on a delivery failure.
	 */
	publish(event: GameEvent): void {
		const text = render([event.text]);
		for (const session of this.recipients(event.scope)) {
			try {
				session.deliver(text);
			} catch (error) {
				const reason =
					error instanceof TransportError ? error.message : String(error);
				logger.warn(`Delivery to ${session} failed: ${reason}`);
				session.close(reason).catch((closeError) => {
					logger.error(`Teardown of ${session} failed: ${closeError}`);
				});
			}
		}
	}

	publishAll(events: readonly GameEvent[]): void {
		for (const event of events) this.publish(event);
	}

	/**
	 * Sessions an event with `scope` would reach right now.
	 */
	recipients(scope: EventScope): Session[] {
		let ids: string[];
		switch (scope.kind) {
			case "room":
				ids = this.world
					.playersIn(scope.roomId)
					.filter((id) => id !== scope.exclude);
				break;
			case "global":
				ids = this.world.sessionIds().filter((id) => id !== scope.exclude);
				break;
			case "direct":
				ids = [scope.sessionId];
				break;
		}

		const sessions: Session[] = [];
		for (const id of ids) {
			const session = this.sessions.get(id);
			if (session) sessions.push(session);
		}
		return sessions;
	}
}
