/**
 * Broadcastable events and their delivery scopes.
 *
 * An event is immutable once built: a scope naming who may receive it, and
 * the rendered text. Recipients are resolved by the broadcast router at
 * publish time, never when the event is created.
 *
 * @module core/event
 */

export type EventScope =
	| { readonly kind: "room"; readonly roomId: string; readonly exclude?: string }
	| { readonly kind: "global"; readonly exclude?: string }
	| { readonly kind: "direct"; readonly sessionId: string };

export interface GameEvent {
	readonly scope: EventScope;
	readonly text: string;
}

/**
 * Event for everyone in a room, optionally leaving out one session (usually
 * the actor, who gets a direct reply instead).
 */
export function roomEvent(
	roomId: string,
	text: string,
	exclude?: string
): GameEvent {
	const scope: EventScope = { kind: "room", roomId, exclude };
	return Object.freeze({ scope: Object.freeze(scope), text });
}

export function globalEvent(text: string, exclude?: string): GameEvent {
	const scope: EventScope = { kind: "global", exclude };
	return Object.freeze({ scope: Object.freeze(scope), text });
}

export function directEvent(sessionId: string, text: string): GameEvent {
	const scope: EventScope = { kind: "direct", sessionId };
	return Object.freeze({ scope: Object.freeze(scope), text });
}
