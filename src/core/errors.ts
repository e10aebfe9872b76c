/**
 * Error taxonomy for the world server.
 *
 * - `UserFacingError`: bad input or a reference that does not resolve. The
 *   message is shown to the issuing player as-is; the player stays connected.
 * - `TransportError`: a write to a session failed or its connection is gone.
 *   Only that session is torn down.
 * - `InvariantViolation`: the world model found itself in a state that
 *   correct locking makes unreachable. The offending operation is aborted.
 * - `AccountError`: login/signup failures, shown during the login flow.
 *
 * @module core/errors
 */

export class UserFacingError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class NotAuthenticatedError extends UserFacingError {
	constructor() {
		super("You need to log in first. Type 'login' or 'signup'.");
	}
}

export class NoSuchExitError extends UserFacingError {
	constructor(readonly direction: string, readonly exits: readonly string[]) {
		super(
			exits.length > 0
				? `You can't go ${direction} from here.\nAvailable exits: ${exits.join(
						", "
				  )}`
				: `You can't go ${direction} from here.`
		);
	}
}

export class NotFoundError extends UserFacingError {
	constructor(readonly fragment: string, message: string) {
		super(message);
	}
}

/**
 * More than one candidate matched a partial name. Candidates are listed in
 * the order the world model sorted them.
 */
export class AmbiguousError extends UserFacingError {
	constructor(readonly fragment: string, readonly candidates: readonly string[]) {
		super(
			`Which '${fragment}' do you mean: ${candidates.join(", ")}?`
		);
	}
}

export class NoSuchNpcError extends UserFacingError {
	constructor(readonly fragment: string, readonly available: readonly string[]) {
		super(
			available.length > 0
				? `There's no '${fragment}' here to talk to.\nAvailable NPCs: ${available.join(
						", "
				  )}`
				: `There's no '${fragment}' here to talk to.`
		);
	}
}

export class NotInRoomError extends UserFacingError {
	constructor(readonly npcName: string) {
		super(`${npcName} isn't here.`);
	}
}

export class PlayerNotOnlineError extends UserFacingError {
	constructor(readonly username: string) {
		super(`${username} is not online.`);
	}
}

export class TransportError extends Error {
	constructor(readonly sessionId: string, message: string) {
		super(message);
		this.name = "TransportError";
	}
}

export class InvariantViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvariantViolation";
	}
}

export class AccountError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class UsernameTakenError extends AccountError {
	constructor(readonly username: string) {
		super("Username already exists");
	}
}

export class BadCredentialsError extends AccountError {
	constructor() {
		super("Invalid username or password");
	}
}

export class InvalidCredentialsError extends AccountError {}

export class AlreadyPlayingError extends AccountError {
	constructor(readonly username: string) {
		super("That character is already playing.");
	}
}
