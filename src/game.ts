/**
 * Orchestrates the MUD server lifecycle, player connections, the login flow
 * and player sessions. It bridges the network layer (`MudServer`/`MudClient`)
 * with the world model, the command registry and account persistence.
 *
 * What you get
 * - `Game`: owns one `World`, the session table, the broadcast router and the
 *   tick scheduler; `connect()` adopts any `MudClient`, `start()`/`stop()`
 *   run the TCP server
 * - `WELCOME_GUIDE`: the introduction shown to new accounts
 *
 * Typical usage
 * ```ts
 * const game = new Game({ definition, accounts, registry });
 * await game.start();
 * // Later, on shutdown
 * await game.stop();
 * ```
 *
 * Per line of input
 * 1. Before login, `login` and `signup` start the prompt sequence; `help`
 *    and `quit` run as commands; anything else is refused.
 * 2. Otherwise the line goes through `CommandRegistry.dispatch()`, which
 *    runs the command against the world synchronously.
 * 3. The actor gets its replies followed by the prompt, then the command's
 *    events are published. A line that produced nothing gets a bare prompt.
 *
 * @module game
 */

import { CommandRegistry, splitVerb } from "./core/command.js";
import { BroadcastRouter, PROMPT, render } from "./core/broadcast.js";
import { AccountError, AlreadyPlayingError } from "./core/errors.js";
import { roomEvent } from "./core/event.js";
import { MudClient, MudServer } from "./core/io.js";
import { Session, SESSION_STATE, SessionOptions } from "./core/session.js";
import { TickScheduler } from "./core/tick.js";
import { World, WorldDefinition } from "./core/world.js";
import { showRoom } from "./commands/look.js";
import { AccountRecord, AccountStore } from "./package/account.js";
import { CONFIG, Config } from "./registry/config.js";
import { DeepReadonly } from "./utils/types.js";
import logger from "./logger.js";

export const WELCOME_GUIDE: readonly string[] = [
	"=== WELCOME GUIDE ===",
	"Here are some basic commands to get started:",
	"",
	"Exploring:",
	"  'look' - See your surroundings, exits, people, and items",
	"  'n/s/e/w/u/d' - Move in a direction",
	"  'where' - Check your current location",
	"",
	"Communication:",
	"  'say <message>' - Talk to people in the same room",
	"  'shout <message>' - Send message to everyone in the world",
	"  'who' - See who's online",
	"",
	"Items:",
	"  'get <item>' - Pick up items you find",
	"  'drop <item>' - Drop items from your inventory",
	"  'inventory' (or 'inv') - See what you're carrying",
	"",
	"NPCs:",
	"  'talk <npc>' - Chat with characters (try keywords!)",
	"",
	"Need help? Type 'help' anytime!",
	"=====================",
];

export interface GameOptions {
	definition: WorldDefinition;
	accounts: AccountStore;
	registry: CommandRegistry;
	config?: DeepReadonly<Config>;
	/** Randomness for NPC wandering. */
	random?: () => number;
}

export class Game {
	readonly world: World;
	readonly registry: CommandRegistry;
	readonly router: BroadcastRouter;
	readonly ticker: TickScheduler;
	readonly accounts: AccountStore;
	private readonly config: DeepReadonly<Config>;
	private readonly sessions = new Map<string, Session>();
	private server?: MudServer;
	private nextSessionId = 1;

	constructor(options: GameOptions) {
		this.config = options.config ?? CONFIG;
		this.world = new World(options.definition, {
			startRoom: this.config.world.start_room,
			wanderChance: this.config.world.wander_chance,
			random: options.random,
		});
		this.registry = options.registry;
		this.accounts = options.accounts;
		this.router = new BroadcastRouter(this.world, this.sessions);
		this.ticker = new TickScheduler(
			this.world,
			this.router,
			this.config.world.tick_interval_ms
		);
	}

	get sessionCount(): number {
		return this.sessions.size;
	}

	/**
	 * Adopt a connected client: wrap it in a session and greet it.
	 */
	connect(client: MudClient): Session {
		const options: SessionOptions = {
			queueLimit: this.config.server.outbound_queue_limit,
			overflowPolicy: this.config.server.overflow_policy,
			inactivityTimeoutMs: this.config.server.inactivity_timeout * 1000,
		};
		const session = new Session(`s${this.nextSessionId++}`, client, options, {
			line: (s, line) => this.handleLine(s, line),
			teardown: (s, wasActive) => this.teardown(s, wasActive),
		});
		this.sessions.set(session.id, session);
		logger.info(`New session ${session} from ${client.getAddress()}`);

		this.deliver(session, [
			`Welcome to the ${this.config.game.name}`,
			"Type 'login' to sign in or 'signup' to create a new account",
		]);
		return session;
	}

	/**
	 * Listen for connections and start the world tick.
	 *
	 * @returns The bound port.
	 */
	async start(): Promise<number> {
		const server = new MudServer();
		server.on("connection", (client) => {
			this.connect(client);
		});
		server.on("error", (error) => {
			logger.error(`Server error: ${error.message}`);
		});
		await server.start(this.config.server.port, this.config.server.host);
		this.server = server;
		this.ticker.start();
		const port = server.getPort() ?? this.config.server.port;
		logger.info(`${this.config.game.name} listening on port ${port}`);
		return port;
	}

	/**
	 * Stop the tick, close every session (saving players' locations) and stop
	 * listening.
	 */
	async stop(): Promise<void> {
		this.ticker.stop();
		const closing = [...this.sessions.values()].map((session) => {
			if (session.client.isConnected())
				this.deliver(session, ["The server is shutting down. Goodbye!"]);
			return session.close("server shutdown");
		});
		await Promise.all(closing);
		if (this.server) {
			await this.server.stop();
			this.server = undefined;
		}
		logger.info("Game stopped");
	}

	private async handleLine(session: Session, raw: string): Promise<void> {
		const line = raw.trim();
		if (line.length > 0) logger.debug(`${session} > ${line}`);

		const verb = splitVerb(line).verb.toLowerCase();
		if (!session.authenticated) {
			if (verb === "login") return this.beginLogin(session);
			if (verb === "signup") return this.beginSignup(session);
			if (line.length > 0 && !this.registry.lookup(verb)) {
				this.deliver(session, ["Please type 'login', 'signup', or 'quit'"]);
				return;
			}
		} else if (verb === "login" || verb === "signup") {
			this.deliver(session, ["You are already logged in."]);
			return;
		}

		const result = this.registry.dispatch(session, line, this.world);
		if (result.replies.length > 0) this.deliver(session, result.replies);
		else if (result.events.length === 0) this.deliver(session, []);
		this.router.publishAll(result.events);
		if (result.disconnect) await session.close("quit");
	}

	private beginLogin(session: Session): void {
		session.transition(SESSION_STATE.AUTHENTICATING);
		session.ask("Username:", (username) => {
			session.ask("Password:", (password) =>
				this.authenticate(session, () => this.accounts.login(username, password), false)
			);
		});
	}

	private beginSignup(session: Session): void {
		session.transition(SESSION_STATE.AUTHENTICATING);
		session.ask("Choose a username:", (username) => {
			session.ask("Choose a password:", (password) =>
				this.authenticate(
					session,
					() => this.accounts.signup(username.trim(), password),
					true
				)
			);
		});
	}

	/**
	 * Finish a login or signup: resolve the account, then enter the world.
	 * Failures return the session to the welcome prompt.
	 */
	private async authenticate(
		session: Session,
		resolve: () => Promise<AccountRecord>,
		isNew: boolean
	): Promise<void> {
		const failed = isNew
			? (reason: string) => [
					`Signup failed: ${reason}`,
					"Type 'signup' to try again or 'login' to sign in",
			  ]
			: (reason: string) => [
					`Login failed: ${reason}`,
					"Type 'login' to try again or 'signup' to create account",
			  ];

		let record: AccountRecord;
		try {
			record = await resolve();
		} catch (error) {
			if (!(error instanceof AccountError))
				logger.error(`Account lookup failed for ${session}: ${error}`);
			const reason =
				error instanceof AccountError ? error.message : "Something went wrong.";
			this.rejectLogin(session, failed(reason));
			return;
		}

		// the connection may have dropped while the account was read
		if (session.state !== SESSION_STATE.AUTHENTICATING) return;

		try {
			this.world.registerPlayer(session.id, record.username, record.room);
		} catch (error) {
			if (!(error instanceof AlreadyPlayingError)) throw error;
			this.rejectLogin(session, failed(error.message));
			return;
		}
		session.activate(record.username);
		logger.info(`${session} entered the game${isNew ? " (new account)" : ""}`);

		const room = this.world.lookAt(session.id);
		const greeting = isNew
			? [
					`Account created! Welcome to the ${this.config.game.name}, ${record.username}!`,
					"",
					...WELCOME_GUIDE,
			  ]
			: [`Welcome back, ${record.username}!`];
		this.deliver(session, [...greeting, "", ...showRoom(room)]);
		this.router.publish(
			roomEvent(room.id, `${record.username} has entered the game.`, session.id)
		);
	}

	private rejectLogin(session: Session, lines: string[]): void {
		if (session.state !== SESSION_STATE.AUTHENTICATING) return;
		session.transition(SESSION_STATE.CONNECTED);
		this.deliver(session, lines);
	}

	private async teardown(session: Session, wasActive: boolean): Promise<void> {
		this.sessions.delete(session.id);
		const username = session.username;
		if (!wasActive || username === undefined) return;

		const roomId = this.world.unregisterPlayer(session.id);
		if (roomId === undefined) return;
		this.router.publish(roomEvent(roomId, `${username} has left the game.`));
		try {
			await this.accounts.persistLocation(username, roomId);
		} catch (error) {
			logger.error(`Could not save location of ${username}: ${error}`);
		}
	}

	/**
	 * Send rendered lines and the prompt; a session that cannot take them is
	 * closed.
	 */
	private deliver(session: Session, lines: readonly string[]): void {
		try {
			session.deliver(lines.length > 0 ? render(lines) : PROMPT);
		} catch (error) {
			logger.warn(`Delivery to ${session} failed: ${error}`);
			session.close(String(error)).catch((closeError) => {
				logger.error(`Teardown of ${session} failed: ${closeError}`);
			});
		}
	}
}
