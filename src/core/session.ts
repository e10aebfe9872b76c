/**
 * Per-connection session actor.
 *
 * A session owns one client connection and everything that is strictly
 * per-connection: its lifecycle state, the username once authenticated, the
 * ordered processing of its input lines and its bounded outbound queue.
 *
 * Lifecycle
 * ```
 * CONNECTED ──login/signup──▶ AUTHENTICATING ──success──▶ ACTIVE
 *     ▲                            │                        │
 *     └──────────failure───────────┘                        │
 * any state ──quit/close/error──▶ DISCONNECTING ──▶ CLOSED ◀┘
 * ```
 *
 * Input lines are handled one at a time: each line waits for the previous
 * line's (possibly async) handling before it starts. Output goes through a
 * FIFO queue of at most `queueLimit` chunks that stops writing while the
 * transport reports backpressure and resumes on `drain`.
 *
 * @module core/session
 */

import logger from "../logger.js";
import { InvariantViolation, TransportError } from "./errors.js";
import { LINEBREAK, MudClient } from "./io.js";

export enum SESSION_STATE {
	CONNECTED = "connected",
	AUTHENTICATING = "authenticating",
	ACTIVE = "active",
	DISCONNECTING = "disconnecting",
	CLOSED = "closed",
}

const TRANSITIONS: ReadonlyMap<SESSION_STATE, readonly SESSION_STATE[]> =
	new Map([
		[
			SESSION_STATE.CONNECTED,
			[SESSION_STATE.AUTHENTICATING, SESSION_STATE.DISCONNECTING],
		],
		[
			SESSION_STATE.AUTHENTICATING,
			[
				SESSION_STATE.CONNECTED,
				SESSION_STATE.ACTIVE,
				SESSION_STATE.DISCONNECTING,
			],
		],
		[SESSION_STATE.ACTIVE, [SESSION_STATE.DISCONNECTING]],
		[SESSION_STATE.DISCONNECTING, [SESSION_STATE.CLOSED]],
		[SESSION_STATE.CLOSED, []],
	]);

export type OverflowPolicy = "drop-oldest" | "disconnect";

export interface SessionOptions {
	/** Maximum queued outbound chunks. */
	queueLimit: number;
	overflowPolicy: OverflowPolicy;
	/** Idle time before the session is closed; 0 or absent disables. */
	inactivityTimeoutMs?: number;
}

export interface SessionHandlers {
	/** Called for every input line not consumed by a pending `ask()`. */
	line(session: Session, line: string): void | Promise<void>;
	/**
	 * Called once during teardown. `wasActive` is true when the session was
	 * in the game and must be unregistered and persisted.
	 */
	teardown(session: Session, wasActive: boolean): Promise<void>;
}

export class Session {
	readonly id: string;
	readonly client: MudClient;
	private _state = SESSION_STATE.CONNECTED;
	private _username?: string;
	private readonly options: SessionOptions;
	private readonly handlers: SessionHandlers;
	private readonly queue: string[] = [];
	private waitingForDrain = false;
	private inputChain: Promise<void> = Promise.resolve();
	private pendingAsk?: (line: string) => void | Promise<void>;
	private inactivityTimer?: NodeJS.Timeout;
	private teardownPromise?: Promise<void>;
	private dropped = 0;

	constructor(
		id: string,
		client: MudClient,
		options: SessionOptions,
		handlers: SessionHandlers
	) {
		this.id = id;
		this.client = client;
		this.options = options;
		this.handlers = handlers;

		client.on("input", (line) => this.receive(line));
		client.on("drain", () => {
			this.waitingForDrain = false;
			this.flush();
		});
		client.on("close", () => {
			this.close("connection closed").catch((error) => {
				logger.error(`Teardown of ${this} failed: ${error}`);
			});
		});
		client.on("error", (error) => {
			logger.warn(`Transport error on ${this}: ${error.message}`);
		});

		this.touch();
	}

	toString(): string {
		return this._username
			? `{session ${this.id} ${this._username}}`
			: `{session ${this.id}}`;
	}

	get state(): SESSION_STATE {
		return this._state;
	}

	get username(): string | undefined {
		return this._username;
	}

	get authenticated(): boolean {
		return this._state === SESSION_STATE.ACTIVE;
	}

	/**
	 * Number of chunks waiting to be written.
	 */
	get queued(): number {
		return this.queue.length;
	}

	/**
	 * Chunks discarded by the drop-oldest policy so far.
	 */
	get droppedCount(): number {
		return this.dropped;
	}

	/**
	 * Move to another lifecycle state.
	 *
	 * @throws {InvariantViolation} on a transition the state machine forbids
	 */
	transition(to: SESSION_STATE): void {
		const allowed = TRANSITIONS.get(this._state) ?? [];
		if (!allowed.includes(to))
			throw new InvariantViolation(
				`${this} cannot move from ${this._state} to ${to}`
			);
		logger.debug(`${this}: ${this._state} -> ${to}`);
		this._state = to;
	}

	/**
	 * Enter the game as `username`.
	 */
	activate(username: string): void {
		this.transition(SESSION_STATE.ACTIVE);
		this._username = username;
	}

	/**
	 * Queue text for the client.
	 *
	 * @throws {TransportError} when the session is closing or gone, or when the
	 * queue is full under the `disconnect` policy
	 */
	deliver(text: string): void {
		if (
			this._state === SESSION_STATE.DISCONNECTING ||
			this._state === SESSION_STATE.CLOSED ||
			!this.client.isConnected()
		)
			throw new TransportError(this.id, `${this} is not connected`);

		if (this.queue.length >= this.options.queueLimit) {
			if (this.options.overflowPolicy === "disconnect")
				throw new TransportError(
					this.id,
					`${this} outbound queue overflow (${this.queue.length} chunks)`
				);
			this.queue.shift();
			this.dropped++;
			logger.warn(`${this} outbound queue full, dropped oldest chunk`);
		}

		this.queue.push(text);
		this.flush();
	}

	send(text: string): void {
		this.deliver(text);
	}

	sendLine(text: string): void {
		this.deliver(text + LINEBREAK);
	}

	/**
	 * Prompt for one line and route the next line received to `callback`
	 * instead of the normal line handler.
	 */
	ask(
		question: string,
		callback: (line: string) => void | Promise<void>
	): void {
		this.pendingAsk = callback;
		this.send(`${question} `);
	}

	/**
	 * Feed one input line into this session's ordered input chain.
	 */
	receive(line: string): void {
		this.touch();
		this.inputChain = this.inputChain
			.then(() => this.handleLine(line))
			.catch((error) => {
				logger.error(`Input handling failed for ${this}: ${error}`);
			});
	}

	/**
	 * Resolves once every line received so far has been handled.
	 */
	idle(): Promise<void> {
		return this.inputChain;
	}

	/**
	 * Tear the session down. Safe to call any number of times; every call
	 * returns the same promise.
	 */
	close(reason: string): Promise<void> {
		if (!this.teardownPromise) this.teardownPromise = this.teardown(reason);
		return this.teardownPromise;
	}

	private async teardown(reason: string): Promise<void> {
		const wasActive = this._state === SESSION_STATE.ACTIVE;
		this.transition(SESSION_STATE.DISCONNECTING);
		logger.info(`Closing ${this}: ${reason}`);

		if (this.inactivityTimer) {
			clearTimeout(this.inactivityTimer);
			this.inactivityTimer = undefined;
		}
		this.pendingAsk = undefined;

		try {
			await this.handlers.teardown(this, wasActive);
		} finally {
			this.flushAll();
			this.client.close();
			this.transition(SESSION_STATE.CLOSED);
		}
	}

	private async handleLine(line: string): Promise<void> {
		if (
			this._state === SESSION_STATE.DISCONNECTING ||
			this._state === SESSION_STATE.CLOSED
		)
			return;

		const ask = this.pendingAsk;
		if (ask) {
			this.pendingAsk = undefined;
			await ask(line);
			return;
		}
		await this.handlers.line(this, line);
	}

	private flush(): void {
		while (this.queue.length > 0 && !this.waitingForDrain) {
			const chunk = this.queue.shift();
			if (chunk === undefined) break;
			if (!this.client.write(chunk)) this.waitingForDrain = true;
		}
	}

	/**
	 * Hand whatever is still queued to the transport, ignoring backpressure,
	 * before the connection is ended.
	 */
	private flushAll(): void {
		while (this.queue.length > 0) {
			const chunk = this.queue.shift();
			if (chunk === undefined) break;
			this.client.write(chunk);
		}
	}

	private touch(): void {
		const timeoutMs = this.options.inactivityTimeoutMs ?? 0;
		if (timeoutMs <= 0) return;
		if (this.inactivityTimer) clearTimeout(this.inactivityTimer);
		this.inactivityTimer = setTimeout(() => {
			this.inactivityTimer = undefined;
			logger.debug(`Inactivity timeout for ${this}`);
			try {
				this.sendLine("You have been idle too long. Goodbye!");
			} catch (error) {
				logger.debug(`Could not notify ${this} of idle timeout: ${error}`);
			}
			this.close("inactivity timeout").catch((error) => {
				logger.error(`Teardown of ${this} failed: ${error}`);
			});
		}, timeoutMs);
	}
}
