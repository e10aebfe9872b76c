/**
 * IO module - networking primitives for the world server
 *
 * A small wrapper around Node's TCP sockets. It exposes two primitives:
 *
 * - `StandardMudClient`: an EventEmitter wrapper around a client socket that
 *   strips telnet IAC sequences, buffers incoming data into complete lines
 *   and emits an `input` event per line. Writes report transport
 *   backpressure and `drain` is re-emitted so callers can wait for it.
 * - `MudServer`: a TCP server that accepts connections and emits higher-level
 *   events (`connection`, `listening`, `error`, `close`). It tracks
 *   connected clients so `stop()` can close them.
 *
 * Typical usage
 * ```ts
 * import { MudServer } from './io.js';
 *
 * const server = new MudServer();
 * server.on('connection', (client) => {
 *   client.on('input', (line) => {
 *     client.write(`You said: ${line}${LINEBREAK}`);
 *   });
 * });
 * await server.start(2323);
 * ```
 *
 * Notes
 * - No telnet option negotiation is performed. Commands a client sends are
 *   removed from the stream and otherwise ignored.
 * - `\r` is dropped and `\n` ends a line, so CRLF and LF clients look the same.
 *
 * @module core/io
 */

import { EventEmitter } from "events";
import { createServer, Server, Socket } from "net";
import { Duplex } from "stream";
import { StringDecoder } from "string_decoder";
import logger from "../logger.js";

/** Telnet line break (CR+LF) */
export const LINEBREAK = "\r\n";

/** Longest input line accepted; anything longer is dropped up to its newline. */
export const MAX_LINE_LENGTH = 4096;

export enum IAC {
	SE = 240,
	SB = 250,
	WILL = 251,
	WONT = 252,
	DO = 253,
	DONT = 254,
	IAC = 255,
}

export interface MudClient {
	write(text: string): boolean;
	close(): void;
	getAddress(): string;
	isConnected(): boolean;
	on(event: "input", listener: (line: string) => void): this;
	on(event: "close", listener: () => void): this;
	on(event: "error", listener: (err: Error) => void): this;
	on(event: "drain", listener: () => void): this;
	once(event: "input", listener: (line: string) => void): this;
	once(event: "close", listener: () => void): this;
	once(event: "error", listener: (err: Error) => void): this;
	once(event: "drain", listener: () => void): this;
	off(event: "input", listener: (line: string) => void): this;
	off(event: "close", listener: () => void): this;
	off(event: "error", listener: (err: Error) => void): this;
	off(event: "drain", listener: () => void): this;
}

enum TELNET_STATE {
	DATA,
	COMMAND,
	OPTION,
	SUBNEGOTIATION,
	SUBNEGOTIATION_IAC,
}

/**
 * Removes telnet command sequences from a byte stream. State carries across
 * chunks, so a sequence split between two reads is still removed.
 *
 * @example
 * ```typescript
 * const filter = new TelnetFilter();
 * filter.process(Buffer.from([0xff, 0xfb, 0x01, 0x68, 0x69])); // <Buffer 68 69>
 * ```
 */
export class TelnetFilter {
	private state = TELNET_STATE.DATA;

	process(data: Buffer): Buffer {
		const out: number[] = [];
		for (const byte of data) {
			switch (this.state) {
				case TELNET_STATE.DATA:
					if (byte === IAC.IAC) this.state = TELNET_STATE.COMMAND;
					else out.push(byte);
					break;
				case TELNET_STATE.COMMAND:
					if (byte === IAC.IAC) {
						out.push(byte);
						this.state = TELNET_STATE.DATA;
					} else if (byte === IAC.SB) {
						this.state = TELNET_STATE.SUBNEGOTIATION;
					} else if (byte >= IAC.WILL && byte <= IAC.DONT) {
						this.state = TELNET_STATE.OPTION;
					} else {
						this.state = TELNET_STATE.DATA;
					}
					break;
				case TELNET_STATE.OPTION:
					this.state = TELNET_STATE.DATA;
					break;
				case TELNET_STATE.SUBNEGOTIATION:
					if (byte === IAC.IAC) this.state = TELNET_STATE.SUBNEGOTIATION_IAC;
					break;
				case TELNET_STATE.SUBNEGOTIATION_IAC:
					this.state =
						byte === IAC.SE
							? TELNET_STATE.DATA
							: TELNET_STATE.SUBNEGOTIATION;
					break;
			}
		}
		return Buffer.from(out);
	}
}

/**
 * Represents a connected client.
 *
 * Behavior and events
 * - Emits `input` for every complete line, trimmed. Empty lines are emitted too.
 * - Emits `drain` when a write that returned `false` has been flushed.
 * - Emits `close` when the socket closes and `error` on socket errors.
 */
export class StandardMudClient extends EventEmitter implements MudClient {
	private socket: Duplex;
	private buffer: string = "";
	private decoder = new StringDecoder("utf8");
	private filter = new TelnetFilter();
	private closed = false;
	/** Set while the rest of an over-long line is being thrown away. */
	private discarding = false;

	toString(): string {
		return `{client@${this.getAddress()}}`;
	}

	constructor(socket: Duplex) {
		super();
		this.socket = socket;
		this.setupSocketHandlers();
	}

	public on(event: "input", listener: (line: string) => void): this;
	public on(event: "close", listener: () => void): this;
	public on(event: "error", listener: (err: Error) => void): this;
	public on(event: "drain", listener: () => void): this;
	public on(event: string, listener: (...args: any[]) => void): this {
		return super.on(event, listener);
	}

	public once(event: "input", listener: (line: string) => void): this;
	public once(event: "close", listener: () => void): this;
	public once(event: "error", listener: (err: Error) => void): this;
	public once(event: "drain", listener: () => void): this;
	public once(event: string, listener: (...args: any[]) => void): this {
		return super.once(event, listener);
	}

	public off(event: "input", listener: (line: string) => void): this;
	public off(event: "close", listener: () => void): this;
	public off(event: "error", listener: (err: Error) => void): this;
	public off(event: "drain", listener: () => void): this;
	public off(event: string, listener: (...args: any[]) => void): this {
		return super.off(event, listener);
	}

	public emit(event: "input", line: string): boolean;
	public emit(event: "close"): boolean;
	public emit(event: "error", err: Error): boolean;
	public emit(event: "drain"): boolean;
	public emit(event: string, ...args: unknown[]): boolean {
		return super.emit(event, ...args);
	}

	private setupSocketHandlers(): void {
		this.socket.on("data", (data: Buffer | string) => {
			this.handleData(typeof data === "string" ? Buffer.from(data) : data);
		});

		this.socket.on("drain", () => {
			this.emit("drain");
		});

		this.socket.on("close", () => {
			this.closed = true;
			logger.debug(`Client disconnected: ${this.getAddress()}`);
			this.emit("close");
		});

		this.socket.on("error", (error: Error) => {
			logger.error(`Client error (${this.getAddress()}): ${error.message}`);
			this.emit("error", error);
		});
	}

	private handleData(data: Buffer): void {
		const cleaned = this.filter.process(data);
		this.buffer += this.decoder.write(cleaned).replace(/[\r\0]/g, "");

		let newlineIndex: number;
		while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
			const line = this.buffer.substring(0, newlineIndex).trim();
			this.buffer = this.buffer.substring(newlineIndex + 1);
			if (this.discarding || line.length > MAX_LINE_LENGTH) {
				this.discarding = false;
				continue;
			}
			logger.debug(`Client input (${this.getAddress()}): ${line}`);
			this.emit("input", line);
		}

		if (this.buffer.length > MAX_LINE_LENGTH) {
			logger.warn(
				`Discarding over-long line from ${this.getAddress()} (${this.buffer.length} chars)`
			);
			this.buffer = "";
			this.discarding = true;
		}
	}

	/**
	 * Write raw text to the client.
	 *
	 * @returns `false` when the transport wants the caller to wait for `drain`
	 * (or when the connection is gone), `true` otherwise.
	 */
	public write(text: string): boolean {
		if (!this.isConnected()) return false;
		return this.socket.write(text);
	}

	/**
	 * Close the connection once everything written so far is flushed.
	 */
	public close(): void {
		if (this.closed || this.socket.destroyed) return;
		this.closed = true;
		this.socket.end(() => {
			this.socket.destroy();
		});
	}

	public getAddress(): string {
		if (this.socket instanceof Socket)
			return `${this.socket.remoteAddress}:${this.socket.remotePort}`;
		return "local";
	}

	public isConnected(): boolean {
		return !this.closed && !this.socket.destroyed && this.socket.writable;
	}
}

/**
 * A lightweight TCP server. It exposes the following events: `listening`,
 * `connection` (MudClient), `error` and `close`.
 *
 * Example
 * ```ts
 * const server = new MudServer();
 * server.on('connection', (client) => {
 *   client.on('input', (line) => client.write(`Echo: ${line}${LINEBREAK}`));
 * });
 * await server.start(2323, "0.0.0.0");
 * ```
 */
export class MudServer extends EventEmitter {
	private server: Server;
	private clients: Set<StandardMudClient> = new Set();
	private isListening: boolean = false;

	constructor() {
		super();
		this.server = createServer((socket: Socket) => {
			this.handleConnection(socket);
		});

		this.setupServerHandlers();
	}

	public on(event: "listening", listener: () => void): this;
	public on(event: "connection", listener: (client: MudClient) => void): this;
	public on(event: "error", listener: (err: Error) => void): this;
	public on(event: "close", listener: () => void): this;
	public on(event: string, listener: (...args: any[]) => void): this {
		return super.on(event, listener);
	}

	public once(event: "listening", listener: () => void): this;
	public once(event: "connection", listener: (client: MudClient) => void): this;
	public once(event: "error", listener: (err: Error) => void): this;
	public once(event: "close", listener: () => void): this;
	public once(event: string, listener: (...args: any[]) => void): this {
		return super.once(event, listener);
	}

	public emit(event: "listening"): boolean;
	public emit(event: "connection", client: MudClient): boolean;
	public emit(event: "error", err: Error): boolean;
	public emit(event: "close"): boolean;
	public emit(event: string, ...args: unknown[]): boolean {
		return super.emit(event, ...args);
	}

	private setupServerHandlers(): void {
		this.server.on("listening", () => {
			this.isListening = true;
			logger.info(`Server listening on port ${this.getPort()}`);
			this.emit("listening");
		});

		this.server.on("error", (error: Error) => {
			logger.error(`Server error: ${error.message}`);
			// the start() promise reports bind failures itself
			if (this.isListening) this.emit("error", error);
		});

		this.server.on("close", () => {
			this.isListening = false;
			logger.info("Server closed");
			this.emit("close");
		});
	}

	private handleConnection(socket: Socket): void {
		const client = new StandardMudClient(socket);
		this.clients.add(client);

		logger.info(
			`Client connected: ${client.getAddress()} (${this.clients.size} total)`
		);

		client.on("close", () => {
			this.clients.delete(client);
			logger.info(
				`Client disconnected: ${client.getAddress()} (${
					this.clients.size
				} remaining)`
			);
		});

		client.on("error", (err) => {
			logger.info(`Client error: ${err}`);
		});

		this.emit("connection", client);
	}

	/**
	 * Start the server on the specified port
	 * @param port The port number to listen on
	 * @param host Optional host to bind to (defaults to all interfaces)
	 */
	public start(port: number, host?: string): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.isListening) {
				reject(new Error("Server is already listening"));
				return;
			}

			this.server.once("error", reject);
			this.server.listen(port, host, () => {
				this.server.removeListener("error", reject);
				resolve();
			});
		});
	}

	/**
	 * Stop the server and disconnect all clients
	 */
	public stop(): Promise<void> {
		return new Promise((resolve, reject) => {
			if (!this.isListening) {
				resolve();
				return;
			}

			logger.debug(`Closing ${this.clients.size} client connections`);
			for (const client of this.clients) client.close();

			this.server.close((err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	/**
	 * The port actually bound, which differs from the requested one when
	 * listening on port 0.
	 */
	public getPort(): number | undefined {
		const address = this.server.address();
		if (address === null || typeof address === "string") return undefined;
		return address.port;
	}
}
