/**
 * In-process stand-in for a network client, used by the test suites.
 *
 * @module core/mock-client
 */

import { EventEmitter } from "events";
import { MudClient } from "./io.js";

export class MockClient extends EventEmitter implements MudClient {
	/** Every chunk written, in order. */
	readonly written: string[] = [];
	/** When false, `write()` reports backpressure until `drain()`. */
	accepting = true;
	private connected = true;

	write(text: string): boolean {
		if (!this.connected) return false;
		this.written.push(text);
		return this.accepting;
	}

	close(): void {
		if (!this.connected) return;
		this.connected = false;
		this.emit("close");
	}

	getAddress(): string {
		return "mock";
	}

	isConnected(): boolean {
		return this.connected;
	}

	/** Simulate the user typing one line. */
	type(line: string): void {
		this.emit("input", line);
	}

	/** Simulate the transport catching up. */
	drain(): void {
		this.accepting = true;
		this.emit("drain");
	}

	/** Everything written so far as one string. */
	output(): string {
		return this.written.join("");
	}

	/** Forget what has been written. */
	clear(): void {
		this.written.length = 0;
	}
}
