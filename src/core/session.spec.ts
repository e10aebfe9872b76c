import { suite, test } from "node:test";
import assert from "node:assert";
import { Session, SESSION_STATE, SessionHandlers, SessionOptions } from "./session.js";
import { MockClient } from "./mock-client.js";
import { InvariantViolation, TransportError } from "./errors.js";

const OPTIONS: SessionOptions = { queueLimit: 8, overflowPolicy: "drop-oldest" };

interface Recorder extends SessionHandlers {
	lines: string[];
	teardowns: boolean[];
}

function recorder(line?: (session: Session, line: string) => Promise<void>): Recorder {
	const lines: string[] = [];
	const teardowns: boolean[] = [];
	return {
		lines,
		teardowns,
		line:
			line ??
			((_session, text) => {
				lines.push(text);
			}),
		async teardown(_session, wasActive) {
			teardowns.push(wasActive);
		},
	};
}

function wait(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

suite("core/session.ts", () => {
	suite("output", () => {
		test("should write delivered text in order", () => {
			const client = new MockClient();
			const session = new Session("s1", client, OPTIONS, recorder());
			session.send("one");
			session.sendLine("two");
			assert.deepStrictEqual(client.written, ["one", "two\r\n"]);
			assert.strictEqual(session.queued, 0);
		});

		test("should hold output while the transport is backed up", () => {
			const client = new MockClient();
			const session = new Session("s1", client, OPTIONS, recorder());
			client.accepting = false;
			session.send("a");
			session.send("b");
			session.send("c");
			assert.deepStrictEqual(client.written, ["a"]);
			assert.strictEqual(session.queued, 2);
			client.drain();
			assert.deepStrictEqual(client.written, ["a", "b", "c"]);
			assert.strictEqual(session.queued, 0);
		});

		test("should drop the oldest queued chunk when full", () => {
			const client = new MockClient();
			const session = new Session(
				"s1",
				client,
				{ queueLimit: 2, overflowPolicy: "drop-oldest" },
				recorder()
			);
			client.accepting = false;
			for (const chunk of ["a", "b", "c", "d"]) session.send(chunk);
			assert.strictEqual(session.droppedCount, 1);
			client.drain();
			assert.deepStrictEqual(client.written, ["a", "c", "d"]);
		});

		test("should refuse to queue past the limit under the disconnect policy", () => {
			const client = new MockClient();
			const session = new Session(
				"s1",
				client,
				{ queueLimit: 2, overflowPolicy: "disconnect" },
				recorder()
			);
			client.accepting = false;
			for (const chunk of ["a", "b", "c"]) session.send(chunk);
			assert.throws(() => session.send("d"), TransportError);
			assert.strictEqual(session.queued, 2);
		});

		test("should refuse delivery once closing", async () => {
			const client = new MockClient();
			const session = new Session("s1", client, OPTIONS, recorder());
			await session.close("test");
			assert.throws(() => session.send("late"), TransportError);
		});
	});

	suite("input", () => {
		test("should handle lines strictly in order", async () => {
			const client = new MockClient();
			const seen: string[] = [];
			const session = new Session(
				"s1",
				client,
				OPTIONS,
				recorder(async (_session, line) => {
					if (line === "slow") await wait(20);
					seen.push(line);
				})
			);
			client.type("slow");
			client.type("fast");
			await session.idle();
			assert.deepStrictEqual(seen, ["slow", "fast"]);
		});

		test("should route the next line to a pending question", async () => {
			const client = new MockClient();
			const handlers = recorder();
			const session = new Session("s1", client, OPTIONS, handlers);
			let answer = "";
			session.ask("Username:", (line) => {
				answer = line;
			});
			client.type("alice");
			client.type("look");
			await session.idle();
			assert.strictEqual(client.output(), "Username: ");
			assert.strictEqual(answer, "alice");
			assert.deepStrictEqual(handlers.lines, ["look"]);
		});

		test("should keep going after a handler fails", async () => {
			const client = new MockClient();
			const seen: string[] = [];
			const session = new Session(
				"s1",
				client,
				OPTIONS,
				recorder(async (_session, line) => {
					if (line === "bad") throw new Error("handler failure");
					seen.push(line);
				})
			);
			client.type("bad");
			client.type("good");
			await session.idle();
			assert.deepStrictEqual(seen, ["good"]);
		});
	});

	suite("lifecycle", () => {
		test("should follow the login state machine", () => {
			const session = new Session("s1", new MockClient(), OPTIONS, recorder());
			assert.strictEqual(session.state, SESSION_STATE.CONNECTED);
			assert.throws(() => session.activate("alice"), InvariantViolation);
			session.transition(SESSION_STATE.AUTHENTICATING);
			session.transition(SESSION_STATE.CONNECTED);
			session.transition(SESSION_STATE.AUTHENTICATING);
			session.activate("alice");
			assert.strictEqual(session.authenticated, true);
			assert.strictEqual(session.username, "alice");
			assert.throws(
				() => session.transition(SESSION_STATE.CONNECTED),
				InvariantViolation
			);
		});

		test("should tear down once however often it is closed", async () => {
			const client = new MockClient();
			const handlers = recorder();
			const session = new Session("s1", client, OPTIONS, handlers);
			session.transition(SESSION_STATE.AUTHENTICATING);
			session.activate("alice");
			const first = session.close("quit");
			const second = session.close("again");
			assert.strictEqual(first, second);
			await first;
			assert.deepStrictEqual(handlers.teardowns, [true]);
			assert.strictEqual(session.state, SESSION_STATE.CLOSED);
			assert.strictEqual(client.isConnected(), false);
		});

		test("should tear down when the client goes away", async () => {
			const client = new MockClient();
			const handlers = recorder();
			const session = new Session("s1", client, OPTIONS, handlers);
			client.close();
			await session.close("already closing");
			assert.deepStrictEqual(handlers.teardowns, [false]);
			assert.strictEqual(session.state, SESSION_STATE.CLOSED);
		});

		test("should flush queued output before closing", async () => {
			const client = new MockClient();
			const session = new Session("s1", client, OPTIONS, recorder());
			client.accepting = false;
			session.send("a");
			session.send("Goodbye!");
			await session.close("quit");
			assert.deepStrictEqual(client.written, ["a", "Goodbye!"]);
		});

		test("should close idle sessions", async () => {
			const client = new MockClient();
			const handlers = recorder();
			const session = new Session(
				"s1",
				client,
				{ ...OPTIONS, inactivityTimeoutMs: 10 },
				handlers
			);
			await wait(50);
			await session.close("test");
			assert.strictEqual(client.output(), "You have been idle too long. Goodbye!\r\n");
			assert.deepStrictEqual(handlers.teardowns, [false]);
		});
	});
});
