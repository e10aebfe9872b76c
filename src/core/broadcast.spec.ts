import { suite, test, beforeEach } from "node:test";
import assert from "node:assert";
import { BroadcastRouter, PROMPT, render } from "./broadcast.js";
import { directEvent, globalEvent, roomEvent } from "./event.js";
import { MockClient } from "./mock-client.js";
import { Session } from "./session.js";
import { World } from "./world.js";

function createWorld(): World {
	return new World(
		{
			rooms: [
				{ id: "Plaza", name: "The Plaza", description: "Stone.", exits: { east: "River" } },
				{ id: "River", name: "The River", description: "Water.", exits: { west: "Plaza" } },
			],
			npcs: [],
			items: [],
		},
		{ startRoom: "Plaza" }
	);
}

suite("core/broadcast.ts", () => {
	test("render should end every line with CRLF and add the prompt", () => {
		assert.strictEqual(render(["[Room] bob: hi"]), "[Room] bob: hi\r\n> ");
		assert.strictEqual(render(["a\nb", "c"]), "a\r\nb\r\nc\r\n> ");
		assert.strictEqual(render([]), PROMPT);
	});

	suite("BroadcastRouter", () => {
		let world: World;
		let sessions: Map<string, Session>;
		let clients: Map<string, MockClient>;
		let router: BroadcastRouter;

		function join(id: string, username: string, roomId: string): void {
			const client = new MockClient();
			const session = new Session(
				id,
				client,
				{ queueLimit: 8, overflowPolicy: "drop-oldest" },
				{ line() {}, async teardown() {} }
			);
			sessions.set(id, session);
			clients.set(id, client);
			world.registerPlayer(id, username, roomId);
		}

		function output(id: string): string {
			return clients.get(id)?.output() ?? "";
		}

		beforeEach(() => {
			world = createWorld();
			sessions = new Map();
			clients = new Map();
			router = new BroadcastRouter(world, sessions);
			join("s1", "alice", "Plaza");
			join("s2", "bob", "Plaza");
			join("s3", "carol", "River");
		});

		test("should deliver room events to the room only, minus the excluded", () => {
			router.publish(roomEvent("Plaza", "[Room] alice: hi", "s1"));
			assert.strictEqual(output("s1"), "");
			assert.strictEqual(output("s2"), "[Room] alice: hi\r\n> ");
			assert.strictEqual(output("s3"), "");
		});

		test("should deliver global events to every player", () => {
			router.publish(globalEvent("[Global] carol: hello"));
			for (const id of ["s1", "s2", "s3"])
				assert.strictEqual(output(id), "[Global] carol: hello\r\n> ");
		});

		test("should deliver direct events to one session", () => {
			router.publish(directEvent("s3", "alice whispers to you: psst"));
			assert.strictEqual(output("s3"), "alice whispers to you: psst\r\n> ");
			assert.strictEqual(output("s1"), "");
		});

		test("should resolve recipients when publishing, not when the event was built", () => {
			const event = roomEvent("River", "The barge horn sounds.");
			world.move("s1", "east");
			router.publish(event);
			assert.strictEqual(output("s1"), "The barge horn sounds.\r\n> ");
		});

		test("should keep delivering when one recipient is gone", async () => {
			const gone = sessions.get("s2");
			clients.get("s2")?.close();
			router.publishAll([
				globalEvent("first"),
				globalEvent("second"),
			]);
			assert.strictEqual(output("s1"), "first\r\n> second\r\n> ");
			assert.strictEqual(output("s3"), "first\r\n> second\r\n> ");
			assert.strictEqual(output("s2"), "");
			await gone?.close("test");
		});

		test("should skip players without a live session", () => {
			sessions.delete("s2");
			assert.deepStrictEqual(
				router.recipients({ kind: "room", roomId: "Plaza" }).map((s) => s.id),
				["s1"]
			);
		});
	});
});
