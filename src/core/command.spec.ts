import { suite, test, beforeEach } from "node:test";
import assert from "node:assert";
import {
	CommandActor,
	CommandContext,
	CommandRegistry,
	ParseResult,
	splitVerb,
} from "./command.js";
import { ObjectCommand } from "../package/commands.js";
import { World } from "./world.js";
import { InvariantViolation, NotFoundError } from "./errors.js";
import { roomEvent } from "./event.js";

function createWorld(): World {
	return new World(
		{
			rooms: [
				{ id: "Plaza", name: "The Plaza", description: "Stone.", exits: {} },
			],
			npcs: [],
			items: [],
		},
		{ startRoom: "Plaza" }
	);
}

const alice: CommandActor = { id: "s1", username: "alice", authenticated: true };
const stranger: CommandActor = { id: "s9", authenticated: false };

suite("core/command.ts", () => {
	suite("Command", () => {
		test("should parse a text argument", () => {
			const command = new ObjectCommand({
				pattern: "say <message:text>",
				execute() {},
			});
			const result = command.parse("say", "hello there");
			assert.strictEqual(result.success, true);
			assert.strictEqual(result.args.get("message"), "hello there");
		});

		test("should parse a quoted word followed by optional text", () => {
			const command = new ObjectCommand({
				pattern: "talk <npc:word> <keyword:text?>",
				execute() {},
			});
			const quoted = command.parse("talk", '"chef isabella" food');
			assert.strictEqual(quoted.args.get("npc"), "chef isabella");
			assert.strictEqual(quoted.args.get("keyword"), "food");

			const bare = command.parse("TALK", "maria");
			assert.strictEqual(bare.success, true);
			assert.strictEqual(bare.args.get("npc"), "maria");
			assert.strictEqual(bare.args.has("keyword"), false);
		});

		test("should normalize direction arguments", () => {
			const command = new ObjectCommand({
				pattern: "look <direction:direction?>",
				execute() {},
			});
			assert.strictEqual(command.parse("look", "N").args.get("direction"), "north");
			assert.strictEqual(command.parse("look", "").success, true);
			assert.deepStrictEqual(command.parse("look", "sideways"), {
				success: false,
				args: new Map(),
				error: "Could not parse argument: direction",
			});
		});

		test("should report a missing required argument by name", () => {
			const command = new ObjectCommand({
				pattern: "whisper <target:word> <message:text>",
				execute() {},
			});
			assert.strictEqual(
				command.parse("whisper", "bob").error,
				"Missing required argument: message"
			);
		});

		test("should parse aliases under their own verb", () => {
			const command = new ObjectCommand({
				pattern: "get <item:text>",
				aliases: ["take <item:text>"],
				execute() {},
			});
			assert.deepStrictEqual(command.verbs, ["get", "take"]);
			assert.strictEqual(command.parse("take", "brochure").args.get("item"), "brochure");
		});

		test("should derive a usage line from the pattern", () => {
			const command = new ObjectCommand({
				pattern: "talk <npc:word> <keyword:text?>",
				execute() {},
			});
			assert.strictEqual(command.usage(), "Usage: talk <npc> [keyword]");
		});

		test("should reject unknown argument types", () => {
			assert.throws(
				() => new ObjectCommand({ pattern: "fly <where:place>", execute() {} }),
				/Unknown argument type 'place'/
			);
		});
	});

	test("splitVerb should split on the first whitespace run", () => {
		assert.deepStrictEqual(splitVerb("  say   hello  world "), {
			verb: "say",
			rest: "hello  world",
		});
		assert.deepStrictEqual(splitVerb("   "), { verb: "", rest: "" });
	});

	suite("CommandRegistry", () => {
		let registry: CommandRegistry;
		let world: World;

		beforeEach(() => {
			registry = new CommandRegistry();
			world = createWorld();
			world.registerPlayer("s1", "alice");
		});

		test("should refuse a verb that is already registered", () => {
			registry.register(new ObjectCommand({ pattern: "look", execute() {} }));
			assert.throws(
				() =>
					registry.register(
						new ObjectCommand({ pattern: "glance", aliases: ["look"], execute() {} })
					),
				/Verb 'look'/
			);
		});

		test("should look verbs up case-insensitively and forget unregistered ones", () => {
			const command = new ObjectCommand({
				pattern: "inventory",
				aliases: ["i"],
				execute() {},
			});
			registry.register(command);
			assert.strictEqual(registry.lookup("I"), command);
			registry.unregister(command);
			assert.strictEqual(registry.lookup("i"), undefined);
			assert.deepStrictEqual(registry.getCommands(), []);
		});

		test("should collect replies and events from a command", () => {
			registry.register(
				new ObjectCommand({
					pattern: "wave",
					execute(context: CommandContext) {
						context.reply("You wave.");
						context.publish(roomEvent("Plaza", "alice waves.", context.actor.id));
					},
				})
			);
			const result = registry.dispatch(alice, "wave", world);
			assert.deepStrictEqual(result.replies, ["You wave."]);
			assert.deepStrictEqual(result.events, [
				roomEvent("Plaza", "alice waves.", "s1"),
			]);
			assert.strictEqual(result.disconnect, false);
		});

		test("should ignore blank lines", () => {
			assert.deepStrictEqual(registry.dispatch(alice, "   ", world), {
				replies: [],
				events: [],
				disconnect: false,
			});
		});

		test("should point unknown verbs at help", () => {
			assert.deepStrictEqual(registry.dispatch(alice, "dance wildly", world).replies, [
				"Unknown command: dance wildly",
				"Type 'help' for available commands.",
			]);
		});

		test("should refuse commands that need a login", () => {
			let executed = false;
			registry.register(
				new ObjectCommand({
					pattern: "who",
					execute() {
						executed = true;
					},
				})
			);
			const result = registry.dispatch(stranger, "who", world);
			assert.strictEqual(executed, false);
			assert.deepStrictEqual(result.replies, [
				"You need to log in first. Type 'login' or 'signup'.",
			]);
		});

		test("should answer a parse failure with usage or the command's handler", () => {
			registry.register(
				new ObjectCommand({ pattern: "say <message:text>", execute() {} })
			);
			registry.register(
				new ObjectCommand({
					pattern: "shout <message:text>",
					execute() {},
					onError(context: CommandContext, result: ParseResult) {
						context.reply(`Shout what? (${result.error})`);
					},
				})
			);
			assert.deepStrictEqual(registry.dispatch(alice, "say", world).replies, [
				"Usage: say <message>",
			]);
			assert.deepStrictEqual(registry.dispatch(alice, "shout", world).replies, [
				"Shout what? (Missing required argument: message)",
			]);
		});

		test("should reply with user-facing errors and drop queued events", () => {
			registry.register(
				new ObjectCommand({
					pattern: "grab <item:text>",
					execute(context: CommandContext) {
						context.publish(roomEvent("Plaza", "never sent"));
						throw new NotFoundError("sword", "There's no 'sword' here to get.");
					},
				})
			);
			const result = registry.dispatch(alice, "grab sword", world);
			assert.deepStrictEqual(result.replies, ["There's no 'sword' here to get."]);
			assert.deepStrictEqual(result.events, []);
		});

		test("should contain internal errors", () => {
			registry.register(
				new ObjectCommand({
					pattern: "break",
					execute() {
						throw new InvariantViolation("test violation");
					},
				})
			);
			registry.register(
				new ObjectCommand({
					pattern: "crash",
					execute() {
						throw new Error("boom");
					},
				})
			);
			for (const line of ["break", "crash"])
				assert.deepStrictEqual(registry.dispatch(alice, line, world).replies, [
					"Something went wrong. Please try again.",
				]);
		});

		test("should pass disconnect requests through", () => {
			registry.register(
				new ObjectCommand({
					pattern: "quit",
					requiresAuth: false,
					execute(context: CommandContext) {
						context.disconnect();
					},
				})
			);
			assert.strictEqual(registry.dispatch(stranger, "quit", world).disconnect, true);
		});
	});
});
