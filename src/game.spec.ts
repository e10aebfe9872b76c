import { suite, test, before, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Game } from "./game.js";
import { CommandRegistry } from "./core/command.js";
import { MockClient } from "./core/mock-client.js";
import { Session, SESSION_STATE } from "./core/session.js";
import { WorldDefinition } from "./core/world.js";
import { AccountStore } from "./package/account.js";
import { loadCommands } from "./package/commands.js";
import { defaultConfig } from "./registry/config.js";

const DEFINITION: WorldDefinition = {
	rooms: [
		{ id: "Plaza", name: "The Plaza", description: "Stone.", exits: { east: "River" } },
		{ id: "River", name: "The River", description: "Water.", exits: { west: "Plaza" } },
	],
	npcs: [],
	items: [],
};

interface Player {
	client: MockClient;
	session: Session;
}

suite("game.ts", () => {
	let registry: CommandRegistry;
	let directory: string;
	let game: Game;

	before(async () => {
		registry = new CommandRegistry();
		await loadCommands(registry);
	});

	beforeEach(async () => {
		directory = await mkdtemp(join(tmpdir(), "samud-game-"));
		const config = defaultConfig();
		config.world.start_room = "Plaza";
		game = new Game({
			definition: DEFINITION,
			accounts: new AccountStore(directory),
			registry,
			config,
		});
	});

	afterEach(async () => {
		await game.stop();
		await rm(directory, { recursive: true, force: true });
	});

	function connect(): Player {
		const client = new MockClient();
		return { client, session: game.connect(client) };
	}

	async function type(player: Player, ...lines: string[]): Promise<void> {
		for (const line of lines) player.client.type(line);
		await player.session.idle();
	}

	async function signup(username: string): Promise<Player> {
		const player = connect();
		await type(player, "signup", username, "test-secret");
		player.client.clear();
		return player;
	}

	test("should greet a new connection", () => {
		const { client } = connect();
		assert.deepStrictEqual(client.written, [
			"Welcome to the San Antonio MUD\r\nType 'login' to sign in or 'signup' to create a new account\r\n> ",
		]);
		assert.strictEqual(game.sessionCount, 1);
	});

	test("should refuse everything but login, signup, help and quit before login", async () => {
		const player = connect();
		player.client.clear();
		await type(player, "dance", "who", "");
		assert.deepStrictEqual(player.client.written, [
			"Please type 'login', 'signup', or 'quit'\r\n> ",
			"You need to log in first. Type 'login' or 'signup'.\r\n> ",
			"> ",
		]);
	});

	test("should let a visitor quit before logging in", async () => {
		const player = connect();
		player.client.clear();
		await type(player, "quit");
		assert.deepStrictEqual(player.client.written, ["Goodbye!\r\n> "]);
		assert.strictEqual(player.client.isConnected(), false);
		assert.strictEqual(player.session.state, SESSION_STATE.CLOSED);
		assert.strictEqual(game.sessionCount, 0);
	});

	test("should sign up a new player into the start room", async () => {
		const player = connect();
		player.client.clear();
		await type(player, "signup", "alice", "test-secret");
		assert.strictEqual(player.client.written[0], "Choose a username: ");
		assert.strictEqual(player.client.written[1], "Choose a password: ");
		assert.ok(
			player.client.written[2].startsWith(
				"Account created! Welcome to the San Antonio MUD, alice!\r\n\r\n=== WELCOME GUIDE ===\r\n"
			)
		);
		assert.ok(
			player.client.written[2].endsWith(
				"=====================\r\n\r\nThe Plaza\r\nStone.\r\nExits: east\r\nPlayers here: none\r\nNPCs here: none\r\nItems here: none\r\n> "
			)
		);
		assert.strictEqual(player.session.state, SESSION_STATE.ACTIVE);
		assert.deepStrictEqual(game.world.who(), ["alice"]);
	});

	test("should send a failed signup back to the welcome prompt", async () => {
		const player = connect();
		player.client.clear();
		await type(player, "signup", "al", "test-secret");
		assert.deepStrictEqual(player.client.written.slice(2), [
			"Signup failed: Username must be 3-16 characters: letters, numbers, underscore\r\nType 'signup' to try again or 'login' to sign in\r\n> ",
		]);
		assert.strictEqual(player.session.state, SESSION_STATE.CONNECTED);
	});

	test("should reject a wrong password", async () => {
		const alice = await signup("alice");
		await type(alice, "quit");

		const player = connect();
		player.client.clear();
		await type(player, "login", "alice", "wrong-secret");
		assert.deepStrictEqual(player.client.written, [
			"Username: ",
			"Password: ",
			"Login failed: Invalid username or password\r\nType 'login' to try again or 'signup' to create account\r\n> ",
		]);
		assert.strictEqual(player.session.state, SESSION_STATE.CONNECTED);
	});

	test("should not let one account play twice", async () => {
		await signup("alice");
		const second = connect();
		second.client.clear();
		await type(second, "login", "ALICE", "test-secret");
		assert.strictEqual(
			second.client.written[2],
			"Login failed: That character is already playing.\r\nType 'login' to try again or 'signup' to create account\r\n> "
		);
		assert.deepStrictEqual(game.world.who(), ["alice"]);
	});

	test("should refuse a second login on an active session", async () => {
		const alice = await signup("alice");
		await type(alice, "login");
		assert.deepStrictEqual(alice.client.written, ["You are already logged in.\r\n> "]);
	});

	test("should keep room chat in the room and shouts global", async () => {
		const alice = await signup("alice");
		const bob = await signup("bob");
		assert.deepStrictEqual(alice.client.written, ["bob has entered the game.\r\n> "]);

		await type(alice, "e");
		assert.deepStrictEqual(bob.client.written, ["alice leaves east.\r\n> "]);

		alice.client.clear();
		bob.client.clear();
		await type(bob, "say hi");
		assert.deepStrictEqual(bob.client.written, [
			"[Room] bob: hi\r\n(No one else is here to hear you)\r\n> ",
		]);
		assert.deepStrictEqual(alice.client.written, []);

		bob.client.clear();
		await type(bob, "shout hi");
		assert.deepStrictEqual(bob.client.written, ["[Global] bob: hi\r\n> "]);
		assert.deepStrictEqual(alice.client.written, ["[Global] bob: hi\r\n> "]);
	});

	test("should tell the room when a player drops connection", async () => {
		const alice = await signup("alice");
		const bob = await signup("bob");
		alice.client.clear();
		bob.client.close();
		await bob.session.close("test");
		assert.deepStrictEqual(alice.client.written, ["bob has left the game.\r\n> "]);
		assert.deepStrictEqual(game.world.who(), ["alice"]);
	});

	test("should drop a backed-up player when their queue overflows", async () => {
		await game.stop();
		const config = defaultConfig();
		config.world.start_room = "Plaza";
		config.server.outbound_queue_limit = 2;
		config.server.overflow_policy = "disconnect";
		game = new Game({
			definition: DEFINITION,
			accounts: new AccountStore(directory),
			registry,
			config,
		});

		const alice = await signup("alice");
		const bob = await signup("bob");
		await type(bob, "east");
		bob.client.accepting = false;

		await type(alice, "shout one", "shout two", "shout three", "shout four");
		await bob.session.close("test");

		assert.strictEqual(bob.session.state, SESSION_STATE.CLOSED);
		assert.strictEqual(bob.client.isConnected(), false);
		assert.deepStrictEqual(game.world.who(), ["alice"]);
		assert.strictEqual(game.sessionCount, 1);
		assert.strictEqual((await game.accounts.find("bob"))?.room, "River");
	});

	test("should save the location on quit and restore it on login", async () => {
		const alice = await signup("alice");
		await type(alice, "east", "quit");
		assert.strictEqual(
			alice.client.written[alice.client.written.length - 1],
			"Goodbye! Your location has been saved.\r\n> "
		);
		assert.strictEqual((await game.accounts.find("alice"))?.room, "River");

		const again = connect();
		again.client.clear();
		await type(again, "login", "alice", "test-secret");
		assert.ok(
			again.client.written[2].startsWith("Welcome back, alice!\r\n\r\nThe River\r\nWater.\r\n")
		);
		assert.strictEqual(game.world.whereIs(again.session.id).id, "River");
	});

	test("should say goodbye to everyone on shutdown", async () => {
		const alice = await signup("alice");
		const visitor = connect();
		visitor.client.clear();
		await game.stop();
		assert.deepStrictEqual(alice.client.written, [
			"The server is shutting down. Goodbye!\r\n> ",
		]);
		assert.deepStrictEqual(visitor.client.written, [
			"The server is shutting down. Goodbye!\r\n> ",
		]);
		assert.strictEqual(game.sessionCount, 0);
		assert.strictEqual((await game.accounts.find("alice"))?.room, "Plaza");
	});
});
