/**
 * World model: the single in-memory graph of rooms, NPCs, items and the
 * players currently in the game.
 *
 * What you get
 * - `World`: owns all mutable world state behind an explicit operation set
 *   (`move`, `lookAt`, `say`, `shout`, `takeItem`, `dropItem`, `talk`, `who`,
 *   `tickAdvanceNpcs`, player registration)
 * - Definition types (`WorldDefinition` and friends) used by the world loader
 * - Read-only views (`RoomView`, `ItemView`, `DialogueLine`, `MoveResult`)
 *
 * Atomicity
 * Every operation is a synchronous method. Nothing inside an operation
 * awaits, so on the event loop no other operation can observe it half
 * applied; the world as a whole is the mutual-exclusion domain. Operations
 * validate first and mutate last, so a thrown error leaves no partial change.
 *
 * Invariants (checked by `checkInvariants()`)
 * - (a) every player's room exists
 * - (b) a username is registered at most once
 * - (c) every item has exactly one owner: a room or a registered player
 * - (d) room occupant sets are the exact inverse of the location fields
 *
 * @module core/world
 */

import { DIRECTION, dir2reverse, isDirection, text2dir } from "../direction.js";
import { matchByName } from "../utils/match.js";
import {
	AlreadyPlayingError,
	AmbiguousError,
	InvariantViolation,
	NoSuchExitError,
	NoSuchNpcError,
	NotAuthenticatedError,
	NotFoundError,
	NotInRoomError,
} from "./errors.js";
import { GameEvent, globalEvent, roomEvent } from "./event.js";
import logger from "../logger.js";

export interface RoomDefinition {
	id: string;
	name: string;
	description: string;
	exits: Partial<Record<DIRECTION, string>>;
}

/**
 * NPCs with a wander policy drift between the listed rooms on each tick,
 * moving only through exits whose target is in `rooms`.
 */
export interface WanderPolicy {
	rooms: string[];
	/** Chance (0..1) to move on a given tick. Falls back to the world default. */
	chance?: number;
}

export interface NpcDefinition {
	id: string;
	name: string;
	description: string;
	room: string;
	greeting: string;
	responses: Record<string, string>;
	wander?: WanderPolicy;
}

export interface ItemDefinition {
	id: string;
	name: string;
	description: string;
	room: string;
}

export interface WorldDefinition {
	rooms: RoomDefinition[];
	npcs: NpcDefinition[];
	items: ItemDefinition[];
}

export interface WorldOptions {
	/** Room for players without a usable saved location. */
	startRoom: string;
	/** Default per-tick move chance for wandering NPCs. */
	wanderChance?: number;
	/** Source of randomness for NPC movement; defaults to `Math.random`. */
	random?: () => number;
}

export type ItemOwner =
	| { readonly kind: "room"; readonly roomId: string }
	| { readonly kind: "player"; readonly sessionId: string };

export interface ItemView {
	readonly id: string;
	readonly name: string;
	readonly description: string;
}

export interface NpcView {
	readonly id: string;
	readonly name: string;
	readonly description: string;
}

export interface RoomView {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly exits: readonly DIRECTION[];
	readonly otherOccupantNames: readonly string[];
	readonly npcNames: readonly string[];
	readonly itemNames: readonly string[];
	readonly npcs: readonly NpcView[];
	readonly items: readonly ItemView[];
}

export interface MoveResult {
	readonly direction: DIRECTION;
	readonly from: { readonly id: string; readonly name: string };
	readonly to: RoomView;
}

export interface DialogueLine {
	readonly npc: NpcView;
	readonly keyword?: string;
	readonly text: string;
}

export interface PlayerView {
	readonly sessionId: string;
	readonly username: string;
	readonly roomId: string;
}

interface RoomState {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly exits: ReadonlyMap<DIRECTION, string>;
	readonly players: Set<string>;
	readonly npcs: Set<string>;
	readonly items: Set<string>;
}

interface NpcState {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	readonly greeting: string;
	readonly responses: ReadonlyMap<string, string>;
	readonly wander?: Readonly<WanderPolicy>;
	roomId: string;
}

interface ItemState {
	readonly id: string;
	readonly name: string;
	readonly description: string;
	owner: ItemOwner;
}

interface PlayerState {
	readonly sessionId: string;
	readonly username: string;
	readonly inventory: Set<string>;
	roomId: string;
}

export class World {
	private readonly rooms = new Map<string, RoomState>();
	private readonly npcs = new Map<string, NpcState>();
	private readonly items = new Map<string, ItemState>();
	/** Registered players in login order. */
	private readonly players = new Map<string, PlayerState>();
	private readonly startRoom: string;
	private readonly wanderChance: number;
	private readonly random: () => number;

	constructor(definition: WorldDefinition, options: WorldOptions) {
		for (const room of definition.rooms) {
			if (this.rooms.has(room.id))
				throw new InvariantViolation(`Duplicate room id: ${room.id}`);
			const exits = new Map<DIRECTION, string>();
			for (const [key, target] of Object.entries(room.exits)) {
				if (!isDirection(key) || target === undefined) continue;
				exits.set(key, target);
			}
			this.rooms.set(room.id, {
				id: room.id,
				name: room.name,
				description: room.description,
				exits,
				players: new Set(),
				npcs: new Set(),
				items: new Set(),
			});
		}

		for (const room of this.rooms.values()) {
			for (const [dir, target] of room.exits) {
				if (!this.rooms.has(target))
					throw new InvariantViolation(
						`Exit ${dir} of ${room.id} leads to unknown room ${target}`
					);
			}
		}

		for (const npc of definition.npcs) {
			const room = this.requireRoom(npc.room);
			if (this.npcs.has(npc.id))
				throw new InvariantViolation(`Duplicate NPC id: ${npc.id}`);
			const responses = new Map<string, string>();
			for (const [keyword, text] of Object.entries(npc.responses))
				responses.set(keyword.toLowerCase(), text);
			this.npcs.set(npc.id, {
				id: npc.id,
				name: npc.name,
				description: npc.description,
				greeting: npc.greeting,
				responses,
				wander: npc.wander
					? { rooms: [...npc.wander.rooms], chance: npc.wander.chance }
					: undefined,
				roomId: room.id,
			});
			room.npcs.add(npc.id);
		}

		for (const item of definition.items) {
			const room = this.requireRoom(item.room);
			if (this.items.has(item.id))
				throw new InvariantViolation(`Duplicate item id: ${item.id}`);
			this.items.set(item.id, {
				id: item.id,
				name: item.name,
				description: item.description,
				owner: { kind: "room", roomId: room.id },
			});
			room.items.add(item.id);
		}

		this.requireRoom(options.startRoom);
		this.startRoom = options.startRoom;
		this.wanderChance = options.wanderChance ?? 0.3;
		this.random = options.random ?? Math.random;
	}

	/**
	 * Register an authenticated player. The player appears in `roomId` when
	 * it names an existing room, otherwise in the start room.
	 *
	 * @throws {AlreadyPlayingError} when the username is already registered
	 */
	registerPlayer(
		sessionId: string,
		username: string,
		roomId?: string
	): PlayerView {
		if (this.players.has(sessionId))
			throw new InvariantViolation(`Session ${sessionId} already registered`);
		if (this.findPlayer(username)) throw new AlreadyPlayingError(username);

		const room =
			(roomId !== undefined ? this.rooms.get(roomId) : undefined) ??
			this.requireRoom(this.startRoom);
		if (roomId !== undefined && room.id !== roomId)
			logger.warn(
				`Saved room ${roomId} for ${username} no longer exists, using ${room.id}`
			);

		const player: PlayerState = {
			sessionId,
			username,
			inventory: new Set(),
			roomId: room.id,
		};
		this.players.set(sessionId, player);
		room.players.add(sessionId);
		return this.toPlayerView(player);
	}

	/**
	 * Remove a player from the world. Anything they carry is left in the room
	 * they were standing in.
	 *
	 * @returns The player's last room, or `undefined` if they were not registered.
	 */
	unregisterPlayer(sessionId: string): string | undefined {
		const player = this.players.get(sessionId);
		if (!player) return undefined;
		const room = this.requireRoom(player.roomId);

		for (const itemId of player.inventory) {
			const item = this.requireItem(itemId);
			item.owner = { kind: "room", roomId: room.id };
			room.items.add(itemId);
		}
		player.inventory.clear();
		room.players.delete(sessionId);
		this.players.delete(sessionId);
		return room.id;
	}

	/**
	 * Case-insensitive lookup of an online player by username.
	 */
	findPlayer(username: string): PlayerView | undefined {
		const needle = username.trim().toLowerCase();
		for (const player of this.players.values()) {
			if (player.username.toLowerCase() === needle)
				return this.toPlayerView(player);
		}
		return undefined;
	}

	/**
	 * Session ids of every player currently in `roomId`.
	 */
	playersIn(roomId: string): string[] {
		const room = this.rooms.get(roomId);
		return room ? [...room.players] : [];
	}

	/**
	 * Session ids of every registered player, in login order.
	 */
	sessionIds(): string[] {
		return [...this.players.keys()];
	}

	/**
	 * Online usernames in login order.
	 */
	who(): string[] {
		return [...this.players.values()].map((player) => player.username);
	}

	whereIs(actor: string): { id: string; name: string } {
		const room = this.requireRoom(this.requirePlayer(actor).roomId);
		return { id: room.id, name: room.name };
	}

	inventoryOf(actor: string): ItemView[] {
		const player = this.requirePlayer(actor);
		return [...player.inventory].map((id) =>
			this.toItemView(this.requireItem(id))
		);
	}

	/**
	 * Move a player through an exit of their current room.
	 *
	 * @throws {NoSuchExitError} when the room has no such exit
	 * @throws {NotAuthenticatedError} when `actor` is not a registered player
	 */
	move(actor: string, direction: string): MoveResult {
		const player = this.requirePlayer(actor);
		const from = this.requireRoom(player.roomId);
		const dir = text2dir(direction);
		const targetId = dir !== undefined ? from.exits.get(dir) : undefined;
		if (dir === undefined || targetId === undefined)
			throw new NoSuchExitError(
				dir ?? direction.trim().toLowerCase(),
				[...from.exits.keys()]
			);
		const to = this.requireRoom(targetId);

		from.players.delete(actor);
		to.players.add(actor);
		player.roomId = to.id;

		return {
			direction: dir,
			from: { id: from.id, name: from.name },
			to: this.viewRoom(to, actor),
		};
	}

	/**
	 * Snapshot of the actor's room from their point of view.
	 */
	lookAt(actor: string): RoomView {
		const player = this.requirePlayer(actor);
		return this.viewRoom(this.requireRoom(player.roomId), actor);
	}

	/**
	 * Snapshot of the room beyond one of the actor's exits, without moving.
	 *
	 * @throws {NoSuchExitError} when the room has no such exit
	 */
	peek(actor: string, direction: DIRECTION): RoomView {
		const player = this.requirePlayer(actor);
		const from = this.requireRoom(player.roomId);
		const targetId = from.exits.get(direction);
		if (targetId === undefined)
			throw new NoSuchExitError(direction, [...from.exits.keys()]);
		return this.viewRoom(this.requireRoom(targetId), actor);
	}

	/**
	 * Build a room-scoped chat line. The speaker is excluded; they get their
	 * own confirmation.
	 */
	say(actor: string, text: string): GameEvent {
		const player = this.requirePlayer(actor);
		return roomEvent(
			player.roomId,
			`[Room] ${player.username}: ${text}`,
			actor
		);
	}

	/**
	 * Build a world-wide chat line, delivered to everyone including the speaker.
	 */
	shout(actor: string, text: string): GameEvent {
		const player = this.requirePlayer(actor);
		return globalEvent(`[Global] ${player.username}: ${text}`);
	}

	/**
	 * Pick up an item from the actor's room by partial name.
	 *
	 * @throws {NotFoundError} when nothing in the room matches
	 * @throws {AmbiguousError} when several items match; nothing moves
	 */
	takeItem(actor: string, nameFragment: string): ItemView {
		const player = this.requirePlayer(actor);
		const room = this.requireRoom(player.roomId);
		const visible = [...room.items].map((id) => this.requireItem(id));
		const result = matchByName(visible, nameFragment);

		if (result.kind === "none") {
			const names = visible.map((item) => item.name);
			throw new NotFoundError(
				nameFragment,
				names.length > 0
					? `There's no '${nameFragment}' here to get.\nAvailable items: ${names.join(
							", "
					  )}`
					: `There's no '${nameFragment}' here to get.`
			);
		}
		if (result.kind === "many")
			throw new AmbiguousError(
				nameFragment,
				result.matches.map((item) => item.name)
			);

		const item = result.match;
		if (item.owner.kind !== "room" || item.owner.roomId !== room.id)
			throw new InvariantViolation(
				`Item ${item.id} listed in ${room.id} but owned elsewhere`
			);

		room.items.delete(item.id);
		player.inventory.add(item.id);
		item.owner = { kind: "player", sessionId: actor };
		return this.toItemView(item);
	}

	/**
	 * Drop an item from the actor's inventory into their room by partial name.
	 *
	 * @throws {NotFoundError} when nothing carried matches
	 * @throws {AmbiguousError} when several carried items match; nothing moves
	 */
	dropItem(actor: string, nameFragment: string): ItemView {
		const player = this.requirePlayer(actor);
		const room = this.requireRoom(player.roomId);
		const carried = [...player.inventory].map((id) => this.requireItem(id));
		const result = matchByName(carried, nameFragment);

		if (result.kind === "none") {
			const names = carried.map((item) => item.name);
			throw new NotFoundError(
				nameFragment,
				names.length > 0
					? `You don't have '${nameFragment}' to drop.\nYou're carrying: ${names.join(
							", "
					  )}`
					: `You don't have '${nameFragment}' to drop.\nYou're not carrying anything.`
			);
		}
		if (result.kind === "many")
			throw new AmbiguousError(
				nameFragment,
				result.matches.map((item) => item.name)
			);

		const item = result.match;
		if (item.owner.kind !== "player" || item.owner.sessionId !== actor)
			throw new InvariantViolation(
				`Item ${item.id} carried by ${actor} but owned elsewhere`
			);

		player.inventory.delete(item.id);
		room.items.add(item.id);
		item.owner = { kind: "room", roomId: room.id };
		return this.toItemView(item);
	}

	/**
	 * Talk to an NPC in the actor's room.
	 *
	 * The keyword is looked up in the NPC's response table: exact key first,
	 * then a case-insensitive substring match in either direction, and
	 * finally the NPC's greeting.
	 *
	 * @throws {NotInRoomError} when the NPC exists but is somewhere else
	 * @throws {NoSuchNpcError} when no NPC has that name
	 * @throws {AmbiguousError} when several NPCs in the room match
	 */
	talk(actor: string, npcNameFragment: string, keyword?: string): DialogueLine {
		const player = this.requirePlayer(actor);
		const room = this.requireRoom(player.roomId);
		const present = [...room.npcs].map((id) => this.requireNpc(id));
		const result = matchByName(present, npcNameFragment);

		if (result.kind === "many")
			throw new AmbiguousError(
				npcNameFragment,
				result.matches.map((npc) => npc.name)
			);
		if (result.kind === "none") {
			const elsewhere = matchByName(this.npcs.values(), npcNameFragment);
			if (elsewhere.kind === "one")
				throw new NotInRoomError(elsewhere.match.name);
			throw new NoSuchNpcError(
				npcNameFragment,
				present.map((npc) => npc.name)
			);
		}

		const npc = result.match;
		const topic = keyword?.trim().toLowerCase();
		return {
			npc: this.toNpcView(npc),
			keyword: topic || undefined,
			text: topic ? this.respond(npc, topic) : npc.greeting,
		};
	}

	/**
	 * Advance every wandering NPC by one tick.
	 *
	 * @returns For each NPC that moved, a departure event for the room it left
	 * followed by an arrival event for the room it entered.
	 */
	tickAdvanceNpcs(): GameEvent[] {
		const events: GameEvent[] = [];
		for (const npc of this.npcs.values()) {
			if (!npc.wander) continue;
			const chance = npc.wander.chance ?? this.wanderChance;
			if (this.random() >= chance) continue;

			const from = this.requireRoom(npc.roomId);
			const permitted = npc.wander.rooms;
			const options = [...from.exits].filter(
				([, target]) => target !== from.id && permitted.includes(target)
			);
			if (options.length === 0) continue;

			const index = Math.min(
				options.length - 1,
				Math.floor(this.random() * options.length)
			);
			const [dir, targetId] = options[index];
			const to = this.requireRoom(targetId);

			from.npcs.delete(npc.id);
			to.npcs.add(npc.id);
			npc.roomId = to.id;

			logger.debug(`${npc.name} wanders ${dir} from ${from.id} to ${to.id}`);
			events.push(
				roomEvent(from.id, `${npc.name} wanders ${dir} toward ${to.name}.`),
				roomEvent(
					to.id,
					`${npc.name} wanders in from the ${dir2reverse(dir)}.`
				)
			);
		}
		return events;
	}

	/**
	 * Current room of an NPC.
	 */
	npcRoom(npcId: string): string {
		return this.requireNpc(npcId).roomId;
	}

	/**
	 * Current owner of an item.
	 */
	itemOwner(itemId: string): ItemOwner {
		return this.requireItem(itemId).owner;
	}

	/**
	 * Occupant ids of a room, for tests and diagnostics.
	 */
	occupantsOf(roomId: string): {
		players: string[];
		npcs: string[];
		items: string[];
	} {
		const room = this.requireRoom(roomId);
		return {
			players: [...room.players],
			npcs: [...room.npcs],
			items: [...room.items],
		};
	}

	/**
	 * Verify invariants (a) through (d).
	 *
	 * @throws {InvariantViolation} describing the first inconsistency found
	 */
	checkInvariants(): void {
		const usernames = new Set<string>();
		for (const player of this.players.values()) {
			const room = this.rooms.get(player.roomId);
			if (!room)
				throw new InvariantViolation(
					`${player.username} is in unknown room ${player.roomId}`
				);
			if (!room.players.has(player.sessionId))
				throw new InvariantViolation(
					`${player.username} claims ${room.id} but is not listed there`
				);
			const key = player.username.toLowerCase();
			if (usernames.has(key))
				throw new InvariantViolation(`${player.username} registered twice`);
			usernames.add(key);
			for (const itemId of player.inventory) {
				const owner = this.requireItem(itemId).owner;
				if (owner.kind !== "player" || owner.sessionId !== player.sessionId)
					throw new InvariantViolation(
						`${itemId} carried by ${player.username} but owned elsewhere`
					);
			}
		}

		for (const npc of this.npcs.values()) {
			const room = this.rooms.get(npc.roomId);
			if (!room || !room.npcs.has(npc.id))
				throw new InvariantViolation(
					`${npc.id} claims ${npc.roomId} but is not listed there`
				);
		}

		for (const item of this.items.values()) {
			const holders: string[] = [];
			for (const room of this.rooms.values())
				if (room.items.has(item.id)) holders.push(room.id);
			for (const player of this.players.values())
				if (player.inventory.has(item.id)) holders.push(player.sessionId);
			const expected =
				item.owner.kind === "room" ? item.owner.roomId : item.owner.sessionId;
			if (holders.length !== 1 || holders[0] !== expected)
				throw new InvariantViolation(
					`${item.id} owned by ${expected} but held by [${holders.join(", ")}]`
				);
		}

		for (const room of this.rooms.values()) {
			for (const sessionId of room.players)
				if (this.players.get(sessionId)?.roomId !== room.id)
					throw new InvariantViolation(
						`${room.id} lists player ${sessionId} who is elsewhere`
					);
			for (const npcId of room.npcs)
				if (this.npcs.get(npcId)?.roomId !== room.id)
					throw new InvariantViolation(
						`${room.id} lists NPC ${npcId} who is elsewhere`
					);
		}
	}

	private respond(npc: NpcState, topic: string): string {
		const exact = npc.responses.get(topic);
		if (exact !== undefined) return exact;
		for (const [key, text] of npc.responses) {
			if (key.includes(topic) || topic.includes(key)) return text;
		}
		return npc.greeting;
	}

	private viewRoom(room: RoomState, viewer?: string): RoomView {
		const npcs = [...room.npcs].map((id) => this.toNpcView(this.requireNpc(id)));
		const items = [...room.items].map((id) =>
			this.toItemView(this.requireItem(id))
		);
		const others: string[] = [];
		for (const sessionId of room.players) {
			if (sessionId === viewer) continue;
			const player = this.players.get(sessionId);
			if (player) others.push(player.username);
		}
		return {
			id: room.id,
			name: room.name,
			description: room.description,
			exits: [...room.exits.keys()],
			otherOccupantNames: others,
			npcNames: npcs.map((npc) => npc.name),
			itemNames: items.map((item) => item.name),
			npcs,
			items,
		};
	}

	private requirePlayer(sessionId: string): PlayerState {
		const player = this.players.get(sessionId);
		if (!player) throw new NotAuthenticatedError();
		return player;
	}

	private requireRoom(roomId: string): RoomState {
		const room = this.rooms.get(roomId);
		if (!room) throw new InvariantViolation(`Unknown room: ${roomId}`);
		return room;
	}

	private requireNpc(npcId: string): NpcState {
		const npc = this.npcs.get(npcId);
		if (!npc) throw new InvariantViolation(`Unknown NPC: ${npcId}`);
		return npc;
	}

	private requireItem(itemId: string): ItemState {
		const item = this.items.get(itemId);
		if (!item) throw new InvariantViolation(`Unknown item: ${itemId}`);
		return item;
	}

	private toPlayerView(player: PlayerState): PlayerView {
		return {
			sessionId: player.sessionId,
			username: player.username,
			roomId: player.roomId,
		};
	}

	private toItemView(item: ItemState): ItemView {
		return { id: item.id, name: item.name, description: item.description };
	}

	private toNpcView(npc: NpcState): NpcView {
		return { id: npc.id, name: npc.name, description: npc.description };
	}
}
