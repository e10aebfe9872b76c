/**
 * Package: world - YAML world definition loader
 *
 * Reads `data/world.yaml` once at start-up and turns it into a
 * `WorldDefinition`. Every field is type-checked and every cross-reference
 * resolved before the world model sees the data.
 *
 * Rejected
 * - duplicate room, NPC or item ids
 * - exits, NPC rooms, item rooms or wander rooms naming unknown rooms
 * - exit keys that are not direction names
 * - a wander policy whose rooms leave out the NPC's home room
 *
 * @example
 * import { loadWorld } from './package/world.js';
 * const definition = await loadWorld(join(getDataDirectory(), "world.yaml"));
 * const world = new World(definition, { startRoom: "AlamoPlaza" });
 *
 * @module package/world
 */
import { readFile } from "fs/promises";
import { relative } from "path";
import YAML from "js-yaml";
import { DIRECTION, isDirection } from "../direction.js";
import type {
	ItemDefinition,
	NpcDefinition,
	RoomDefinition,
	WanderPolicy,
	WorldDefinition,
} from "../core/world.js";
import logger from "../logger.js";
import { getSafeRootDirectory } from "../utils/path.js";

export class WorldFormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "WorldFormatError";
	}
}

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fields(value: unknown, where: string): Fields {
	if (!isFields(value)) throw new WorldFormatError(`${where} must be a mapping`);
	return value;
}

function list(value: unknown, where: string): unknown[] {
	if (value === undefined || value === null) return [];
	if (!Array.isArray(value)) throw new WorldFormatError(`${where} must be a list`);
	return value;
}

function text(value: unknown, where: string): string {
	if (typeof value !== "string" || value.trim() === "")
		throw new WorldFormatError(`${where} must be a non-empty string`);
	return value.trim();
}

function parseRoom(raw: unknown, index: number): RoomDefinition {
	const where = `rooms[${index}]`;
	const room = fields(raw, where);
	const exits: Partial<Record<DIRECTION, string>> = {};
	if (room.exits !== undefined && room.exits !== null) {
		for (const [key, target] of Object.entries(fields(room.exits, `${where}.exits`))) {
			const dir = key.toLowerCase();
			if (!isDirection(dir))
				throw new WorldFormatError(`${where}.exits: '${key}' is not a direction`);
			exits[dir] = text(target, `${where}.exits.${key}`);
		}
	}
	return {
		id: text(room.id, `${where}.id`),
		name: text(room.name, `${where}.name`),
		description: text(room.description, `${where}.description`),
		exits,
	};
}

function parseWander(raw: unknown, where: string): WanderPolicy | undefined {
	if (raw === undefined || raw === null) return undefined;
	const wander = fields(raw, where);
	const rooms = list(wander.rooms, `${where}.rooms`).map((room, i) =>
		text(room, `${where}.rooms[${i}]`)
	);
	const policy: WanderPolicy = { rooms };
	if (wander.chance !== undefined) {
		if (
			typeof wander.chance !== "number" ||
			wander.chance < 0 ||
			wander.chance > 1
		)
			throw new WorldFormatError(`${where}.chance must be a number from 0 to 1`);
		policy.chance = wander.chance;
	}
	return policy;
}

function parseNpc(raw: unknown, index: number): NpcDefinition {
	const where = `npcs[${index}]`;
	const npc = fields(raw, where);
	const responses: Record<string, string> = {};
	if (npc.responses !== undefined && npc.responses !== null) {
		for (const [keyword, reply] of Object.entries(
			fields(npc.responses, `${where}.responses`)
		))
			responses[keyword] = text(reply, `${where}.responses.${keyword}`);
	}
	const definition: NpcDefinition = {
		id: text(npc.id, `${where}.id`),
		name: text(npc.name, `${where}.name`),
		description: text(npc.description, `${where}.description`),
		room: text(npc.room, `${where}.room`),
		greeting: text(npc.greeting, `${where}.greeting`),
		responses,
	};
	const wander = parseWander(npc.wander, `${where}.wander`);
	if (wander) definition.wander = wander;
	return definition;
}

function parseItem(raw: unknown, index: number): ItemDefinition {
	const where = `items[${index}]`;
	const item = fields(raw, where);
	return {
		id: text(item.id, `${where}.id`),
		name: text(item.name, `${where}.name`),
		description: text(item.description, `${where}.description`),
		room: text(item.room, `${where}.room`),
	};
}

function uniqueIds(kind: string, ids: readonly string[]): void {
	const seen = new Set<string>();
	for (const id of ids) {
		if (seen.has(id)) throw new WorldFormatError(`Duplicate ${kind} id: ${id}`);
		seen.add(id);
	}
}

/**
 * Check the cross-references of an already-parsed definition.
 *
 * @throws {WorldFormatError} on the first problem found
 */
export function validateWorldDefinition(definition: WorldDefinition): void {
	uniqueIds("room", definition.rooms.map((room) => room.id));
	uniqueIds("NPC", definition.npcs.map((npc) => npc.id));
	uniqueIds("item", definition.items.map((item) => item.id));

	const rooms = new Set(definition.rooms.map((room) => room.id));
	const known = (id: string, where: string) => {
		if (!rooms.has(id))
			throw new WorldFormatError(`${where} names unknown room ${id}`);
	};

	for (const room of definition.rooms)
		for (const [dir, target] of Object.entries(room.exits))
			if (target !== undefined) known(target, `Exit ${dir} of ${room.id}`);

	for (const npc of definition.npcs) {
		known(npc.room, `NPC ${npc.id}`);
		if (!npc.wander) continue;
		for (const room of npc.wander.rooms) known(room, `Wander policy of ${npc.id}`);
		if (!npc.wander.rooms.includes(npc.room))
			throw new WorldFormatError(
				`Wander policy of ${npc.id} must include its home room ${npc.room}`
			);
	}

	for (const item of definition.items) known(item.room, `Item ${item.id}`);
}

/**
 * Turn parsed YAML into a validated world definition.
 *
 * @throws {WorldFormatError} when the data is malformed
 */
export function parseWorldDefinition(data: unknown): WorldDefinition {
	const root = fields(data, "world file");
	const definition: WorldDefinition = {
		rooms: list(root.rooms, "rooms").map(parseRoom),
		npcs: list(root.npcs, "npcs").map(parseNpc),
		items: list(root.items, "items").map(parseItem),
	};
	if (definition.rooms.length === 0)
		throw new WorldFormatError("A world needs at least one room");
	validateWorldDefinition(definition);
	return definition;
}

/**
 * Read and validate a world file.
 */
export async function loadWorld(path: string): Promise<WorldDefinition> {
	const shown = relative(getSafeRootDirectory(), path);
	logger.debug(`Loading world from ${shown}`);
	const content = await readFile(path, "utf-8");
	let definition: WorldDefinition;
	try {
		definition = parseWorldDefinition(YAML.load(content));
	} catch (error) {
		if (error instanceof WorldFormatError)
			throw new WorldFormatError(`${shown}: ${error.message}`);
		throw error;
	}
	logger.info(
		`World loaded: ${definition.rooms.length} rooms, ${definition.npcs.length} NPCs, ${definition.items.length} items`
	);
	return definition;
}
