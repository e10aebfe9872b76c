/**
 * Direction utilities for movement between rooms.
 *
 * Room exits are keyed by full direction names ("north", "southwest", ...).
 * This module normalizes player input (full names and the short forms
 * `n`, `s`, `e`, `w`, `ne`, `nw`, `se`, `sw`, `u`, `d`, any case) to those
 * names and provides the reverse of each direction for arrival messages.
 *
 * @module direction
 */

/**
 * Direction names used as exit keys.
 *
 * @example
 * ```typescript
 * import { DIRECTION, text2dir } from "./direction.js";
 *
 * text2dir("N"); // DIRECTION.NORTH
 * text2dir("southwest"); // DIRECTION.SOUTHWEST
 * ```
 */
export enum DIRECTION {
	NORTH = "north",
	SOUTH = "south",
	EAST = "east",
	WEST = "west",
	NORTHEAST = "northeast",
	NORTHWEST = "northwest",
	SOUTHEAST = "southeast",
	SOUTHWEST = "southwest",
	UP = "up",
	DOWN = "down",
}

/**
 * All directions, in display order: cardinal, diagonal, vertical.
 */
export const DIRECTIONS: ReadonlyArray<DIRECTION> = [
	DIRECTION.NORTH,
	DIRECTION.SOUTH,
	DIRECTION.EAST,
	DIRECTION.WEST,
	DIRECTION.NORTHEAST,
	DIRECTION.NORTHWEST,
	DIRECTION.SOUTHEAST,
	DIRECTION.SOUTHWEST,
	DIRECTION.UP,
	DIRECTION.DOWN,
];

const DIR2REVERSE: ReadonlyMap<DIRECTION, DIRECTION> = new Map<
	DIRECTION,
	DIRECTION
>([
	[DIRECTION.NORTH, DIRECTION.SOUTH],
	[DIRECTION.SOUTH, DIRECTION.NORTH],
	[DIRECTION.EAST, DIRECTION.WEST],
	[DIRECTION.WEST, DIRECTION.EAST],
	[DIRECTION.UP, DIRECTION.DOWN],
	[DIRECTION.DOWN, DIRECTION.UP],
	[DIRECTION.NORTHEAST, DIRECTION.SOUTHWEST],
	[DIRECTION.NORTHWEST, DIRECTION.SOUTHEAST],
	[DIRECTION.SOUTHEAST, DIRECTION.NORTHWEST],
	[DIRECTION.SOUTHWEST, DIRECTION.NORTHEAST],
]);

/**
 * Abbreviations accepted for each direction.
 */
export const TEXT2DIR_SHORT: ReadonlyMap<string, DIRECTION> = new Map<
	string,
	DIRECTION
>([
	["n", DIRECTION.NORTH],
	["s", DIRECTION.SOUTH],
	["e", DIRECTION.EAST],
	["w", DIRECTION.WEST],
	["ne", DIRECTION.NORTHEAST],
	["nw", DIRECTION.NORTHWEST],
	["se", DIRECTION.SOUTHEAST],
	["sw", DIRECTION.SOUTHWEST],
	["u", DIRECTION.UP],
	["d", DIRECTION.DOWN],
]);

const TEXT2DIR: ReadonlyMap<string, DIRECTION> = new Map<string, DIRECTION>(
	DIRECTIONS.map((dir) => [dir, dir])
);

/**
 * Gets the opposite direction.
 *
 * @example
 * ```typescript
 * dir2reverse(DIRECTION.NORTHEAST); // DIRECTION.SOUTHWEST
 * ```
 */
export function dir2reverse(dir: DIRECTION): DIRECTION {
	const reverse = DIR2REVERSE.get(dir);
	if (reverse === undefined) throw new Error(`Unknown direction: ${dir}`);
	return reverse;
}

/**
 * Converts player input to a direction. Case and surrounding whitespace are
 * ignored.
 *
 * @returns The direction, or `undefined` when the text names none.
 *
 * @example
 * ```typescript
 * text2dir("E");      // DIRECTION.EAST
 * text2dir(" down "); // DIRECTION.DOWN
 * text2dir("sideways"); // undefined
 * ```
 */
export function text2dir(text: string): DIRECTION | undefined {
	const normalized = text.trim().toLowerCase();
	return TEXT2DIR.get(normalized) ?? TEXT2DIR_SHORT.get(normalized);
}

/**
 * Type guard for exit keys loaded from data files.
 */
export function isDirection(text: string): text is DIRECTION {
	return TEXT2DIR.has(text);
}
