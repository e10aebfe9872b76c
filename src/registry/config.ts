/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the game configuration.
 * The CONFIG object is loaded and updated by the config package.
 *
 * @module registry/config
 */

import type { OverflowPolicy } from "../core/session.js";
import { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type GameConfig = {
	name: string;
};

export type ServerConfig = {
	host: string;
	port: number;
	/** Seconds of silence before a session is closed; 0 disables. */
	inactivity_timeout: number;
	outbound_queue_limit: number;
	overflow_policy: OverflowPolicy;
};

export type WorldConfig = {
	start_room: string;
	tick_interval_ms: number;
	wander_chance: number;
};

export type Config = {
	game: GameConfig;
	server: ServerConfig;
	world: WorldConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "San Antonio MUD",
	},
	server: {
		host: "0.0.0.0",
		port: 2323,
		inactivity_timeout: 0,
		outbound_queue_limit: 256,
		overflow_policy: "drop-oldest",
	},
	world: {
		start_room: "AlamoPlaza",
		tick_interval_ms: 15000,
		wander_chance: 0.3,
	},
};

/** A fresh, mutable copy of the defaults. */
export function defaultConfig(): Config {
	return {
		game: { ...CONFIG_DEFAULT.game },
		server: { ...CONFIG_DEFAULT.server },
		world: { ...CONFIG_DEFAULT.world },
	};
}

// make a copy of the default, don't reference it directly plz
const CONFIG: Config = defaultConfig();

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = { ...config.game };
	CONFIG.server = { ...config.server };
	CONFIG.world = { ...config.world };
}
