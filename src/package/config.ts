/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with sensible defaults if missing),
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml`
 * - Merges only known keys of the right type from file into `CONFIG`
 *   (unknown keys ignored, mistyped values fall back to the default)
 * - If the file is absent, writes the defaults to disk
 * - `PORT` in the environment overrides `server.port`
 * - Logs details at `info`/`debug` levels, including default vs overridden
 *
 * `LOG_LEVEL` is read by the logger itself.
 *
 * @example
 * import { loadConfig } from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await loadConfig();
 * console.log(CONFIG.server.port);
 *
 * @module package/config
 */
import { join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import { CONFIG_DEFAULT, type Config, defaultConfig, setConfig } from "../registry/config.js";
import type { OverflowPolicy } from "../core/session.js";

export const CONFIG_FILENAME = "config.yaml";

type Section = Record<string, unknown>;

function section(value: unknown): Section {
	if (typeof value === "object" && value !== null && !Array.isArray(value)) {
		const result: Section = {};
		for (const [key, entry] of Object.entries(value)) result[key] = entry;
		return result;
	}
	return {};
}

/**
 * Pulls typed values out of one config section, logging each decision.
 */
class SectionReader {
	private readonly name: string;
	private readonly raw: Section;
	private readonly known = new Set<string>();

	constructor(name: string, raw: unknown) {
		this.name = name;
		this.raw = section(raw);
	}

	string(key: string, fallback: string): string {
		return this.read(key, fallback, (v): v is string => typeof v === "string" && v !== "");
	}

	number(key: string, fallback: number, min: number, max = Infinity): number {
		return this.read(
			key,
			fallback,
			(v): v is number => typeof v === "number" && Number.isFinite(v) && v >= min && v <= max
		);
	}

	overflowPolicy(key: string, fallback: OverflowPolicy): OverflowPolicy {
		return this.read(
			key,
			fallback,
			(v): v is OverflowPolicy => v === "drop-oldest" || v === "disconnect"
		);
	}

	/** Report keys in the file that no reader asked for. */
	reportUnknown(): void {
		for (const key of Object.keys(this.raw))
			if (!this.known.has(key))
				logger.debug(`Ignoring unknown config key ${this.name}.${key}`);
	}

	private read<T>(key: string, fallback: T, valid: (value: unknown) => value is T): T {
		this.known.add(key);
		const value = this.raw[key];
		if (value === undefined) {
			logger.debug(`DEFAULT ${this.name}.${key} = ${fallback}`);
			return fallback;
		}
		if (!valid(value)) {
			logger.warn(
				`Invalid value for ${this.name}.${key} (${JSON.stringify(value)}), using ${fallback}`
			);
			return fallback;
		}
		if (value === fallback) logger.debug(`DEFAULT ${this.name}.${key} = ${value}`);
		else logger.debug(`Set ${this.name}.${key} = ${value}`);
		return value;
	}
}

/**
 * Merge parsed YAML over the defaults.
 */
export function mergeConfig(parsed: unknown): Config {
	const root = section(parsed);
	const defaults = defaultConfig();

	const game = new SectionReader("game", root.game);
	const server = new SectionReader("server", root.server);
	const world = new SectionReader("world", root.world);

	const config: Config = {
		game: {
			name: game.string("name", defaults.game.name),
		},
		server: {
			host: server.string("host", defaults.server.host),
			port: server.number("port", defaults.server.port, 0, 65535),
			inactivity_timeout: server.number(
				"inactivity_timeout",
				defaults.server.inactivity_timeout,
				0
			),
			outbound_queue_limit: server.number(
				"outbound_queue_limit",
				defaults.server.outbound_queue_limit,
				1
			),
			overflow_policy: server.overflowPolicy(
				"overflow_policy",
				defaults.server.overflow_policy
			),
		},
		world: {
			start_room: world.string("start_room", defaults.world.start_room),
			tick_interval_ms: world.number(
				"tick_interval_ms",
				defaults.world.tick_interval_ms,
				1
			),
			wander_chance: world.number("wander_chance", defaults.world.wander_chance, 0, 1),
		},
	};

	game.reportUnknown();
	server.reportUnknown();
	world.reportUnknown();
	for (const key of Object.keys(root))
		if (!(key in CONFIG_DEFAULT)) logger.debug(`Ignoring unknown config section ${key}`);
	return config;
}

/**
 * Apply environment overrides.
 */
export function applyEnvironment(
	config: Config,
	env: NodeJS.ProcessEnv = process.env
): Config {
	if (env.PORT === undefined || env.PORT === "") return config;
	const port = Number(env.PORT);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		logger.warn(`Ignoring invalid PORT=${env.PORT}`);
		return config;
	}
	logger.debug(`PORT overrides server.port: ${port}`);
	return { ...config, server: { ...config.server, port } };
}

async function writeDefaultConfig(path: string): Promise<void> {
	const content = YAML.dump(CONFIG_DEFAULT, { noRefs: true, lineWidth: 120 });
	const tempPath = `${path}.tmp`;
	try {
		await mkdir(join(path, ".."), { recursive: true });
		// Write to temporary file first
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError) => {
			logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
		});
		throw writeError;
	}
}

/**
 * Load the config file into `CONFIG` and return the result.
 */
export async function loadConfig(
	path: string = join(getDataDirectory(), CONFIG_FILENAME),
	env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
	const shown = relative(getSafeRootDirectory(), path);
	logger.debug(`Loading config from ${shown}`);

	let parsed: unknown = {};
	try {
		parsed = YAML.load(await readFile(path, "utf-8"));
	} catch (error) {
		if (!(error instanceof Error && "code" in error && error.code === "ENOENT"))
			throw error;
		logger.debug(`Config file not found, creating default at ${shown}`);
		await writeDefaultConfig(path);
	}

	const config = applyEnvironment(mergeConfig(parsed), env);
	setConfig(config);
	logger.info("Config loaded successfully");
	return config;
}
