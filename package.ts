/**
 * Start-up loader: reads configuration, the world file, the command modules
 * and opens the account store, in that order.
 *
 * Each step runs as a `logger.block()` phase so start-up timing shows up in
 * the debug log.
 */

import { join } from "path";
import logger from "./src/logger.js";
import { CommandRegistry } from "./src/core/command.js";
import type { WorldDefinition } from "./src/core/world.js";
import { AccountStore } from "./src/package/account.js";
import { loadCommands } from "./src/package/commands.js";
import { loadConfig } from "./src/package/config.js";
import { loadWorld } from "./src/package/world.js";
import type { Config } from "./src/registry/config.js";
import { getDataDirectory } from "./src/utils/path.js";

export interface LoadedPackages {
	config: Config;
	definition: WorldDefinition;
	registry: CommandRegistry;
	accounts: AccountStore;
}

export async function loadAllPackages(
	dataDirectory: string = getDataDirectory()
): Promise<LoadedPackages> {
	const config = await logger.block("config", () =>
		loadConfig(join(dataDirectory, "config.yaml"))
	);
	const definition = await logger.block("world", () =>
		loadWorld(join(dataDirectory, "world.yaml"))
	);
	const registry = new CommandRegistry();
	await logger.block("commands", () => loadCommands(registry));
	const accounts = new AccountStore(join(dataDirectory, "accounts"));
	return { config, definition, registry, accounts };
}
