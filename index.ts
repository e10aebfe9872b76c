import { networkInterfaces } from "os";
import { loadAllPackages } from "./package.js";
import logger from "./src/logger.js";
import { Game } from "./src/game.js";

/** IPv4 addresses other machines can reach this one on. */
function networkAddresses(): string[] {
	const addresses: string[] = [];
	for (const entries of Object.values(networkInterfaces())) {
		for (const entry of entries ?? []) {
			if (entry.family === "IPv4" && !entry.internal) addresses.push(entry.address);
		}
	}
	return addresses;
}

let game: Game;
let port: number;
try {
	const packages = await logger.block("packages", async () => {
		logger.info("Loading packages...");
		return loadAllPackages();
	});
	game = new Game(packages);
	port = await logger.block("server", () => game.start());
} catch (error) {
	logger.error(`Failed to start server: ${error}`);
	process.exit(1);
}

logger.info("Server accessible at:");
logger.info(`   Local:    telnet localhost ${port}`);
logger.info(`             nc localhost ${port}`);
for (const address of networkAddresses()) {
	logger.info(`   Network:  telnet ${address} ${port}`);
	logger.info(`             nc ${address} ${port}`);
}

let stopping = false;
for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.on(signal, () => {
		if (stopping) return;
		stopping = true;
		logger.info(`${signal} received, shutting down gracefully...`);
		game.stop().then(
			() => process.exit(0),
			(error) => {
				logger.error(`Error during shutdown: ${error}`);
				process.exit(1);
			}
		);
	});
}
