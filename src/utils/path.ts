import { join } from "path";

/**
 * Returns the root directory for runtime files (`data/`, `logs/`).
 * Prefers the `SAMUD_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const root = process.env.SAMUD_ROOT;
	if (root) return root;
	return process.cwd();
}

/** `data/` directory under the runtime root. */
export function getDataDirectory(): string {
	return join(getSafeRootDirectory(), "data");
}
