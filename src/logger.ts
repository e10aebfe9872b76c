/**
 * Logger module - structured application logging
 *
 * Provides a preconfigured Winston logger used across the server.
 * It writes plain-text logs to files and colorized human-readable logs
 * to the console (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Usage
 * ```ts
 * import logger from './logger.js';
 *
 * logger.info('Server started on port %d', 2323);
 * await logger.block('world', async () => {
 *   logger.info('Loading world...');
 * });
 * ```
 *
 * @module logger
 */
import winston from "winston";
import { join } from "path";
import { getSafeRootDirectory } from "./utils/path.js";

const isTestMode = process.env.NODE_TEST_CONTEXT;

// Generate timestamp for log filenames (YYYY-MM-DD-HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";
const LOG_DIRECTORY = join(getSafeRootDirectory(), "logs");

const fileLine = winston.format.printf(
	({ timestamp, level, message, ...meta }) =>
		`[${timestamp}] ${level.toUpperCase()}: ${message}${
			Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
		}`
);

const base = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "samud" },
	transports: [
		new winston.transports.File({
			filename: join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				fileLine
			),
		}),
		new winston.transports.File({
			filename: join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				fileLine
			),
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length && meta.service === undefined
											? " " + JSON.stringify(meta)
											: ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export type Logger = winston.Logger & {
	/**
	 * Run `fn` as a named start-up phase, logging when it begins and how long
	 * it took. Errors propagate after the phase is closed.
	 */
	block<T>(label: string, fn: () => Promise<T>): Promise<T>;
};

const logger: Logger = Object.assign(base, {
	async block<T>(label: string, fn: () => Promise<T>): Promise<T> {
		const started = Date.now();
		base.debug(`[${label}] begin`);
		try {
			return await fn();
		} finally {
			base.debug(`[${label}] end (${Date.now() - started}ms)`);
		}
	},
});

export default logger;
