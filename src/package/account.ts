/**
 * Package: account - YAML persistence for player accounts
 *
 * Each account lives in `data/accounts/<username>.yaml` and holds the
 * lowercased username, a salted scrypt hash, the last room the player stood
 * in and two timestamps.
 *
 * Behavior
 * - Usernames are 3-16 letters, digits or underscores and are stored
 *   lowercase; passwords must be at least 4 characters
 * - Writes go to a temporary file that is then renamed over the real one
 * - Operations on the same username are serialized so a login cannot read a
 *   half-written signup
 *
 * @example
 * const accounts = new AccountStore(join(getDataDirectory(), "accounts"));
 * const record = await accounts.signup("alice", "test-secret");
 * await accounts.persistLocation(record.username, "Pearl");
 *
 * @module package/account
 */
import { join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { randomBytes, scrypt, timingSafeEqual } from "crypto";
import YAML from "js-yaml";
import logger from "../logger.js";
import {
	BadCredentialsError,
	InvalidCredentialsError,
	UsernameTakenError,
} from "../core/errors.js";
import { getSafeRootDirectory } from "../utils/path.js";

const KEY_LENGTH = 64;
const USERNAME_PATTERN = /^[A-Za-z0-9_]{3,16}$/;
const MIN_PASSWORD_LENGTH = 4;

export interface AccountRecord {
	username: string;
	passwordHash: string;
	salt: string;
	/** Last room the player stood in; absent until the first save. */
	room?: string;
	createdAt: string;
	lastLogin?: string;
}

function isAccountRecord(value: unknown): value is AccountRecord {
	if (typeof value !== "object" || value === null) return false;
	const record: Record<string, unknown> = { ...value };
	return (
		typeof record.username === "string" &&
		typeof record.passwordHash === "string" &&
		typeof record.salt === "string" &&
		typeof record.createdAt === "string" &&
		(record.room === undefined || typeof record.room === "string") &&
		(record.lastLogin === undefined || typeof record.lastLogin === "string")
	);
}

/**
 * Check a username/password pair against the account rules.
 *
 * @throws {InvalidCredentialsError} describing the first rule broken
 */
export function validateCredentials(username: string, password: string): void {
	if (!USERNAME_PATTERN.test(username))
		throw new InvalidCredentialsError(
			"Username must be 3-16 characters: letters, numbers, underscore"
		);
	if (password.length < MIN_PASSWORD_LENGTH)
		throw new InvalidCredentialsError(
			`Password must be at least ${MIN_PASSWORD_LENGTH} characters`
		);
}

function hashPassword(password: string, salt: string): Promise<string> {
	return new Promise((resolve, reject) => {
		scrypt(password, salt, KEY_LENGTH, (error, key) => {
			if (error) reject(error);
			else resolve(key.toString("hex"));
		});
	});
}

export class AccountStore {
	readonly directory: string;
	private readonly locks = new Map<string, Promise<unknown>>();

	constructor(directory: string) {
		this.directory = directory;
	}

	/**
	 * Create an account.
	 *
	 * @throws {InvalidCredentialsError} when the username or password is malformed
	 * @throws {UsernameTakenError} when the username already has an account
	 */
	async signup(username: string, password: string): Promise<AccountRecord> {
		validateCredentials(username, password);
		const key = username.toLowerCase();
		return this.exclusive(key, async () => {
			if (await this.read(key)) throw new UsernameTakenError(key);
			const salt = randomBytes(16).toString("hex");
			const now = new Date().toISOString();
			const record: AccountRecord = {
				username: key,
				passwordHash: await hashPassword(password, salt),
				salt,
				createdAt: now,
				lastLogin: now,
			};
			await this.write(record);
			logger.info(`Account created: ${key}`);
			return record;
		});
	}

	/**
	 * Verify credentials and stamp the login time.
	 *
	 * @throws {BadCredentialsError} for an unknown user or a wrong password
	 */
	async login(username: string, password: string): Promise<AccountRecord> {
		const key = username.trim().toLowerCase();
		if (!USERNAME_PATTERN.test(key)) throw new BadCredentialsError();
		return this.exclusive(key, async () => {
			const record = await this.read(key);
			if (!record) throw new BadCredentialsError();
			const expected = Buffer.from(record.passwordHash, "hex");
			const actual = Buffer.from(
				await hashPassword(password, record.salt),
				"hex"
			);
			if (
				expected.length !== actual.length ||
				!timingSafeEqual(expected, actual)
			)
				throw new BadCredentialsError();
			const updated: AccountRecord = {
				...record,
				lastLogin: new Date().toISOString(),
			};
			await this.write(updated);
			logger.debug(`Account verified: ${key}`);
			return updated;
		});
	}

	/**
	 * Remember where a player was standing. Unknown accounts are ignored.
	 */
	persistLocation(username: string, roomId: string): Promise<void> {
		const key = username.toLowerCase();
		return this.exclusive(key, async () => {
			const record = await this.read(key);
			if (!record) {
				logger.warn(`Cannot save location for unknown account ${key}`);
				return;
			}
			await this.write({ ...record, room: roomId });
			logger.debug(`Saved location of ${key}: ${roomId}`);
		});
	}

	/**
	 * Load an account without checking its password.
	 */
	find(username: string): Promise<AccountRecord | undefined> {
		return this.read(username.toLowerCase());
	}

	private pathFor(key: string): string {
		return join(this.directory, `${key}.yaml`);
	}

	private async read(key: string): Promise<AccountRecord | undefined> {
		let content: string;
		try {
			content = await readFile(this.pathFor(key), "utf-8");
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT")
				return undefined;
			throw error;
		}
		const parsed: unknown = YAML.load(content);
		if (!isAccountRecord(parsed))
			throw new Error(
				`Malformed account file ${relative(
					getSafeRootDirectory(),
					this.pathFor(key)
				)}`
			);
		return parsed;
	}

	private async write(record: AccountRecord): Promise<void> {
		await mkdir(this.directory, { recursive: true });
		const filePath = this.pathFor(record.username);
		const tempPath = `${filePath}.tmp`;
		const yaml = YAML.dump(record, { noRefs: true, lineWidth: 120 });
		try {
			await writeFile(tempPath, yaml, "utf-8");
			await rename(tempPath, filePath);
		} catch (error) {
			await unlink(tempPath).catch((cleanupError) => {
				logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
			});
			throw error;
		}
	}

	/**
	 * Run `fn` after every earlier operation on the same account has settled.
	 */
	private exclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.locks.get(key) ?? Promise.resolve();
		const next = previous.then(fn, fn);
		const settled = next.then(
			() => undefined,
			() => undefined
		);
		this.locks.set(key, settled);
		void settled.then(() => {
			if (this.locks.get(key) === settled) this.locks.delete(key);
		});
		return next;
	}
}
