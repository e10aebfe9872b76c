/**
 * Shared utility types.
 *
 * @module utils/types
 */

/**
 * Read-only view of a settings tree. Arrays become `ReadonlyArray`s of
 * read-only elements; functions are left as they are.
 *
 * @example
 * const config: DeepReadonly<Config> = loadedConfig;
 * config.server.port = 1; // compile error
 */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
	? T
	: T extends readonly (infer E)[]
	? ReadonlyArray<DeepReadonly<E>>
	: T extends object
	? { readonly [K in keyof T]: DeepReadonly<T[K]> }
	: T;
