/**
 * Partial-name resolution for items, NPCs and players.
 *
 * A fragment matches a candidate when the candidate's name contains it,
 * ignoring case; this covers prefixes ("hist" for "a historic brochure") and
 * whole-word references alike. A candidate whose full name equals the
 * fragment wins outright. When several candidates match, all of them are
 * returned sorted by name and then id so callers can report the ambiguity
 * in a stable order. Candidates that all share one name are interchangeable:
 * the first in that order is returned.
 *
 * @module utils/match
 */

export interface Named {
	readonly id: string;
	readonly name: string;
}

export type MatchResult<T> =
	| { readonly kind: "none" }
	| { readonly kind: "one"; readonly match: T }
	| { readonly kind: "many"; readonly matches: readonly T[] };

/**
 * Total order used for ambiguity reports: case-insensitive name, then id.
 */
export function compareByName(a: Named, b: Named): number {
	const left = a.name.toLowerCase();
	const right = b.name.toLowerCase();
	if (left !== right) return left < right ? -1 : 1;
	if (a.id === b.id) return 0;
	return a.id < b.id ? -1 : 1;
}

/**
 * Resolve `fragment` against `candidates`.
 *
 * @example
 * ```typescript
 * matchByName([{ id: "b", name: "a historic brochure" }], "Hist");
 * // { kind: "one", match: { id: "b", name: "a historic brochure" } }
 * ```
 */
export function matchByName<T extends Named>(
	candidates: Iterable<T>,
	fragment: string
): MatchResult<T> {
	const needle = fragment.trim().toLowerCase();
	if (needle.length === 0) return { kind: "none" };

	const exact: T[] = [];
	const partial: T[] = [];
	for (const candidate of candidates) {
		const name = candidate.name.toLowerCase();
		if (name === needle) exact.push(candidate);
		else if (name.includes(needle)) partial.push(candidate);
	}

	const pool = exact.length > 0 ? exact : partial;
	if (pool.length === 0) return { kind: "none" };
	const sorted = [...pool].sort(compareByName);
	const first = sorted[0];
	const sameName = sorted.every(
		(candidate) => candidate.name.toLowerCase() === first.name.toLowerCase()
	);
	if (sameName) return { kind: "one", match: first };
	return { kind: "many", matches: sorted };
}
