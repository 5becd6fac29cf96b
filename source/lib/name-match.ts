/**
 * Name matching - Ranking of symbol names against a lexical pattern.
 */

/**
 * Match quality, lower is better: exact, prefix, substring, none.
 */
export type MatchTier = 0 | 1 | 2 | 3;

export function nameMatchTier(name: string, pattern: string): MatchTier {
	const lowerName = name.toLowerCase();
	const lowerPattern = pattern.toLowerCase();
	if (lowerName === lowerPattern) return 0;
	if (lowerName.startsWith(lowerPattern)) return 1;
	if (lowerName.includes(lowerPattern)) return 2;
	return 3;
}

type Named = {
	name: string;
	filePath: string;
	startLine: number | null;
};

/**
 * Comparator: best tier, then shortest name, then path and line so the
 * order is stable across runs.
 */
export function compareByNameMatch<T extends Named>(
	pattern: string,
): (a: T, b: T) => number {
	return (a, b) =>
		nameMatchTier(a.name, pattern) - nameMatchTier(b.name, pattern) ||
		a.name.length - b.name.length ||
		a.name.localeCompare(b.name) ||
		a.filePath.localeCompare(b.filePath) ||
		(a.startLine ?? 0) - (b.startLine ?? 0);
}
