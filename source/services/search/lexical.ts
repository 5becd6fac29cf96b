/**
 * Lexical stage helpers - query tokenisation and name ranking.
 */

import {nameMatchTier, type MatchTier} from '../../lib/name-match.js';
import type {StoredSymbol} from '../storage/types.js';

/** Words shorter than this are too common to match on their own */
const MIN_TOKEN_LENGTH = 4;

/**
 * Patterns to match against names: the whole query, then each identifier
 * word longer than three characters. Lowercased, deduplicated.
 */
export function lexicalPatterns(query: string): string[] {
	const whole = query.trim().toLowerCase();
	const tokens = whole
		.split(/[^a-z0-9_$]+/)
		.filter(token => token.length >= MIN_TOKEN_LENGTH);
	return [...new Set([whole, ...tokens])].filter(Boolean);
}

/**
 * Best tier of a name across patterns.
 */
export function bestTier(name: string, patterns: readonly string[]): MatchTier {
	let best: MatchTier = 3;
	for (const pattern of patterns) {
		const tier = nameMatchTier(name, pattern);
		if (tier < best) best = tier;
	}
	return best;
}

/**
 * Rank lexical candidates: best match tier, shortest name, then location.
 */
export function rankLexical(
	candidates: Iterable<StoredSymbol>,
	patterns: readonly string[],
): StoredSymbol[] {
	return [...candidates].sort(
		(a, b) =>
			bestTier(a.name, patterns) - bestTier(b.name, patterns) ||
			a.name.length - b.name.length ||
			a.name.localeCompare(b.name) ||
			a.projectId.localeCompare(b.projectId) ||
			a.filePath.localeCompare(b.filePath) ||
			(a.startLine ?? 0) - (b.startLine ?? 0),
	);
}
