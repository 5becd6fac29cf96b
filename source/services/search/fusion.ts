/**
 * Fusion - Merge lexical and semantic candidates into one ranking.
 *
 * Tiers: found by both stages, lexical only, semantic only. Within "both"
 * and "lexical" the lexical rank orders results; within "semantic" the
 * similarity does.
 */

import type {StoredSymbol, VectorMatch} from '../storage/types.js';
import type {MatchedVia, SearchHit} from './types.js';

const TIER_ORDER: Record<MatchedVia, number> = {
	both: 0,
	lexical: 1,
	semantic: 2,
};

type Candidate = {
	symbol: StoredSymbol;
	lexicalRank: number | null;
	similarity: number | null;
};

function tierOf(candidate: Candidate): MatchedVia {
	if (candidate.lexicalRank !== null && candidate.similarity !== null) {
		return 'both';
	}
	return candidate.lexicalRank !== null ? 'lexical' : 'semantic';
}

/**
 * Score consistent with the fused order: both in (2, 3], lexical in (1, 2],
 * semantic in [0, 1).
 */
export function fusedScore(
	matchedVia: MatchedVia,
	lexicalRank: number | null,
	similarity: number | null,
): number {
	switch (matchedVia) {
		case 'both':
			return 2 + 1 / (1 + (lexicalRank ?? 0));
		case 'lexical':
			return 1 + 1 / (1 + (lexicalRank ?? 0));
		case 'semantic':
			return Math.min(Math.max(similarity ?? 0, 0), 0.999);
	}
}

/**
 * @param lexical - Lexical candidates, best first
 * @param semantic - Semantic candidates
 * @param limit - Results to return
 */
export function fuseResults(
	lexical: readonly StoredSymbol[],
	semantic: readonly VectorMatch[],
	limit: number,
): SearchHit[] {
	const candidates = new Map<string, Candidate>();

	lexical.forEach((symbol, rank) => {
		if (!candidates.has(symbol.symbolKey)) {
			candidates.set(symbol.symbolKey, {symbol, lexicalRank: rank, similarity: null});
		}
	});
	for (const match of semantic) {
		const existing = candidates.get(match.symbol.symbolKey);
		if (existing) {
			existing.similarity = Math.max(existing.similarity ?? -Infinity, match.similarity);
		} else {
			candidates.set(match.symbol.symbolKey, {
				symbol: match.symbol,
				lexicalRank: null,
				similarity: match.similarity,
			});
		}
	}

	const ranked = [...candidates.values()].sort((a, b) => {
		const tierA = tierOf(a);
		const tierB = tierOf(b);
		if (tierA !== tierB) {
			return TIER_ORDER[tierA] - TIER_ORDER[tierB];
		}
		if (tierA === 'semantic') {
			return (b.similarity ?? 0) - (a.similarity ?? 0);
		}
		return (
			(a.lexicalRank ?? 0) - (b.lexicalRank ?? 0) ||
			(b.similarity ?? 0) - (a.similarity ?? 0)
		);
	});

	return ranked.slice(0, limit).map(candidate => {
		const matchedVia = tierOf(candidate);
		const {symbol} = candidate;
		return {
			name: symbol.name,
			symbolType: symbol.symbolType,
			filePath: symbol.filePath,
			startLine: symbol.startLine,
			endLine: symbol.endLine,
			code: symbol.code,
			score: fusedScore(matchedVia, candidate.lexicalRank, candidate.similarity),
			matchedVia,
			projectId: symbol.projectId,
			parentName: symbol.parentName,
			docstring: symbol.docstring,
		};
	});
}
