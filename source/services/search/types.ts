/**
 * Search types.
 */

/**
 * Which stages found a result.
 */
export type MatchedVia = 'both' | 'lexical' | 'semantic';

/**
 * A ranked symbol.
 */
export type SearchHit = {
	name: string;
	symbolType: string;
	filePath: string;
	startLine: number | null;
	endLine: number | null;
	code: string;
	/** Higher is better; consistent with result order */
	score: number;
	matchedVia: MatchedVia;
	projectId: string;
	parentName: string | null;
	docstring: string | null;
};

/**
 * Why a response is empty or lacks semantic results.
 * - no_symbols: nothing indexed in the searched scope
 * - no_semantic_data: no symbol in scope has an embedding
 * - embedding_unavailable: the query could not be embedded
 */
export type SearchReason =
	| 'no_symbols'
	| 'no_semantic_data'
	| 'embedding_unavailable';

export type SearchResponse = {
	query: string;
	/** Project searched, null for all projects */
	projectId: string | null;
	results: SearchHit[];
	/** True when only lexical matching ran */
	semanticSkipped: boolean;
	reason: SearchReason | null;
	elapsedMs: number;
};
