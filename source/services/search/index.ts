/**
 * SearchEngine - Hybrid lexical + semantic retrieval over indexed symbols.
 *
 * Both stages run against the same scope (one project, or all projects
 * when the project id is null). Lexical hits are ranked by name match,
 * semantic hits by cosine similarity, and the two are fused so a symbol
 * found by both ranks above one found by either alone.
 */

import type {SearchConfig} from '../../lib/config.js';
import {InvalidQueryError} from '../../lib/errors.js';
import {createNullLogger, type Logger} from '../../lib/logger.js';
import type {EmbeddingGateway} from '../indexing/gateway.js';
import type {SymbolStore} from '../storage/index.js';
import type {StoredSymbol, VectorMatch} from '../storage/types.js';
import {fuseResults} from './fusion.js';
import {lexicalPatterns, rankLexical} from './lexical.js';
import type {SearchReason, SearchResponse} from './types.js';

export type * from './types.js';
export {fuseResults, fusedScore} from './fusion.js';
export {lexicalPatterns, rankLexical} from './lexical.js';

export type SearchEngineDeps = {
	store: SymbolStore;
	gateway: EmbeddingGateway;
	config: SearchConfig;
	logger?: Logger;
};

type SemanticStage = {
	matches: VectorMatch[];
	skipped: boolean;
	reason: SearchReason | null;
};

export class SearchEngine {
	private readonly store: SymbolStore;
	private readonly gateway: EmbeddingGateway;
	private readonly config: SearchConfig;
	private readonly logger: Logger;

	constructor(deps: SearchEngineDeps) {
		this.store = deps.store;
		this.gateway = deps.gateway;
		this.config = deps.config;
		this.logger = deps.logger ?? createNullLogger();
	}

	/**
	 * Search symbols.
	 *
	 * @param projectId - Project to search, or null for every project
	 * @param query - Free text or an identifier
	 * @param limit - Maximum results (default from config)
	 * @throws InvalidQueryError for an empty query or a non-positive limit
	 */
	async search(
		projectId: string | null,
		query: string,
		limit: number = this.config.defaultLimit,
	): Promise<SearchResponse> {
		const start = Date.now();
		const trimmed = query.trim();
		if (!trimmed) {
			throw new InvalidQueryError('Query must not be empty');
		}
		if (!Number.isInteger(limit) || limit < 1) {
			throw new InvalidQueryError(`Limit must be a positive integer, got ${limit}`);
		}

		const respond = (
			partial: Omit<SearchResponse, 'query' | 'projectId' | 'elapsedMs'>,
		): SearchResponse => ({
			query: trimmed,
			projectId,
			...partial,
			elapsedMs: Date.now() - start,
		});

		const total = await this.store.countSymbols(projectId);
		if (total === 0) {
			return respond({results: [], semanticSkipped: true, reason: 'no_symbols'});
		}

		const [lexical, semantic] = await Promise.all([
			this.lexicalStage(projectId, trimmed, limit),
			this.semanticStage(projectId, trimmed, limit),
		]);

		const results = fuseResults(lexical, semantic.matches, limit);
		this.logger.debug('Search', 'Query served', {
			projectId,
			query: trimmed,
			lexical: lexical.length,
			semantic: semantic.matches.length,
			results: results.length,
			reason: semantic.reason,
		});

		return respond({
			results,
			semanticSkipped: semantic.skipped,
			reason: semantic.reason,
		});
	}

	/**
	 * Name matches for the whole query and each salient token, top K1.
	 */
	private async lexicalStage(
		projectId: string | null,
		query: string,
		limit: number,
	): Promise<StoredSymbol[]> {
		const budget = Math.max(this.config.lexicalLimit, limit);
		const patterns = lexicalPatterns(query);

		const batches = await Promise.all(
			patterns.map(pattern => this.store.lexicalSearch(projectId, pattern, budget)),
		);
		const unique = new Map<string, StoredSymbol>();
		for (const symbol of batches.flat()) {
			unique.set(symbol.symbolKey, symbol);
		}
		return rankLexical(unique.values(), patterns).slice(0, budget);
	}

	/**
	 * Nearest symbols by embedding, top K2. Skipped when nothing in scope
	 * has an embedding or the query cannot be embedded.
	 */
	private async semanticStage(
		projectId: string | null,
		query: string,
		limit: number,
	): Promise<SemanticStage> {
		const embedded = await this.store.countEmbedded(projectId);
		if (embedded === 0) {
			return {matches: [], skipped: true, reason: 'no_semantic_data'};
		}

		const vector = await this.gateway.embedQuery(query);
		if (!vector) {
			this.logger.warn('Search', 'Query embedding failed, lexical results only', {
				projectId,
			});
			return {matches: [], skipped: true, reason: 'embedding_unavailable'};
		}

		const budget = Math.max(this.config.semanticLimit, limit);
		const matches = await this.store.vectorSearch(projectId, vector, budget);
		return {
			matches: matches.filter(m => m.similarity >= this.config.minSimilarity),
			skipped: false,
			reason: null,
		};
	}
}
