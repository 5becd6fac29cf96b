/**
 * Tests for hybrid search: lexical ranking, fusion, scoping and the
 * reasons reported when semantic results are unavailable.
 */

import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {InvalidQueryError} from '../../lib/errors.js';
import {buildEmbeddingText} from '../indexing/gateway.js';
import {fuseResults, fusedScore, lexicalPatterns} from '../search/index.js';
import type {StoredSymbol} from '../storage/types.js';
import {
	copyFixtureToTemp,
	createTempProject,
	createTestEnvironment,
	outage,
	type TestContext,
	type TestEnvironment,
} from './helpers.js';

const PROJECT = 'proj-a';

function stored(name: string, overrides: Partial<StoredSymbol> = {}): StoredSymbol {
	return {
		symbolKey: `key-${name}`,
		projectId: PROJECT,
		name,
		symbolType: 'function',
		filePath: 'src/app.py',
		startLine: 1,
		endLine: 2,
		code: `def ${name}():\n    pass`,
		docstring: null,
		parentName: null,
		language: 'python',
		fileHash: 'hash',
		hasEmbedding: true,
		createdAt: '2024-01-01T00:00:00.000Z',
		updatedAt: '2024-01-01T00:00:00.000Z',
		...overrides,
	};
}

describe('lexicalPatterns', () => {
	it('keeps the whole query and its longer words', () => {
		expect(lexicalPatterns('  Check AUTH token ')).toEqual([
			'check auth token',
			'check',
			'auth',
			'token',
		]);
	});

	it('does not repeat a single-word query', () => {
		expect(lexicalPatterns('calc_salary')).toEqual(['calc_salary']);
	});
});

describe('fusedScore', () => {
	it('orders the tiers', () => {
		expect(fusedScore('both', 0, 0.9)).toBe(3);
		expect(fusedScore('both', 1, 0.9)).toBe(2.5);
		expect(fusedScore('lexical', 0, null)).toBe(2);
		expect(fusedScore('lexical', 3, null)).toBe(1.25);
		expect(fusedScore('semantic', null, 0.8)).toBe(0.8);
	});

	it('clamps semantic similarity below the lexical tier', () => {
		expect(fusedScore('semantic', null, 1)).toBe(0.999);
		expect(fusedScore('semantic', null, -0.5)).toBe(0);
	});
});

describe('fuseResults', () => {
	it('ranks symbols found by both stages first', () => {
		const alpha = stored('alpha');
		const beta = stored('beta');
		const gamma = stored('gamma');

		const results = fuseResults(
			[alpha, beta],
			[
				{symbol: gamma, similarity: 0.95},
				{symbol: beta, similarity: 0.5},
			],
			10,
		);

		expect(results.map(r => [r.name, r.matchedVia, r.score])).toEqual([
			['beta', 'both', 2.5],
			['alpha', 'lexical', 2],
			['gamma', 'semantic', 0.95],
		]);
	});

	it('orders semantic-only hits by similarity and applies the limit', () => {
		const results = fuseResults(
			[],
			[
				{symbol: stored('low'), similarity: 0.4},
				{symbol: stored('high'), similarity: 0.9},
				{symbol: stored('mid'), similarity: 0.6},
			],
			2,
		);

		expect(results.map(r => r.name)).toEqual(['high', 'mid']);
	});

	it('returns nothing for empty stages', () => {
		expect(fuseResults([], [], 5)).toEqual([]);
	});
});

describe('SearchEngine', () => {
	let env: TestEnvironment;
	const contexts: TestContext[] = [];

	beforeEach(async () => {
		env = await createTestEnvironment();
	});

	afterEach(async () => {
		for (const ctx of contexts.splice(0)) {
			await ctx.cleanup();
		}
		await env.cleanup();
	});

	async function indexFixture(projectId: string = PROJECT): Promise<void> {
		const ctx = await copyFixtureToTemp();
		contexts.push(ctx);
		await env.pipeline.run(projectId, ctx.projectRoot);
	}

	async function indexFiles(
		projectId: string,
		files: Record<string, string>,
	): Promise<void> {
		const ctx = await createTempProject(files);
		contexts.push(ctx);
		await env.pipeline.run(projectId, ctx.projectRoot);
	}

	describe('validation', () => {
		it('rejects an empty query', async () => {
			await expect(env.search.search(PROJECT, '')).rejects.toBeInstanceOf(
				InvalidQueryError,
			);
			await expect(env.search.search(PROJECT, '   ')).rejects.toBeInstanceOf(
				InvalidQueryError,
			);
		});

		it('rejects a non-positive limit', async () => {
			await expect(env.search.search(PROJECT, 'auth', 0)).rejects.toBeInstanceOf(
				InvalidQueryError,
			);
			await expect(env.search.search(PROJECT, 'auth', 1.5)).rejects.toBeInstanceOf(
				InvalidQueryError,
			);
		});
	});

	describe('lexical ranking', () => {
		it('ranks an exact name first', async () => {
			await indexFixture();

			const response = await env.search.search(PROJECT, 'total');

			expect(response.results[0]).toMatchObject({
				name: 'total',
				symbolType: 'method',
				parentName: 'PayrollReport',
				filePath: 'hr/payroll.py',
				startLine: 21,
				endLine: 22,
				matchedVia: 'lexical',
				score: 2,
			});
			expect(response.reason).toBeNull();
			expect(response.semanticSkipped).toBe(false);
		});

		it('ranks a prefix match above a substring match', async () => {
			await indexFixture();

			const response = await env.search.search(PROJECT, 'Auth');

			expect(response.results.map(r => [r.name, r.score])).toEqual([
				['AuthService', 2],
				['checkAuth', 1.5],
			]);
		});

		it('returns the verbatim definition', async () => {
			await indexFixture();

			const response = await env.search.search(PROJECT, 'apply_tax');

			expect(response.results[0]?.code).toBe(
				'def apply_tax(amount):\n    return amount * (1 - TAX_RATE)',
			);
		});

		it('applies the limit', async () => {
			await indexFixture();

			const response = await env.search.search(PROJECT, 'a', 3);

			expect(response.results).toHaveLength(3);
		});
	});

	describe('fusion', () => {
		it('marks a symbol found by name and embedding as both', async () => {
			await indexFixture();
			const [calc] = await env.store.listSymbols(PROJECT, 'hr/payroll.py');
			expect(calc?.name).toBe('calc_salary');
			if (!calc) return;

			const query = buildEmbeddingText(calc, env.config.indexing.maxEmbedChars);
			const response = await env.search.search(PROJECT, query);

			expect(response.results[0]).toMatchObject({
				name: 'calc_salary',
				matchedVia: 'both',
				score: 3,
			});
			expect(response.results.slice(1).every(r => r.matchedVia === 'lexical')).toBe(
				true,
			);
		});
	});

	describe('scoping', () => {
		beforeEach(async () => {
			await indexFiles('proj-a', {
				'auth.py': 'def check_auth(token):\n    return token == "test-secret"\n',
			});
			await indexFiles('proj-b', {
				'billing.py': 'def compute_invoice(order):\n    return order.total\n',
			});
		});

		it('searches every project when the scope is null', async () => {
			const response = await env.search.search(null, 'auth');

			expect(response.projectId).toBeNull();
			expect(response.results).toHaveLength(1);
			expect(response.results[0]).toMatchObject({
				name: 'check_auth',
				projectId: 'proj-a',
				matchedVia: 'lexical',
			});
		});

		it('keeps results inside the requested project', async () => {
			const response = await env.search.search('proj-b', 'auth');

			expect(response.results).toEqual([]);
			expect(response.reason).toBeNull();
		});
	});

	describe('reasons', () => {
		it('reports no_symbols for an empty scope', async () => {
			const response = await env.search.search(PROJECT, 'anything');

			expect(response).toMatchObject({
				query: 'anything',
				projectId: PROJECT,
				results: [],
				semanticSkipped: true,
				reason: 'no_symbols',
			});
		});

		it('reports no_semantic_data when nothing is embedded', async () => {
			env.provider.failWith = outage();
			await indexFixture();

			const response = await env.search.search(PROJECT, 'apply_tax');

			expect(response.semanticSkipped).toBe(true);
			expect(response.reason).toBe('no_semantic_data');
			expect(response.results[0]?.name).toBe('apply_tax');
		});

		it('reports embedding_unavailable when the query cannot be embedded', async () => {
			await indexFixture();
			env.provider.failWith = outage();

			const response = await env.search.search(PROJECT, 'apply_tax');

			expect(response.semanticSkipped).toBe(true);
			expect(response.reason).toBe('embedding_unavailable');
			expect(response.results.map(r => r.name)).toEqual(['apply_tax']);
		});

		it('returns an empty result without a reason when nothing matches', async () => {
			await indexFixture();

			const response = await env.search.search(PROJECT, 'zzqx');

			expect(response.results).toEqual([]);
			expect(response.reason).toBeNull();
			expect(response.semanticSkipped).toBe(false);
		});
	});
});
