/**
 * Tests for the embedding providers (HTTP stubbed in process).
 */

import {describe, it, expect, afterEach, vi} from 'vitest';
import {resolveConfig} from '../../lib/config.js';
import {ConfigurationError, EmbeddingError} from '../../lib/errors.js';
import {
	createEmbeddingProvider,
	MockEmbeddingProvider,
	OllamaEmbeddingProvider,
	OpenAIEmbeddingProvider,
} from '../index.js';

function cosine(a: number[], b: number[]): number {
	let dot = 0;
	for (let i = 0; i < a.length; i++) {
		dot += (a[i] ?? 0) * (b[i] ?? 0);
	}
	return dot;
}

describe('MockEmbeddingProvider', () => {
	it('returns deterministic unit vectors of the configured width', async () => {
		const provider = new MockEmbeddingProvider(64);
		const [first, second] = await provider.embed(['calc_salary', 'calc_salary']);

		expect(first).toHaveLength(64);
		expect(first).toEqual(second);
		expect(cosine(first ?? [], first ?? [])).toBeCloseTo(1, 6);
	});

	it('maps distinct texts to nearly orthogonal vectors', async () => {
		const provider = new MockEmbeddingProvider();
		const a = await provider.embedSingle('check_auth');
		const b = await provider.embedSingle('calc_salary');

		expect(Math.abs(cosine(a, b))).toBeLessThan(0.3);
	});
});

describe('OllamaEmbeddingProvider', () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it('posts the batch to /api/embed', async () => {
		const fetchMock = vi.fn(
			async (_url: string | URL | Request, _init?: RequestInit) =>
				new Response(JSON.stringify({embeddings: [[1, 0], [0, 1]]}), {status: 200}),
		);
		vi.stubGlobal('fetch', fetchMock);

		const provider = new OllamaEmbeddingProvider({
			model: 'nomic-embed-text',
			dimensions: 2,
			baseUrl: 'http://ollama.test/',
		});
		const vectors = await provider.embed(['a', 'b']);

		expect(vectors).toEqual([
			[1, 0],
			[0, 1],
		]);
		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe('http://ollama.test/api/embed');
		expect(init?.body).toBe(JSON.stringify({model: 'nomic-embed-text', input: ['a', 'b']}));
	});

	it('rejects a response with the wrong number of vectors', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response(JSON.stringify({embeddings: [[1, 0]]}), {status: 200})),
		);
		const provider = new OllamaEmbeddingProvider({model: 'm', dimensions: 2});

		await expect(provider.embed(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingError);
	});
});

describe('OpenAIEmbeddingProvider', () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it('requires an API key', async () => {
		const provider = new OpenAIEmbeddingProvider({
			model: 'text-embedding-3-small',
			dimensions: 4,
			apiKey: '  ',
		});
		await expect(provider.initialize()).rejects.toBeInstanceOf(ConfigurationError);
	});

	it('orders vectors by response index and sends the key', async () => {
		const fetchMock = vi.fn(
			async (_url: string | URL | Request, _init?: RequestInit) =>
				new Response(
					JSON.stringify({
						data: [
							{embedding: [0, 1], index: 1},
							{embedding: [1, 0], index: 0},
						],
					}),
					{status: 200},
				),
		);
		vi.stubGlobal('fetch', fetchMock);

		const provider = new OpenAIEmbeddingProvider({
			model: 'text-embedding-3-small',
			dimensions: 2,
			apiKey: 'test-secret',
			baseUrl: 'http://openai.test/v1',
		});
		await provider.initialize();

		expect(await provider.embed(['first', 'second'])).toEqual([
			[1, 0],
			[0, 1],
		]);
		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe('http://openai.test/v1/embeddings');
		expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
	});
});

describe('createEmbeddingProvider', () => {
	it('builds the configured provider', () => {
		const mock = createEmbeddingProvider(
			resolveConfig({embeddingProvider: 'mock', embeddingDimensions: 16}),
		);
		expect(mock.name).toBe('mock');
		expect(mock.dimensions).toBe(16);

		const ollama = createEmbeddingProvider(resolveConfig({}));
		expect(ollama.name).toBe('ollama');
		expect(ollama.dimensions).toBe(768);
	});
});
