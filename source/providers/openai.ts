/**
 * OpenAI embedding provider using the OpenAI embeddings API.
 *
 * Supports regional endpoints for corporate accounts with data residency:
 * - Default: https://api.openai.com/v1
 * - US: https://us.api.openai.com/v1
 * - EU: https://eu.api.openai.com/v1
 */

import {z} from 'zod';
import {ConfigurationError, EmbeddingError} from '../lib/errors.js';
import {postJson} from './api-utils.js';
import type {EmbeddingProvider} from './types.js';

const DEFAULT_API_BASE = 'https://api.openai.com/v1';

const embeddingsResponseSchema = z.object({
	data: z.array(z.object({embedding: z.array(z.number()), index: z.number()})),
});

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'openai';
	readonly dimensions: number;
	private readonly model: string;
	private readonly apiKey: string;
	private readonly apiBase: string;

	constructor(options: {
		model: string;
		dimensions: number;
		apiKey?: string;
		baseUrl?: string;
	}) {
		this.model = options.model;
		this.dimensions = options.dimensions;
		// Trim the key to remove any accidental whitespace
		this.apiKey = (options.apiKey ?? '').trim();
		this.apiBase = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
	}

	async initialize(): Promise<void> {
		if (!this.apiKey) {
			throw new ConfigurationError(
				'OpenAI API key required. Set OPENAI_API_KEY or apiKey in config.json.',
			);
		}
	}

	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const data = await postJson(
			'OpenAI',
			`${this.apiBase}/embeddings`,
			{model: this.model, input: texts, dimensions: this.dimensions},
			embeddingsResponseSchema,
			{headers: {Authorization: `Bearer ${this.apiKey}`}, signal},
		);

		// Sort by index to ensure correct order
		const vectors = [...data.data]
			.sort((a, b) => a.index - b.index)
			.map(d => d.embedding);
		if (vectors.length !== texts.length) {
			throw new EmbeddingError(
				`OpenAI returned ${vectors.length} embeddings for ${texts.length} inputs`,
				{retryable: false},
			);
		}
		return vectors;
	}

	async embedSingle(text: string, signal?: AbortSignal): Promise<number[]> {
		const [vector] = await this.embed([text], signal);
		if (!vector) {
			throw new EmbeddingError('OpenAI embedding failed', {retryable: false});
		}
		return vector;
	}

	close(): void {
		// Stateless HTTP client
	}
}
