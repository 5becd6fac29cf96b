/**
 * Ollama embedding provider using a local Ollama server.
 *
 * Default model nomic-embed-text (768 dimensions).
 */

import {z} from 'zod';
import {EmbeddingError} from '../lib/errors.js';
import {postJson} from './api-utils.js';
import type {EmbeddingProvider} from './types.js';

const DEFAULT_API_BASE = 'http://localhost:11434';

const embedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'ollama';
	readonly dimensions: number;
	private readonly model: string;
	private readonly apiBase: string;

	constructor(options: {model: string; dimensions: number; baseUrl?: string}) {
		this.model = options.model;
		this.dimensions = options.dimensions;
		this.apiBase = (options.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
	}

	async initialize(): Promise<void> {
		if (!this.model.trim()) {
			throw new EmbeddingError('Ollama model name required', {retryable: false});
		}
	}

	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const data = await postJson(
			'Ollama',
			`${this.apiBase}/api/embed`,
			{model: this.model, input: texts},
			embedResponseSchema,
			{signal},
		);

		if (data.embeddings.length !== texts.length) {
			throw new EmbeddingError(
				`Ollama returned ${data.embeddings.length} embeddings for ${texts.length} inputs`,
				{retryable: false},
			);
		}
		return data.embeddings;
	}

	async embedSingle(text: string, signal?: AbortSignal): Promise<number[]> {
		const [vector] = await this.embed([text], signal);
		if (!vector) {
			throw new EmbeddingError('Ollama embedding failed', {retryable: false});
		}
		return vector;
	}

	close(): void {
		// Stateless HTTP client
	}
}
