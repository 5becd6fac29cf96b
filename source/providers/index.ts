/**
 * Embedding provider factory.
 */

import type {SymdexConfig} from '../lib/config.js';
import {MockEmbeddingProvider} from './mock.js';
import {OllamaEmbeddingProvider} from './ollama.js';
import {OpenAIEmbeddingProvider} from './openai.js';
import type {EmbeddingProvider} from './types.js';

export type {EmbeddingProvider} from './types.js';
export {MockEmbeddingProvider} from './mock.js';
export {OllamaEmbeddingProvider} from './ollama.js';
export {OpenAIEmbeddingProvider} from './openai.js';

/**
 * Create the provider named by the config.
 */
export function createEmbeddingProvider(
	config: SymdexConfig,
): EmbeddingProvider {
	switch (config.embeddingProvider) {
		case 'ollama':
			return new OllamaEmbeddingProvider({
				model: config.embeddingModel,
				dimensions: config.embeddingDimensions,
				baseUrl: config.ollamaBaseUrl,
			});
		case 'openai':
			return new OpenAIEmbeddingProvider({
				model: config.embeddingModel,
				dimensions: config.embeddingDimensions,
				apiKey: config.apiKey,
				baseUrl: config.openaiBaseUrl,
			});
		case 'mock':
			return new MockEmbeddingProvider(config.embeddingDimensions);
	}
}
