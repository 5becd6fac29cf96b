/**
 * Embedding Provider Types.
 *
 * Providers turn text into fixed-dimension vectors. They make one attempt
 * per call; retries and per-symbol failure handling live in the
 * EmbeddingGateway.
 */

/**
 * Embedding provider interface for generating vector embeddings.
 */
export interface EmbeddingProvider {
	/** Provider name for logs */
	readonly name: string;

	/** Number of dimensions in the embedding vectors */
	readonly dimensions: number;

	/**
	 * Validate credentials/settings. Must be called before embed().
	 */
	initialize(): Promise<void>;

	/**
	 * Generate embeddings for multiple texts, one vector per text in order.
	 * @throws EmbeddingError when the request fails
	 */
	embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;

	/**
	 * Generate embedding for a single text (query embedding).
	 * @throws EmbeddingError when the request fails
	 */
	embedSingle(text: string, signal?: AbortSignal): Promise<number[]>;

	/**
	 * Close the provider and free resources.
	 */
	close(): void;
}
