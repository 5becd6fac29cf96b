/**
 * EmbeddingGateway - Retrying, failure-tolerant front of an EmbeddingProvider.
 *
 * A failed embedding never fails the caller: vectors come back null and
 * are counted, and the symbol is stored without one.
 */

import {errorMessage, isAbortError} from '../../lib/errors.js';
import {createNullLogger, type Logger} from '../../lib/logger.js';
import type {ParsedSymbol} from '../../lib/parsers/types.js';
import {chunk, isRetriableError, withRetry} from '../../providers/api-utils.js';
import type {EmbeddingProvider} from '../../providers/types.js';

export type EmbeddingGatewayOptions = {
	/** Texts per provider request */
	batchSize: number;
	/** Attempts per request, first included */
	maxAttempts: number;
	initialBackoffMs: number;
	logger?: Logger;
};

export type EmbedAllResult = {
	/** One entry per input text; null where embedding failed */
	vectors: Array<number[] | null>;
	failures: number;
};

/**
 * Text sent to the embedding model for a symbol.
 */
export function buildEmbeddingText(
	symbol: Pick<
		ParsedSymbol,
		'name' | 'filePath' | 'parentName' | 'docstring' | 'code'
	> & {symbolType: string},
	maxChars: number,
): string {
	const lines = [
		`${symbol.symbolType} ${symbol.name}`,
		`File: ${symbol.filePath}`,
	];
	if (symbol.parentName) {
		lines.push(`Parent: ${symbol.parentName}`);
	}
	if (symbol.docstring) {
		lines.push(symbol.docstring);
	}
	lines.push(symbol.code);
	return lines.join('\n').slice(0, maxChars);
}

export class EmbeddingGateway {
	private readonly provider: EmbeddingProvider;
	private readonly options: EmbeddingGatewayOptions;
	private readonly logger: Logger;

	constructor(provider: EmbeddingProvider, options: EmbeddingGatewayOptions) {
		this.provider = provider;
		this.options = options;
		this.logger = options.logger ?? createNullLogger();
	}

	get dimensions(): number {
		return this.provider.dimensions;
	}

	/**
	 * Embed texts in batches. A batch that keeps failing with a transient
	 * error yields nulls for all its texts; a batch rejected outright is
	 * retried text by text so one bad input does not sink its neighbours.
	 *
	 * @throws only when `signal` aborts
	 */
	async embedAll(texts: string[], signal?: AbortSignal): Promise<EmbedAllResult> {
		const vectors: Array<number[] | null> = [];
		let failures = 0;

		for (const batch of chunk(texts, this.options.batchSize)) {
			try {
				const result = await this.request(batch, signal);
				for (const vector of result) {
					vectors.push(vector);
					if (!vector) failures++;
				}
				continue;
			} catch (error) {
				if (isAbortError(error) || signal?.aborted) throw error;
				if (batch.length === 1 || isRetriableError(error)) {
					this.logger.warn('EmbeddingGateway', 'Embedding batch failed', {
						texts: batch.length,
						error: errorMessage(error),
					});
					vectors.push(...batch.map(() => null));
					failures += batch.length;
					continue;
				}
			}

			for (const text of batch) {
				const vector = await this.embedOne(text, signal);
				vectors.push(vector);
				if (!vector) failures++;
			}
		}

		return {vectors, failures};
	}

	/**
	 * Embed a search query; null when the provider is unavailable.
	 */
	async embedQuery(text: string, signal?: AbortSignal): Promise<number[] | null> {
		return this.embedOne(text, signal);
	}

	private async embedOne(
		text: string,
		signal?: AbortSignal,
	): Promise<number[] | null> {
		try {
			const [vector] = await this.request([text], signal);
			return vector ?? null;
		} catch (error) {
			if (isAbortError(error) || signal?.aborted) throw error;
			this.logger.warn('EmbeddingGateway', 'Embedding failed', {
				chars: text.length,
				error: errorMessage(error),
			});
			return null;
		}
	}

	/**
	 * One provider call with retries. Vectors of the wrong width are
	 * discarded.
	 */
	private async request(
		texts: string[],
		signal?: AbortSignal,
	): Promise<Array<number[] | null>> {
		const vectors = await withRetry(() => this.provider.embed(texts, signal), {
			maxAttempts: this.options.maxAttempts,
			initialBackoffMs: this.options.initialBackoffMs,
			signal,
			onRetry: ({attempt, maxAttempts, error, backoffMs}) => {
				this.logger.debug('EmbeddingGateway', 'Retrying embedding request', {
					attempt,
					maxAttempts,
					backoffMs,
					error: errorMessage(error),
				});
			},
		});

		return vectors.map(vector => {
			if (vector.length === this.provider.dimensions) {
				return vector;
			}
			this.logger.warn('EmbeddingGateway', 'Discarding vector of wrong width', {
				expected: this.provider.dimensions,
				actual: vector.length,
			});
			return null;
		});
	}
}
