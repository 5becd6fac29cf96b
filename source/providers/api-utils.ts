/**
 * Shared utilities for API-based embedding providers.
 *
 * Provides retry with exponential backoff, batching, and HTTP error mapping.
 */

import {z} from 'zod';
import {EmbeddingError, throwIfAborted} from '../lib/errors.js';

// ============================================================================
// Constants
// ============================================================================

/** Maximum backoff (ms) */
export const MAX_BACKOFF_MS = 30_000;

/** Per-request timeout (ms) */
export const REQUEST_TIMEOUT_MS = 60_000;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Split an array into batches of a specified size.
 */
export function chunk<T>(array: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		batches.push(array.slice(i, i + size));
	}
	return batches;
}

/**
 * Whether a failed embedding call is worth repeating.
 * EmbeddingErrors say so explicitly; anything else (network errors thrown
 * by fetch) is treated as transient.
 */
export function isRetriableError(error: unknown): boolean {
	if (error instanceof EmbeddingError) {
		return error.retryable;
	}
	return true;
}

export type RetryOptions = {
	/** Attempts including the first (default 3) */
	maxAttempts?: number;
	/** Initial backoff (ms, default 500) */
	initialBackoffMs?: number;
	/** Backoff ceiling (ms) */
	maxBackoffMs?: number;
	signal?: AbortSignal;
	/** Called before each wait with the upcoming attempt number */
	onRetry?: (info: {attempt: number; maxAttempts: number; error: unknown; backoffMs: number}) => void;
};

/**
 * Execute an async function with exponential backoff retry on retriable errors.
 * Non-retriable errors and the last attempt's error are rethrown.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
	const maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
	let backoffMs = options.initialBackoffMs ?? 500;
	let attempt = 0;

	for (;;) {
		throwIfAborted(options.signal, 'Embedding cancelled');
		attempt++;
		try {
			return await fn();
		} catch (error) {
			if (attempt >= maxAttempts || !isRetriableError(error)) {
				throw error;
			}

			options.onRetry?.({attempt: attempt + 1, maxAttempts, error, backoffMs});
			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
		}
	}
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Whether an HTTP status is transient.
 */
export function isRetriableStatus(status: number): boolean {
	return status === 408 || status === 429 || status >= 500;
}

const apiErrorSchema = z.object({
	error: z.union([
		z.string(),
		z.object({message: z.string().optional()}).passthrough(),
	]),
});

/**
 * Turn a non-2xx response into an EmbeddingError, using the JSON error
 * message when the body has one.
 */
export async function toEmbeddingError(
	provider: string,
	response: Response,
): Promise<EmbeddingError> {
	const errorText = await response.text();
	let message = errorText;
	try {
		const parsed = apiErrorSchema.safeParse(JSON.parse(errorText));
		if (parsed.success) {
			const {error} = parsed.data;
			message = (typeof error === 'string' ? error : error.message) || errorText;
		}
	} catch (parseError) {
		if (!(parseError instanceof SyntaxError)) throw parseError;
	}

	return new EmbeddingError(
		`${provider} API error (${response.status}): ${message}`,
		{retryable: isRetriableStatus(response.status), status: response.status},
	);
}

/**
 * POST JSON and validate the response body.
 * Network failures surface as retryable EmbeddingErrors.
 */
export async function postJson<T>(
	provider: string,
	url: string,
	body: unknown,
	schema: z.ZodType<T>,
	options: {headers?: Record<string, string>; signal?: AbortSignal} = {},
): Promise<T> {
	const timeout = AbortSignal.timeout(REQUEST_TIMEOUT_MS);
	const signal = options.signal
		? AbortSignal.any([options.signal, timeout])
		: timeout;

	let response: Response;
	try {
		response = await fetch(url, {
			method: 'POST',
			headers: {'Content-Type': 'application/json', ...options.headers},
			body: JSON.stringify(body),
			signal,
		});
	} catch (error) {
		if (options.signal?.aborted) throw error;
		throw new EmbeddingError(
			`${provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
			{retryable: true, cause: error},
		);
	}

	if (!response.ok) {
		throw await toEmbeddingError(provider, response);
	}

	const parsed = schema.safeParse(await response.json());
	if (!parsed.success) {
		throw new EmbeddingError(
			`${provider} returned an unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
			{retryable: false},
		);
	}
	return parsed.data;
}
