/**
 * Errors - Typed failures surfaced by the indexing and search services.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text.
 */

export type SymdexErrorCode =
	| 'CONFIGURATION'
	| 'INTEGRITY'
	| 'ALREADY_INDEXING'
	| 'INVALID_QUERY'
	| 'EMBEDDING'
	| 'PROJECT_NOT_FOUND';

export class SymdexError extends Error {
	readonly code: SymdexErrorCode;

	constructor(code: SymdexErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'SymdexError';
		this.code = code;
	}
}

/**
 * Fatal misconfiguration: dimension mismatch, unusable store location,
 * invalid config file.
 */
export class ConfigurationError extends SymdexError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIGURATION', message, options);
		this.name = 'ConfigurationError';
	}
}

/**
 * A write reached the store without a concrete project identity.
 */
export class IntegrityError extends SymdexError {
	constructor(message: string) {
		super('INTEGRITY', message);
		this.name = 'IntegrityError';
	}
}

export class AlreadyIndexingError extends SymdexError {
	readonly projectId: string;

	constructor(projectId: string) {
		super('ALREADY_INDEXING', `Project ${projectId} is already indexing`);
		this.name = 'AlreadyIndexingError';
		this.projectId = projectId;
	}
}

export class InvalidQueryError extends SymdexError {
	constructor(message: string) {
		super('INVALID_QUERY', message);
		this.name = 'InvalidQueryError';
	}
}

/**
 * Embedding provider failure. `retryable` marks transient conditions
 * (rate limits, 5xx, network) that the gateway may retry.
 */
export class EmbeddingError extends SymdexError {
	readonly retryable: boolean;
	readonly status: number | null;

	constructor(
		message: string,
		args: {retryable: boolean; status?: number | null; cause?: unknown},
	) {
		super('EMBEDDING', message, {cause: args.cause});
		this.name = 'EmbeddingError';
		this.retryable = args.retryable;
		this.status = args.status ?? null;
	}
}

export class ProjectNotFoundError extends SymdexError {
	readonly projectId: string;

	constructor(projectId: string) {
		super('PROJECT_NOT_FOUND', `Unknown project: ${projectId}`);
		this.name = 'ProjectNotFoundError';
		this.projectId = projectId;
	}
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Cancellation
// ============================================================================

/**
 * Throw an `AbortError` when the signal has fired, prefixed with `context`.
 */
export function throwIfAborted(signal?: AbortSignal, context?: string): void {
	if (!signal?.aborted) {
		return;
	}
	const {reason} = signal;
	const detail =
		reason instanceof Error && reason.message
			? reason.message
			: typeof reason === 'string' && reason.trim()
				? reason
				: 'Cancelled';
	const error = new Error(context ? `${context}: ${detail}` : detail);
	error.name = 'AbortError';
	throw error;
}

/**
 * True for our own cancellation errors and for aborted fetches.
 */
export function isAbortError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}
	const code = 'code' in error ? error.code : undefined;
	return error.name === 'AbortError' || code === 'ABORT_ERR';
}
