/**
 * Service Types - Event maps and the typed event emitter.
 */

import {EventEmitter} from 'node:events';
import type {ParseFailure} from '../lib/parsers/types.js';

// ============================================================================
// Indexing Results
// ============================================================================

/**
 * Outcome of one reindex run.
 */
export type IndexSummary = {
	projectId: string;
	/** Files enumerated after exclusion */
	filesScanned: number;
	/** Files parsed and written this run */
	filesIndexed: number;
	/** Files skipped because content and embeddings were already current */
	filesUnchanged: number;
	/** Files that could not be read or parsed */
	filesFailed: number;
	symbolsWritten: number;
	symbolsPruned: number;
	/** Symbols stored without an embedding */
	embeddingFailures: number;
	/** Symbols refused by the store for a missing project identity */
	rejectedWrites: number;
	/** Symbols dropped because an earlier symbol of the file had the same span */
	duplicateSpans: number;
	failures: ParseFailure[];
	cancelled: boolean;
	durationMs: number;
};

// ============================================================================
// Indexing Events
// ============================================================================

/**
 * Events emitted by IndexingPipeline.
 */
export interface IndexingEvents {
	/** Run started, files enumerated */
	'index-start': [data: {projectId: string; files: number; force: boolean}];

	/** A file was parsed and queued for embedding */
	'file-parsed': [data: {projectId: string; filePath: string; symbols: number}];

	/** A file could not be read or parsed; the run continues */
	'file-failed': [data: ParseFailure & {projectId: string}];

	/** A file's symbols were committed */
	'file-written': [
		data: {
			projectId: string;
			filePath: string;
			symbols: number;
			embeddingFailures: number;
		},
	];

	/** Run finished */
	'index-complete': [summary: IndexSummary];

	/** Run stopped early by its abort signal */
	'index-cancelled': [summary: IndexSummary];
}

// ============================================================================
// Typed Event Emitter
// ============================================================================

/**
 * Type-safe event emitter for services.
 *
 * Usage:
 * ```typescript
 * const pipeline = new IndexingPipeline(deps);
 * pipeline.on('file-written', ({filePath, symbols}) => {
 *   console.log(`${filePath}: ${symbols} symbols`);
 * });
 * ```
 */
export class TypedEmitter<
	T extends {[K in keyof T]: unknown[]},
> extends EventEmitter {
	/**
	 * Emit a typed event.
	 */
	override emit<K extends keyof T & string>(event: K, ...args: T[K]): boolean {
		return super.emit(event, ...args);
	}

	/**
	 * Subscribe to a typed event.
	 */
	override on<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.on(event, listener as (...args: unknown[]) => void);
	}

	/**
	 * Subscribe to a typed event (once).
	 */
	override once<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.once(event, listener as (...args: unknown[]) => void);
	}

	/**
	 * Remove a typed event listener.
	 */
	override off<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.off(event, listener as (...args: unknown[]) => void);
	}
}
