/**
 * IndexingPipeline - Reindex a project's symbols.
 *
 * Stages:
 * 1. Enumerate files and apply the exclusion policy
 * 2. Parse files concurrently (p-limit pool) into a BoundedChannel
 * 3. Embed and upsert each file's symbols (one merge-insert per file)
 * 4. After every write has committed, prune rows of completed files whose
 *    identity was not rewritten, then rows of files that no longer exist
 *
 * Runs are single-flight per project: a second request while one is active
 * is rejected with AlreadyIndexingError.
 */

import fs from 'node:fs/promises';
import pLimit from 'p-limit';
import type {IndexingConfig} from '../../lib/config.js';
import {
	AlreadyIndexingError,
	errorMessage,
	isAbortError,
} from '../../lib/errors.js';
import {computeStringHash, hasNullBytes} from '../../lib/hash.js';
import {createNullLogger, toError, type Logger} from '../../lib/logger.js';
import type {ParserRegistry} from '../../lib/parsers/registry.js';
import type {ParsedSymbol, ParseFailure} from '../../lib/parsers/types.js';
import type {SymbolStore} from '../storage/index.js';
import type {LineSpan, StoredFileState, SymbolInput} from '../storage/types.js';
import {TypedEmitter, type IndexingEvents, type IndexSummary} from '../types.js';
import {BoundedChannel} from './bounded-channel.js';
import {buildEmbeddingText, type EmbeddingGateway} from './gateway.js';
import {loadExclusionPolicy, scanProjectFiles, type ScannedFile} from './scanner.js';

export type IndexOptions = {
	/** Drop the project's rows first and reparse every file */
	force?: boolean;
	/** Checked before each file; committed files stay committed */
	signal?: AbortSignal;
};

export type IndexingPipelineDeps = {
	store: SymbolStore;
	registry: ParserRegistry;
	gateway: EmbeddingGateway;
	config: IndexingConfig & {
		maxFileBytes: number;
		excludePatterns: readonly string[];
	};
	logger?: Logger;
};

/**
 * A parsed file waiting for embedding and write.
 */
type ParsedFile = {
	filePath: string;
	fileHash: string;
	symbols: ParsedSymbol[];
};

/**
 * Mutable state of one run.
 */
type RunState = {
	projectId: string;
	summary: IndexSummary;
	stored: Map<string, StoredFileState>;
	force: boolean;
	/** Files whose symbols were committed, with the spans written */
	completed: Map<string, LineSpan[]>;
	signal?: AbortSignal;
};

function createSummary(projectId: string): IndexSummary {
	return {
		projectId,
		filesScanned: 0,
		filesIndexed: 0,
		filesUnchanged: 0,
		filesFailed: 0,
		symbolsWritten: 0,
		symbolsPruned: 0,
		embeddingFailures: 0,
		rejectedWrites: 0,
		duplicateSpans: 0,
		failures: [],
		cancelled: false,
		durationMs: 0,
	};
}

/**
 * A file is current when every stored row came from the same content and
 * has an embedding.
 */
/**
 * Keep the first symbol of each (startLine, endLine) span. Symbols are
 * ordered outer-first, so a one-line class wins over its one-line method.
 */
export function dropDuplicateSpans(symbols: readonly ParsedSymbol[]): {
	kept: ParsedSymbol[];
	dropped: ParsedSymbol[];
} {
	const seen = new Set<string>();
	const kept: ParsedSymbol[] = [];
	const dropped: ParsedSymbol[] = [];
	for (const symbol of symbols) {
		const span = `${symbol.startLine}:${symbol.endLine}`;
		if (seen.has(span)) {
			dropped.push(symbol);
		} else {
			seen.add(span);
			kept.push(symbol);
		}
	}
	return {kept, dropped};
}

function isUnchanged(state: StoredFileState | undefined, fileHash: string): boolean {
	return (
		state !== undefined &&
		state.missingEmbeddings === 0 &&
		state.fileHashes.size === 1 &&
		state.fileHashes.has(fileHash)
	);
}

export class IndexingPipeline extends TypedEmitter<IndexingEvents> {
	private readonly store: SymbolStore;
	private readonly registry: ParserRegistry;
	private readonly gateway: EmbeddingGateway;
	private readonly config: IndexingPipelineDeps['config'];
	private readonly logger: Logger;
	private readonly active = new Map<string, Promise<IndexSummary>>();

	constructor(deps: IndexingPipelineDeps) {
		super();
		this.store = deps.store;
		this.registry = deps.registry;
		this.gateway = deps.gateway;
		this.config = deps.config;
		this.logger = deps.logger ?? createNullLogger();
	}

	/**
	 * Whether a run for the project is in progress.
	 */
	isIndexing(projectId: string): boolean {
		return this.active.has(projectId);
	}

	/**
	 * Reindex one project rooted at `rootPath`.
	 *
	 * @throws AlreadyIndexingError when a run for the project is active
	 */
	async run(
		projectId: string,
		rootPath: string,
		options: IndexOptions = {},
	): Promise<IndexSummary> {
		if (this.active.has(projectId)) {
			throw new AlreadyIndexingError(projectId);
		}

		const run = this.execute(projectId, rootPath, options);
		this.active.set(projectId, run);
		try {
			return await run;
		} finally {
			this.active.delete(projectId);
		}
	}

	private async execute(
		projectId: string,
		rootPath: string,
		options: IndexOptions,
	): Promise<IndexSummary> {
		const startTime = Date.now();
		const force = options.force ?? false;
		const summary = createSummary(projectId);

		const exclude = await loadExclusionPolicy(rootPath, this.config.excludePatterns);
		const files = await scanProjectFiles(rootPath, {
			exclude,
			supports: filePath => this.registry.supports(filePath),
			maxFileBytes: this.config.maxFileBytes,
			logger: this.logger,
		});
		summary.filesScanned = files.length;

		if (force) {
			summary.symbolsPruned += await this.store.deleteProject(projectId);
		}
		const stored = force
			? new Map<string, StoredFileState>()
			: await this.store.getFileStates(projectId);

		this.logger.info('Pipeline', 'Index run started', {
			projectId,
			rootPath,
			files: files.length,
			force,
		});
		this.emit('index-start', {projectId, files: files.length, force});

		const state: RunState = {
			projectId,
			summary,
			stored,
			force,
			completed: new Map(),
			signal: options.signal,
		};

		await this.processFiles(state, files);

		// Ordered after every per-file commit above
		for (const [filePath, spans] of state.completed) {
			summary.symbolsPruned += await this.store.deleteStale(
				projectId,
				filePath,
				spans,
			);
		}

		summary.cancelled = summary.cancelled || Boolean(options.signal?.aborted);
		if (!summary.cancelled) {
			const present = new Set(files.map(f => f.relativePath));
			const gone = [...stored.keys()].filter(filePath => !present.has(filePath));
			if (gone.length > 0) {
				summary.symbolsPruned += await this.store.deleteFiles(projectId, gone);
			}
			try {
				await this.store.ensureIndexes(this.config.indexBuildThreshold);
			} catch (error) {
				this.logger.warn('Pipeline', 'Index build failed', {
					projectId,
					error: errorMessage(error),
				});
			}
		}

		summary.durationMs = Date.now() - startTime;
		this.logger.info('Pipeline', 'Index run finished', {
			projectId,
			filesScanned: summary.filesScanned,
			filesIndexed: summary.filesIndexed,
			filesUnchanged: summary.filesUnchanged,
			filesFailed: summary.filesFailed,
			symbolsWritten: summary.symbolsWritten,
			symbolsPruned: summary.symbolsPruned,
			embeddingFailures: summary.embeddingFailures,
			rejectedWrites: summary.rejectedWrites,
			duplicateSpans: summary.duplicateSpans,
			cancelled: summary.cancelled,
			durationMs: summary.durationMs,
		});
		this.emit(summary.cancelled ? 'index-cancelled' : 'index-complete', summary);
		return summary;
	}

	/**
	 * Run the parse stage and the embed/write stage against one channel.
	 * A failure in either stage closes the channel so the other stops, and
	 * the first failure is rethrown.
	 */
	private async processFiles(state: RunState, files: ScannedFile[]): Promise<void> {
		const channel = new BoundedChannel<ParsedFile>(this.config.queueCapacity);
		const failures: unknown[] = [];
		const fail = (error: unknown) => {
			failures.push(error);
			channel.close();
		};

		const producer = this.produce(state, files, channel).then(
			() => channel.close(),
			fail,
		);
		const consumers = Array.from({length: this.config.embedConcurrency}, () =>
			this.consume(state, channel).catch(fail),
		);

		await Promise.all([producer, ...consumers]);
		if (failures.length > 0) {
			const [error] = failures;
			this.logger.error('Pipeline', 'Index run failed', toError(error));
			throw error;
		}
	}

	private async produce(
		state: RunState,
		files: ScannedFile[],
		channel: BoundedChannel<ParsedFile>,
	): Promise<void> {
		const limit = pLimit(this.config.parseConcurrency);
		await Promise.all(
			files.map(file =>
				limit(async () => {
					if (channel.isClosed) return;
					if (state.signal?.aborted) {
						state.summary.cancelled = true;
						return;
					}
					const parsed = await this.parseFile(state, file);
					if (parsed) {
						await channel.push(parsed);
					}
				}),
			),
		);
	}

	private recordFailure(state: RunState, failure: ParseFailure): void {
		state.summary.filesFailed++;
		state.summary.failures.push(failure);
		this.logger.warn('Pipeline', 'Skipping file', failure);
		this.emit('file-failed', {...failure, projectId: state.projectId});
	}

	/**
	 * Read, hash and parse one file. Null when the file is current, or
	 * could not be read or parsed (recorded as a failure).
	 */
	private async parseFile(
		state: RunState,
		file: ScannedFile,
	): Promise<ParsedFile | null> {
		const extractor = this.registry.forPath(file.relativePath);
		if (!extractor) {
			return null;
		}

		let content: Buffer;
		try {
			content = await fs.readFile(file.absolutePath);
		} catch (error) {
			this.recordFailure(state, {
				filePath: file.relativePath,
				reason: `Unreadable: ${errorMessage(error)}`,
			});
			return null;
		}
		if (hasNullBytes(content)) {
			this.recordFailure(state, {
				filePath: file.relativePath,
				reason: 'Binary content',
			});
			return null;
		}

		const text = content.toString('utf-8');
		const fileHash = computeStringHash(text);
		if (!state.force && isUnchanged(state.stored.get(file.relativePath), fileHash)) {
			state.summary.filesUnchanged++;
			return null;
		}

		const result = extractor.parse(text, file.relativePath);
		if (!result.ok) {
			this.recordFailure(state, result.failure);
			return null;
		}
		this.emit('file-parsed', {
			projectId: state.projectId,
			filePath: file.relativePath,
			symbols: result.symbols.length,
		});
		return {filePath: file.relativePath, fileHash, symbols: result.symbols};
	}

	private async consume(
		state: RunState,
		channel: BoundedChannel<ParsedFile>,
	): Promise<void> {
		for await (const file of channel) {
			if (state.signal?.aborted) {
				// Drain without writing
				state.summary.cancelled = true;
				continue;
			}
			await this.writeFile(state, file);
		}
	}

	/**
	 * Embed and upsert one file's symbols in a single store commit.
	 */
	private async writeFile(state: RunState, file: ParsedFile): Promise<void> {
		const {projectId, summary} = state;
		const {kept: symbols, dropped} = dropDuplicateSpans(file.symbols);
		if (dropped.length > 0) {
			summary.duplicateSpans += dropped.length;
			this.logger.warn('Pipeline', 'Dropping symbols that share a span', {
				projectId,
				filePath: file.filePath,
				dropped: dropped.map(s => `${s.name}:${s.startLine}-${s.endLine}`),
			});
		}

		const texts = symbols.map(symbol =>
			buildEmbeddingText(symbol, this.config.maxEmbedChars),
		);

		let vectors: Array<number[] | null>;
		let embeddingFailures: number;
		try {
			({vectors, failures: embeddingFailures} = await this.gateway.embedAll(
				texts,
				state.signal,
			));
		} catch (error) {
			if (isAbortError(error) || state.signal?.aborted) {
				summary.cancelled = true;
				return;
			}
			throw error;
		}

		const inputs: SymbolInput[] = symbols.map((symbol, i) => ({
			projectId,
			name: symbol.name,
			symbolType: symbol.symbolType,
			filePath: symbol.filePath,
			startLine: symbol.startLine,
			endLine: symbol.endLine,
			code: symbol.code,
			docstring: symbol.docstring,
			parentName: symbol.parentName,
			language: symbol.language,
			fileHash: file.fileHash,
			embedding: vectors[i] ?? null,
		}));

		const result = await this.store.upsertMany(inputs);
		summary.symbolsWritten += result.written;
		summary.rejectedWrites += result.rejected;
		summary.embeddingFailures += embeddingFailures;
		summary.filesIndexed++;

		// A partially refused file keeps its old rows until a clean write
		if (result.rejected === 0) {
			state.completed.set(
				file.filePath,
				symbols.map(s => ({startLine: s.startLine, endLine: s.endLine})),
			);
		}

		this.emit('file-written', {
			projectId,
			filePath: file.filePath,
			symbols: result.written,
			embeddingFailures,
		});
	}
}
