/**
 * SymbolIndex - Entry point wiring config, store, providers and services.
 *
 * Startup validates that the embedding provider, the configuration and the
 * stored table agree on the vector dimension. A mismatch is fatal: the
 * index refuses to open rather than mixing vector widths.
 */

import {loadConfig, type SymdexConfig, type SymdexConfigInput} from '../lib/config.js';
import {
	AlreadyIndexingError,
	ConfigurationError,
	EmbeddingError,
	errorMessage,
	ProjectNotFoundError,
} from '../lib/errors.js';
import {createLogger, type Logger} from '../lib/logger.js';
import {createParserRegistry, type ParserRegistry} from '../lib/parsers/index.js';
import {createEmbeddingProvider, type EmbeddingProvider} from '../providers/index.js';
import {EmbeddingGateway} from './indexing/gateway.js';
import {IndexingPipeline, type IndexOptions} from './indexing/pipeline.js';
import {ProjectRegistry, type Project} from './projects.js';
import {SearchEngine, type SearchResponse} from './search/index.js';
import {SymbolStore} from './storage/index.js';
import type {IndexSummary} from './types.js';

const PROBE_TEXT = 'symdex dimension probe';

export type SymbolIndexOptions = {
	/** Resolved config; loaded from {home}/config.json when absent */
	config?: SymdexConfig;
	/** Applied on top of the loaded config */
	overrides?: SymdexConfigInput;
	/** Provider instance; built from the config when absent */
	provider?: EmbeddingProvider;
	/** Parser registry; all built-in languages when absent */
	parsers?: ParserRegistry;
	/** projects.json location (default: {home}/projects.json) */
	projectsPath?: string;
	logger?: Logger;
	/**
	 * Embed one probe text at startup and check its width. A provider that
	 * is unreachable only logs a warning.
	 */
	probeEmbeddings?: boolean;
};

export class SymbolIndex {
	readonly config: SymdexConfig;
	readonly projects: ProjectRegistry;
	readonly store: SymbolStore;
	readonly pipeline: IndexingPipeline;
	readonly searchEngine: SearchEngine;
	private readonly provider: EmbeddingProvider;
	private readonly logger: Logger;

	private constructor(args: {
		config: SymdexConfig;
		projects: ProjectRegistry;
		store: SymbolStore;
		provider: EmbeddingProvider;
		parsers: ParserRegistry;
		logger: Logger;
	}) {
		const {config, store, provider, logger} = args;
		this.config = config;
		this.projects = args.projects;
		this.store = store;
		this.provider = provider;
		this.logger = logger;

		const gateway = new EmbeddingGateway(provider, {
			batchSize: config.indexing.embedBatchSize,
			maxAttempts: config.indexing.embedMaxAttempts,
			initialBackoffMs: config.indexing.embedInitialBackoffMs,
			logger,
		});
		this.pipeline = new IndexingPipeline({
			store,
			registry: args.parsers,
			gateway,
			config: {
				...config.indexing,
				maxFileBytes: config.maxFileBytes,
				excludePatterns: config.excludePatterns,
			},
			logger,
		});
		this.searchEngine = new SearchEngine({
			store,
			gateway,
			config: config.search,
			logger,
		});
	}

	/**
	 * Open the index.
	 *
	 * @throws ConfigurationError on invalid config, dimension mismatch, or an
	 * unusable database location
	 */
	static async open(options: SymbolIndexOptions = {}): Promise<SymbolIndex> {
		const config =
			options.config ?? (await loadConfig({overrides: options.overrides}));
		const logger = options.logger ?? createLogger('symdex');
		const provider = options.provider ?? createEmbeddingProvider(config);

		if (provider.dimensions !== config.embeddingDimensions) {
			throw new ConfigurationError(
				`Embedding dimension mismatch: provider ${provider.name} produces ` +
					`${provider.dimensions} dimensions, configuration expects ` +
					`${config.embeddingDimensions}.`,
			);
		}

		await provider.initialize();
		if (options.probeEmbeddings) {
			await probeProvider(provider, logger);
		}

		const parsers =
			options.parsers ??
			(await createParserRegistry({
				documents: config.indexing.indexDocuments,
			}));
		const store = new SymbolStore({
			databasePath: config.databasePath,
			tableName: config.tableName,
			dimensions: config.embeddingDimensions,
			logger,
		});
		try {
			await store.connect();
		} catch (error) {
			provider.close();
			throw error;
		}

		logger.info('SymbolIndex', 'Opened', {
			databasePath: config.databasePath,
			provider: provider.name,
			model: config.embeddingModel,
			dimensions: config.embeddingDimensions,
		});

		return new SymbolIndex({
			config,
			projects: new ProjectRegistry(options.projectsPath),
			store,
			provider,
			parsers,
			logger,
		});
	}

	/**
	 * Register a project root (idempotent).
	 */
	async addProject(rootPath: string, name?: string): Promise<Project> {
		return this.projects.register(rootPath, name);
	}

	async listProjects(): Promise<Project[]> {
		return this.projects.list();
	}

	/**
	 * Reindex a registered project.
	 *
	 * @throws ProjectNotFoundError for an unregistered id
	 * @throws AlreadyIndexingError while a run for the project is active
	 */
	async index(projectId: string, options: IndexOptions = {}): Promise<IndexSummary> {
		const project = await this.projects.require(projectId);
		return this.pipeline.run(project.id, project.rootPath, options);
	}

	/**
	 * Search one project, or every project when `projectId` is null.
	 */
	async search(
		projectId: string | null,
		query: string,
		limit?: number,
	): Promise<SearchResponse> {
		return this.searchEngine.search(projectId, query, limit);
	}

	/**
	 * Delete a project's symbols and its registry entry.
	 *
	 * @returns rows deleted
	 * @throws ProjectNotFoundError when neither exists
	 */
	async removeProject(projectId: string): Promise<number> {
		if (this.pipeline.isIndexing(projectId)) {
			throw new AlreadyIndexingError(projectId);
		}
		const deleted = await this.store.deleteProject(projectId);
		const removed = await this.projects.remove(projectId);
		if (!removed && deleted === 0) {
			throw new ProjectNotFoundError(projectId);
		}
		this.logger.info('SymbolIndex', 'Project removed', {projectId, deleted});
		return deleted;
	}

	close(): void {
		this.store.close();
		this.provider.close();
	}
}

async function probeProvider(provider: EmbeddingProvider, logger: Logger): Promise<void> {
	let vector: number[];
	try {
		vector = await provider.embedSingle(PROBE_TEXT);
	} catch (error) {
		if (error instanceof EmbeddingError) {
			logger.warn('SymbolIndex', 'Embedding probe failed', {
				provider: provider.name,
				error: errorMessage(error),
			});
			return;
		}
		throw error;
	}
	if (vector.length !== provider.dimensions) {
		throw new ConfigurationError(
			`Embedding dimension mismatch: provider ${provider.name} returned ` +
				`${vector.length} dimensions, configuration expects ${provider.dimensions}.`,
		);
	}
}
