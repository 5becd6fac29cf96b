/**
 * symdex - Symbol-level code indexing with hybrid lexical and semantic search.
 */

export {SymbolIndex, type SymbolIndexOptions} from './services/symbol-index.js';
export {ProjectRegistry, type Project} from './services/projects.js';

// Services
export {SymbolStore, type SymbolStoreOptions} from './services/storage/index.js';
export type * from './services/storage/types.js';
export {
	EmbeddingGateway,
	buildEmbeddingText,
	type EmbedAllResult,
	type EmbeddingGatewayOptions,
} from './services/indexing/gateway.js';
export {
	IndexingPipeline,
	type IndexOptions,
	type IndexingPipelineDeps,
} from './services/indexing/pipeline.js';
export {BoundedChannel} from './services/indexing/bounded-channel.js';
export {SearchEngine, type SearchEngineDeps} from './services/search/index.js';
export type * from './services/search/types.js';
export type {IndexSummary, IndexingEvents} from './services/types.js';

// Parsers
export * from './lib/parsers/index.js';
export {createExclusionPolicy, type ExclusionPolicy} from './lib/exclusion.js';

// Providers
export * from './providers/index.js';

// Config, errors, logging
export {
	loadConfig,
	resolveConfig,
	saveConfig,
	type SymdexConfig,
	type SymdexConfigInput,
} from './lib/config.js';
export {
	AlreadyIndexingError,
	ConfigurationError,
	EmbeddingError,
	IntegrityError,
	InvalidQueryError,
	ProjectNotFoundError,
	SymdexError,
	type SymdexErrorCode,
} from './lib/errors.js';
export {
	createConsoleLogger,
	createLogger,
	createNullLogger,
	type Logger,
	type LogLevel,
} from './lib/logger.js';
