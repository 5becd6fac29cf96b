/**
 * Config - symdex configuration loading and management.
 *
 * Configuration lives in {home}/config.json (default home:
 * ~/.local/share/symdex, override via $SYMDEX_HOME). Values are merged in
 * this order: defaults, config file, environment, explicit overrides.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {getConfigPath, getLanceDbPath, SYMBOLS_TABLE} from './constants.js';
import {ConfigurationError, errorMessage} from './errors.js';

// ============================================================================
// Provider Configurations
// ============================================================================

export const EMBEDDING_PROVIDERS = ['ollama', 'openai', 'mock'] as const;

export type EmbeddingProviderType = (typeof EMBEDDING_PROVIDERS)[number];

/**
 * Provider-specific embedding defaults.
 */
export const PROVIDER_CONFIGS: Record<
	EmbeddingProviderType,
	{model: string; dimensions: number}
> = {
	ollama: {
		model: 'nomic-embed-text',
		dimensions: 768,
	},
	openai: {
		model: 'text-embedding-3-small',
		dimensions: 1536,
	},
	mock: {
		model: 'mock-hash',
		dimensions: 768,
	},
};

// ============================================================================
// Schema
// ============================================================================

const indexingSchema = z.object({
	/** Files parsed concurrently */
	parseConcurrency: z.number().int().min(1).default(4),
	/** Files embedded concurrently */
	embedConcurrency: z.number().int().min(1).default(2),
	/** Parsed files buffered between parse and embed/write stages */
	queueCapacity: z.number().int().min(1).default(16),
	/** Texts per embedding request */
	embedBatchSize: z.number().int().min(1).default(32),
	/** Attempts per embedding request, first try included */
	embedMaxAttempts: z.number().int().min(1).max(10).default(3),
	embedInitialBackoffMs: z.number().int().min(0).default(500),
	/** Characters of symbol text sent to the embedding model */
	maxEmbedChars: z.number().int().min(64).default(8000),
	/** Row count at which the ANN index is built */
	indexBuildThreshold: z.number().int().min(256).default(5000),
	/** Index markdown files as heading sections */
	indexDocuments: z.boolean().default(false),
});

const searchSchema = z.object({
	defaultLimit: z.number().int().min(1).default(10),
	/** Lexical stage budget (K1) */
	lexicalLimit: z.number().int().min(1).default(50),
	/** Semantic stage budget (K2) */
	semanticLimit: z.number().int().min(1).default(50),
	/** Cosine similarity below which semantic hits are dropped */
	minSimilarity: z.number().min(-1).max(1).default(0.3),
});

const configSchema = z.object({
	version: z.literal(1).default(1),
	embeddingProvider: z.enum(EMBEDDING_PROVIDERS).default('ollama'),
	embeddingModel: z.string().min(1).optional(),
	embeddingDimensions: z.number().int().min(1).optional(),
	ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
	openaiBaseUrl: z.string().url().default('https://api.openai.com/v1'),
	apiKey: z.string().min(1).optional(),
	databasePath: z.string().min(1).optional(),
	tableName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default(SYMBOLS_TABLE),
	/** Extra gitignore-style exclusion patterns */
	excludePatterns: z.array(z.string()).default([]),
	maxFileBytes: z.number().int().min(1).default(1_000_000),
	indexing: indexingSchema.default({}),
	search: searchSchema.default({}),
});

export type SymdexConfigInput = z.input<typeof configSchema>;

type ParsedConfig = z.output<typeof configSchema>;

export type IndexingConfig = ParsedConfig['indexing'];

export type SearchConfig = ParsedConfig['search'];

/**
 * Fully resolved configuration. Provider-dependent fields are always set.
 */
export type SymdexConfig = Omit<
	ParsedConfig,
	'embeddingModel' | 'embeddingDimensions' | 'databasePath'
> & {
	embeddingModel: string;
	embeddingDimensions: number;
	databasePath: string;
};

// ============================================================================
// Resolution
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge config layers. Nested objects (indexing, search) merge one level deep.
 */
export function mergeConfigLayers(
	...layers: Array<Record<string, unknown>>
): Record<string, unknown> {
	const merged: Record<string, unknown> = {};
	for (const layer of layers) {
		for (const [key, value] of Object.entries(layer)) {
			if (value === undefined) continue;
			const existing = merged[key];
			merged[key] =
				isRecord(existing) && isRecord(value)
					? {...existing, ...value}
					: value;
		}
	}
	return merged;
}

/**
 * Validate raw config and fill provider-dependent defaults.
 *
 * @throws ConfigurationError when validation fails
 */
export function resolveConfig(raw: unknown): SymdexConfig {
	const result = configSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issues = result.error.issues
			.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new ConfigurationError(`Invalid configuration: ${issues}`);
	}

	const parsed = result.data;
	const providerDefaults = PROVIDER_CONFIGS[parsed.embeddingProvider];
	return {
		...parsed,
		embeddingModel: parsed.embeddingModel ?? providerDefaults.model,
		embeddingDimensions:
			parsed.embeddingDimensions ?? providerDefaults.dimensions,
		databasePath: parsed.databasePath ?? getLanceDbPath(),
	};
}

/**
 * Read config-relevant environment variables.
 */
export function readEnvConfig(
	env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
	const layer: Record<string, unknown> = {};
	const dims = env['SYMDEX_EMBEDDING_DIMENSIONS']?.trim();

	if (env['SYMDEX_DB_PATH']) layer['databasePath'] = env['SYMDEX_DB_PATH'];
	if (env['SYMDEX_EMBEDDING_PROVIDER']) {
		layer['embeddingProvider'] = env['SYMDEX_EMBEDDING_PROVIDER'];
	}
	if (env['SYMDEX_EMBEDDING_MODEL']) {
		layer['embeddingModel'] = env['SYMDEX_EMBEDDING_MODEL'];
	}
	if (dims) layer['embeddingDimensions'] = Number(dims);
	if (env['SYMDEX_OLLAMA_URL']) layer['ollamaBaseUrl'] = env['SYMDEX_OLLAMA_URL'];
	if (env['OPENAI_BASE_URL']) layer['openaiBaseUrl'] = env['OPENAI_BASE_URL'];
	if (env['OPENAI_API_KEY']) layer['apiKey'] = env['OPENAI_API_KEY'];

	return layer;
}

// ============================================================================
// Config I/O
// ============================================================================

async function readConfigFile(
	configPath: string,
): Promise<Record<string, unknown>> {
	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (isRecord(error) && error['code'] === 'ENOENT') {
			// First run: defaults apply
			return {};
		}
		throw new ConfigurationError(
			`Cannot read config at ${configPath}: ${errorMessage(error)}`,
			{cause: error},
		);
	}

	let loaded: unknown;
	try {
		loaded = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigurationError(
			`Invalid config.json at ${configPath}: ${errorMessage(parseError)}`,
		);
	}

	if (!isRecord(loaded)) {
		throw new ConfigurationError(
			`Invalid config.json at ${configPath}: expected an object`,
		);
	}
	return loaded;
}

export type LoadConfigOptions = {
	/** Config file path (default: {home}/config.json) */
	configPath?: string;
	/** Environment to read (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Highest-priority values */
	overrides?: SymdexConfigInput;
};

/**
 * Load config from disk, merging defaults, environment and overrides.
 *
 * A config file that exists but cannot be read or validated is fatal
 * rather than silently replaced by defaults, since a wrong embedding
 * dimension would corrupt the index.
 */
export async function loadConfig(
	options: LoadConfigOptions = {},
): Promise<SymdexConfig> {
	const fileLayer = await readConfigFile(options.configPath ?? getConfigPath());
	const envLayer = readEnvConfig(options.env);
	return resolveConfig(
		mergeConfigLayers(fileLayer, envLayer, {...options.overrides}),
	);
}

/**
 * Save config to disk.
 */
export async function saveConfig(
	config: SymdexConfigInput,
	configPath: string = getConfigPath(),
): Promise<void> {
	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}
