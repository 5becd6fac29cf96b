/**
 * Test helpers for indexing and search tests.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
	mergeConfigLayers,
	resolveConfig,
	type SymdexConfig,
	type SymdexConfigInput,
} from '../../lib/config.js';
import {EmbeddingError} from '../../lib/errors.js';
import {createParserRegistry, type ParserRegistry} from '../../lib/parsers/index.js';
import {MockEmbeddingProvider} from '../../providers/mock.js';
import type {EmbeddingProvider} from '../../providers/types.js';
import {EmbeddingGateway} from '../indexing/gateway.js';
import {IndexingPipeline} from '../indexing/pipeline.js';
import {SearchEngine} from '../search/index.js';
import {SymbolStore} from '../storage/index.js';

/** Path to the checked-in test fixtures */
export const FIXTURES_ROOT = path.join(process.cwd(), 'test-fixtures');

/** Temp directory prefix for test fixtures */
const TEMP_PREFIX = 'symdex-test-';

/** Test context with temp directory and cleanup */
export interface TestContext {
	projectRoot: string;
	cleanup: () => Promise<void>;
}

/**
 * Copy fixture directory to a unique temp directory.
 */
export async function copyFixtureToTemp(
	fixtureName: string = 'codebase',
): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX));
	await copyDirectory(path.join(FIXTURES_ROOT, fixtureName), tempDir);

	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

/**
 * Copy a directory recursively.
 */
async function copyDirectory(src: string, dest: string): Promise<void> {
	await fs.mkdir(dest, {recursive: true});
	const entries = await fs.readdir(src, {withFileTypes: true});

	for (const entry of entries) {
		const srcPath = path.join(src, entry.name);
		const destPath = path.join(dest, entry.name);

		if (entry.isDirectory()) {
			await copyDirectory(srcPath, destPath);
		} else {
			await fs.copyFile(srcPath, destPath);
		}
	}
}

/**
 * Create a temp project from a map of relative paths to contents.
 */
export async function createTempProject(
	files: Record<string, string>,
): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX));
	for (const [relativePath, content] of Object.entries(files)) {
		await addFile(tempDir, relativePath, content);
	}

	return {
		projectRoot: tempDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

/**
 * Add (or overwrite) a file in the temp project.
 */
export async function addFile(
	projectRoot: string,
	relativePath: string,
	content: string,
): Promise<void> {
	const fullPath = path.join(projectRoot, relativePath);
	await fs.mkdir(path.dirname(fullPath), {recursive: true});
	await fs.writeFile(fullPath, content);
}

/**
 * Delete a file from the temp project.
 */
export async function deleteFile(
	projectRoot: string,
	relativePath: string,
): Promise<void> {
	await fs.unlink(path.join(projectRoot, relativePath));
}

/**
 * Python source with `name` defined at `startLine` and spanning
 * `bodyLines + 1` lines.
 */
export function pythonFunctionAt(
	name: string,
	startLine: number,
	bodyLines: number = 1,
): string {
	const padding = Array.from({length: startLine - 1}, (_, i) => `# line ${i + 1}`);
	const body = Array.from(
		{length: bodyLines},
		(_, i) => `    value_${i} = ${i}`,
	);
	return [...padding, `def ${name}(hours, rate):`, ...body, ''].join('\n');
}

let parsersPromise: Promise<ParserRegistry> | null = null;

/**
 * Grammar loading is slow; share one registry per test file.
 */
export function loadParsers(): Promise<ParserRegistry> {
	if (!parsersPromise) {
		parsersPromise = createParserRegistry();
	}
	return parsersPromise;
}

/**
 * Mock embeddings with switchable failures.
 */
export class ScriptedEmbeddingProvider implements EmbeddingProvider {
	readonly name = 'scripted';
	readonly dimensions: number;
	/** Thrown by every embed call while set */
	failWith: Error | null = null;
	/** Requests containing a text with this marker are rejected outright */
	rejectMarker: string | null = null;
	/** Texts of every embed call, in order */
	readonly calls: string[][] = [];
	private readonly delegate: MockEmbeddingProvider;

	constructor(dimensions: number = 768) {
		this.dimensions = dimensions;
		this.delegate = new MockEmbeddingProvider(dimensions);
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.calls.push([...texts]);
		if (this.failWith) {
			throw this.failWith;
		}
		const marker = this.rejectMarker;
		if (marker && texts.some(text => text.includes(marker))) {
			throw new EmbeddingError('Input rejected by model', {retryable: false});
		}
		return this.delegate.embed(texts);
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new EmbeddingError('No vector returned', {retryable: false});
		}
		return vector;
	}

	close(): void {}
}

/**
 * A transient provider outage.
 */
export function outage(): EmbeddingError {
	return new EmbeddingError('Embedding service unavailable (503)', {
		retryable: true,
		status: 503,
	});
}

export type TestEnvironment = {
	config: SymdexConfig;
	provider: ScriptedEmbeddingProvider;
	store: SymbolStore;
	gateway: EmbeddingGateway;
	pipeline: IndexingPipeline;
	search: SearchEngine;
	cleanup: () => Promise<void>;
};

/**
 * Store, gateway, pipeline and search engine over a temp LanceDB
 * directory. Retries are immediate.
 */
export async function createTestEnvironment(
	overrides: SymdexConfigInput = {},
): Promise<TestEnvironment> {
	const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), `${TEMP_PREFIX}db-`));
	const config = resolveConfig(
		mergeConfigLayers(
			{
				embeddingProvider: 'mock',
				databasePath: path.join(dataDir, 'lancedb'),
				indexing: {embedInitialBackoffMs: 0, embedMaxAttempts: 2},
			},
			overrides,
		),
	);

	const provider = new ScriptedEmbeddingProvider(config.embeddingDimensions);
	const store = new SymbolStore({
		databasePath: config.databasePath,
		tableName: config.tableName,
		dimensions: config.embeddingDimensions,
	});
	await store.connect();

	const gateway = new EmbeddingGateway(provider, {
		batchSize: config.indexing.embedBatchSize,
		maxAttempts: config.indexing.embedMaxAttempts,
		initialBackoffMs: config.indexing.embedInitialBackoffMs,
	});
	const pipeline = new IndexingPipeline({
		store,
		registry: config.indexing.indexDocuments
			? await createParserRegistry({documents: true})
			: await loadParsers(),
		gateway,
		config: {
			...config.indexing,
			maxFileBytes: config.maxFileBytes,
			excludePatterns: config.excludePatterns,
		},
	});
	const search = new SearchEngine({store, gateway, config: config.search});

	return {
		config,
		provider,
		store,
		gateway,
		pipeline,
		search,
		cleanup: async () => {
			store.close();
			await fs.rm(dataDir, {recursive: true, force: true});
		},
	};
}
