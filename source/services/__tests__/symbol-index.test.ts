/**
 * End-to-end tests for SymbolIndex: startup validation, project lifecycle,
 * indexing and search through the public entry point.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {resolveConfig, type SymdexConfig} from '../../lib/config.js';
import {
	AlreadyIndexingError,
	ConfigurationError,
	ProjectNotFoundError,
} from '../../lib/errors.js';
import {createNullLogger} from '../../lib/logger.js';
import {MockEmbeddingProvider} from '../../providers/mock.js';
import type {EmbeddingProvider} from '../../providers/types.js';
import {SymbolIndex} from '../symbol-index.js';
import {
	copyFixtureToTemp,
	loadParsers,
	outage,
	ScriptedEmbeddingProvider,
	type TestContext,
} from './helpers.js';

/**
 * Claims 768 dimensions but returns vectors of another width.
 */
class MisreportingProvider extends MockEmbeddingProvider {
	constructor() {
		super(768);
	}

	override async embedSingle(): Promise<number[]> {
		return [1, 0, 0, 0];
	}
}

describe('SymbolIndex', () => {
	let dir: string;
	let ctx: TestContext;
	let config: SymdexConfig;
	const opened: SymbolIndex[] = [];

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'symdex-index-'));
		ctx = await copyFixtureToTemp();
		config = resolveConfig({
			embeddingProvider: 'mock',
			databasePath: path.join(dir, 'lancedb'),
		});
	});

	afterEach(async () => {
		for (const index of opened.splice(0)) {
			index.close();
		}
		await ctx.cleanup();
		await fs.rm(dir, {recursive: true, force: true});
	});

	async function open(
		provider: EmbeddingProvider = new MockEmbeddingProvider(768),
		overrides: {config?: SymdexConfig; probeEmbeddings?: boolean} = {},
	): Promise<SymbolIndex> {
		const index = await SymbolIndex.open({
			config: overrides.config ?? config,
			provider,
			parsers: await loadParsers(),
			projectsPath: path.join(dir, 'projects.json'),
			logger: createNullLogger(),
			probeEmbeddings: overrides.probeEmbeddings,
		});
		opened.push(index);
		return index;
	}

	describe('startup', () => {
		it('refuses a provider whose width differs from the config', async () => {
			await expect(open(new MockEmbeddingProvider(384))).rejects.toBeInstanceOf(
				ConfigurationError,
			);
		});

		it('refuses a provider that returns vectors of the wrong width', async () => {
			await expect(
				open(new MisreportingProvider(), {probeEmbeddings: true}),
			).rejects.toThrow(/returned 4 dimensions, configuration expects 768/);
		});

		it('opens while the provider is unreachable', async () => {
			const provider = new ScriptedEmbeddingProvider();
			provider.failWith = outage();

			const index = await open(provider, {probeEmbeddings: true});

			expect(index.config.embeddingDimensions).toBe(768);
		});

		it('refuses a table created with another width', async () => {
			const first = await open();
			first.close();
			opened.splice(0);

			const narrow = resolveConfig({
				embeddingProvider: 'mock',
				embeddingDimensions: 8,
				databasePath: config.databasePath,
			});
			await expect(
				open(new MockEmbeddingProvider(8), {config: narrow}),
			).rejects.toThrow(/Embedding dimension mismatch/);
		});
	});

	describe('projects', () => {
		it('indexes and searches a registered project', async () => {
			const index = await open();
			const project = await index.addProject(ctx.projectRoot, 'payroll');

			const summary = await index.index(project.id);
			const response = await index.search(project.id, 'calc_salary');

			expect(summary.symbolsWritten).toBe(15);
			expect(response.results[0]).toMatchObject({
				name: 'calc_salary',
				projectId: project.id,
				filePath: 'hr/payroll.py',
			});
			expect(await index.listProjects()).toEqual([project]);
		});

		it('rejects indexing an unknown project', async () => {
			const index = await open();

			await expect(index.index('missing')).rejects.toBeInstanceOf(
				ProjectNotFoundError,
			);
		});

		it('removes a project and its symbols', async () => {
			const index = await open();
			const project = await index.addProject(ctx.projectRoot);
			await index.index(project.id);

			expect(await index.removeProject(project.id)).toBe(15);
			expect(await index.listProjects()).toEqual([]);
			expect(await index.store.countSymbols(project.id)).toBe(0);
			await expect(index.removeProject(project.id)).rejects.toBeInstanceOf(
				ProjectNotFoundError,
			);
		});

		it('refuses to remove a project while it is indexing', async () => {
			const index = await open();
			const project = await index.addProject(ctx.projectRoot);

			const attempt = new Promise<unknown>(resolve => {
				index.pipeline.once('index-start', () => {
					resolve(index.removeProject(project.id).catch((error: unknown) => error));
				});
			});
			const run = index.index(project.id);

			expect(await attempt).toBeInstanceOf(AlreadyIndexingError);
			await run;
		});
	});
});
